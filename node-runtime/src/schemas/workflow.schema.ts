import { z } from 'zod';
import { StepSchema } from './step.schema.js';

/** A saved workflow is a bare JSON array of steps. */
export const WorkflowSchema = z.array(StepSchema);
