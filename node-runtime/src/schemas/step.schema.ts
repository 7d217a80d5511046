import { z } from 'zod';
import {
  CONDITION_SOURCES,
  KEYBOARD_ACTIONS,
  MOUSE_ACTIONS,
  type Step,
} from '../types/step.js';

// JSON writes -0 as 0, so it is read back as 0 too
const unsignedZero = (n: number) => (n === 0 ? 0 : n);

const DelaySchema = z.number().finite().nonnegative().transform(unsignedZero);
const CoordinateSchema = z.number().int().transform(unsignedZero);

export const MouseStepSchema = z.object({
  type: z.literal('mouse'),
  action: z.enum(MOUSE_ACTIONS),
  x: CoordinateSchema,
  y: CoordinateSchema,
  delay: DelaySchema,
});

export const KeyboardStepSchema = z.object({
  type: z.literal('keyboard'),
  action: z.enum(KEYBOARD_ACTIONS),
  value: z.string().min(1),
  delay: DelaySchema,
});

export const ImageStepSchema = z.object({
  type: z.literal('image'),
  path: z.string().min(1),
  delay: DelaySchema,
});

export const LeafStepSchema = z.discriminatedUnion('type', [
  MouseStepSchema,
  KeyboardStepSchema,
  ImageStepSchema,
]);

export const CaseSchema = z.object({
  value: z.string(),
  steps: z.array(LeafStepSchema),
});

export const ConditionalRecordStepSchema = z.object({
  type: z.literal('conditional_record'),
  source: z.enum(CONDITION_SOURCES),
  cases: z.array(CaseSchema),
  else_steps: z.array(LeafStepSchema),
  delay: DelaySchema,
});

export const LoopStepSchema = z.object({
  type: z.literal('loop'),
  count: z.number().int().nonnegative().transform(unsignedZero),
  steps: z.array(z.lazy(() => StepSchema)),
  delay: DelaySchema,
});

export const StepSchema: z.ZodType<Step> = z.discriminatedUnion('type', [
  MouseStepSchema,
  KeyboardStepSchema,
  ImageStepSchema,
  ConditionalRecordStepSchema,
  LoopStepSchema,
]);
