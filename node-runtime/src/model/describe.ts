import { basename } from 'node:path';
import type { Step } from '../types/index.js';

const PREVIEW_LENGTH = 20;

export function describeStep(step: Step): string {
  switch (step.type) {
    case 'mouse':
      return `MOUSE ${step.action} at (${step.x},${step.y})`;
    case 'keyboard': {
      if (step.action === 'Type Text' && step.value.length > PREVIEW_LENGTH) {
        return `KEYBOARD ${step.action}: '${step.value.slice(0, PREVIEW_LENGTH)}...'`;
      }
      return `KEYBOARD ${step.action}: '${step.value}'`;
    }
    case 'image':
      return `IMAGE click '${basename(step.path)}'`;
    case 'conditional_record':
      return `COND-RECORD (${step.source}) ${step.cases.length} cases, else:${step.else_steps.length} steps`;
    case 'loop':
      return `LOOP BLOCK (${step.count} times, ${step.steps.length} steps)`;
  }
}

/** List rows numbered from 1, as the step list shows them. */
export function describeWorkflow(steps: readonly Step[]): string[] {
  return steps.map((step, i) => `${i + 1}. ${describeStep(step)}`);
}
