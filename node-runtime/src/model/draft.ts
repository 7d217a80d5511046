import type {
  ConditionalRecordStep,
  LeafStep,
  LoopStep,
  Step,
} from '../types/index.js';
import { cloneSteps, createConditionalRecordStep, createLoopStep } from './steps.js';

/**
 * Editing capability for one step variant. Resolves to the edited step, or
 * `null` when the user cancels.
 */
export interface StepEditor<S extends Step = Step> {
  edit(initial?: S): Promise<S | null>;
}

/**
 * A private copy of a container body. Changes stay in the draft until
 * `commit()`; dropping the draft discards them.
 */
export class SubWorkflowDraft<S extends Step = Step> {
  private items: S[];

  constructor(steps: readonly S[]) {
    this.items = cloneSteps(steps);
  }

  get steps(): readonly S[] {
    return this.items;
  }

  get length(): number {
    return this.items.length;
  }

  add(step: S): void {
    this.items = [...this.items, step];
  }

  replace(index: number, step: S): void {
    this.assertIndex(index);
    this.items = this.items.map((existing, i) => (i === index ? step : existing));
  }

  remove(index: number): void {
    this.assertIndex(index);
    this.items = this.items.filter((_, i) => i !== index);
  }

  move(from: number, to: number): void {
    this.assertIndex(from);
    this.assertIndex(to);
    const next = [...this.items];
    const [moved] = next.splice(from, 1);
    next.splice(to, 0, moved);
    this.items = next;
  }

  commit(): S[] {
    return cloneSteps(this.items);
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.items.length) {
      throw new RangeError(`No step at index ${index}`);
    }
  }
}

/** Resolves `true` to keep the draft's edits, `false` to drop them. */
export type DraftEdit<S extends Step> = (draft: SubWorkflowDraft<S>) => Promise<boolean>;

export async function editLoopBody(loop: LoopStep, edit: DraftEdit<Step>): Promise<LoopStep | null> {
  const draft = new SubWorkflowDraft<Step>(loop.steps);
  if (!(await edit(draft))) return null;
  return createLoopStep({ count: loop.count, steps: draft.commit(), delay: loop.delay });
}

export async function editCaseBody(
  step: ConditionalRecordStep,
  caseIndex: number,
  edit: DraftEdit<LeafStep>,
): Promise<ConditionalRecordStep | null> {
  const target = step.cases[caseIndex];
  if (target === undefined) {
    throw new RangeError(`No case at index ${caseIndex}`);
  }
  const draft = new SubWorkflowDraft<LeafStep>(target.steps);
  if (!(await edit(draft))) return null;
  const body = draft.commit();
  return createConditionalRecordStep({
    source: step.source,
    cases: step.cases.map((c, i) => (i === caseIndex ? { value: c.value, steps: body } : c)),
    else_steps: step.else_steps,
    delay: step.delay,
  });
}

export async function editElseBody(
  step: ConditionalRecordStep,
  edit: DraftEdit<LeafStep>,
): Promise<ConditionalRecordStep | null> {
  const draft = new SubWorkflowDraft<LeafStep>(step.else_steps);
  if (!(await edit(draft))) return null;
  return createConditionalRecordStep({
    source: step.source,
    cases: step.cases,
    else_steps: draft.commit(),
    delay: step.delay,
  });
}
