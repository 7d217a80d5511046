import {
  isLeafStep,
  type ConditionSource,
  type ConditionalRecordStep,
  type LeafStep,
  type LoopStep,
  type RunResult,
  type Step,
  type StepResult,
} from '../types/index.js';
import type { AutomationDriver } from '../engines/automation-driver.js';
import type { IterationProgress } from '../store/run-store.js';
import { extractMessage } from '../exception/classifier.js';
import type { RunSignal } from './run-signal.js';
import type { StepExecutor } from './step-executor.js';

/**
 * Callbacks for UI highlighting and logging. The engine awaits each one
 * before continuing.
 */
export interface EngineObserver {
  stepStart?(stepId: string, step: Step): void | Promise<void>;
  iteration?(progress: IterationProgress): void | Promise<void>;
  stepEnd?(result: StepResult): void | Promise<void>;
  warning?(message: string): void | Promise<void>;
}

interface RunState {
  signal: RunSignal;
  observer: EngineObserver;
  stepResults: StepResult[];
  failure: StepResult | null;
}

/**
 * First case whose non-empty value occurs in `text`, else the else branch.
 */
export function selectBranch(step: ConditionalRecordStep, text: string): readonly LeafStep[] {
  const matched = step.cases.find((c) => c.value !== '' && text.includes(c.value));
  return matched ? matched.steps : step.else_steps;
}

export class WorkflowEngine {
  constructor(
    private driver: AutomationDriver,
    private stepExecutor: StepExecutor,
  ) {}

  /**
   * Walk `steps` in order until the end, a stop, or the first failed leaf.
   * The signal is checked before and after every delay, before every
   * sub-step and before every loop iteration.
   */
  async run(steps: readonly Step[], signal: RunSignal, observer: EngineObserver = {}): Promise<RunResult> {
    const start = Date.now();
    const state: RunState = { signal, observer, stepResults: [], failure: null };

    const completed = await this.runSequence(steps, null, state);
    const durationMs = Date.now() - start;

    if (state.failure) {
      return {
        ok: false,
        outcome: 'failed',
        stepResults: state.stepResults,
        failedAt: state.failure.stepId,
        errorType: state.failure.errorType,
        message: state.failure.message,
        durationMs,
      };
    }

    return {
      ok: completed,
      outcome: completed ? 'completed' : 'stopped',
      stepResults: state.stepResults,
      durationMs,
    };
  }

  private async runSequence(
    steps: readonly Step[],
    parentId: string | null,
    state: RunState,
  ): Promise<boolean> {
    for (let i = 0; i < steps.length; i++) {
      const step = steps[i];
      const stepId = parentId === null ? String(i) : `${parentId}.${i}`;

      if (state.signal.stopped) return false;
      await state.observer.stepStart?.(stepId, step);

      await state.signal.sleep(step.delay);
      if (state.signal.stopped) return false;

      if (!(await this.dispatch(step, stepId, state))) return false;
    }
    return true;
  }

  private async dispatch(step: Step, stepId: string, state: RunState): Promise<boolean> {
    if (isLeafStep(step)) {
      return this.executeLeaf(step, stepId, state);
    }
    switch (step.type) {
      case 'conditional_record':
        return this.executeConditional(step, stepId, state);
      case 'loop':
        return this.executeLoop(step, stepId, state);
    }
  }

  private async executeLeaf(step: LeafStep, stepId: string, state: RunState): Promise<boolean> {
    const result = await this.stepExecutor.execute(step, stepId);
    state.stepResults.push(result);
    await state.observer.stepEnd?.(result);

    if (!result.ok) {
      state.failure = result;
      state.signal.stop();
      return false;
    }
    return true;
  }

  private async executeConditional(
    step: ConditionalRecordStep,
    stepId: string,
    state: RunState,
  ): Promise<boolean> {
    const text = await this.readConditionText(step.source, state);
    return this.runSequence(selectBranch(step, text), stepId, state);
  }

  private async executeLoop(step: LoopStep, stepId: string, state: RunState): Promise<boolean> {
    for (let index = 1; index <= step.count; index++) {
      if (state.signal.stopped) return false;
      await state.observer.iteration?.({ stepId, index, count: step.count });
      if (!(await this.runSequence(step.steps, stepId, state))) return false;
    }
    return true;
  }

  private async readConditionText(source: ConditionSource, state: RunState): Promise<string> {
    switch (source) {
      case 'clipboard':
        try {
          return await this.driver.readClipboardText();
        } catch (error) {
          // An unreadable clipboard matches no case
          await state.observer.warning?.(`Could not read clipboard: ${extractMessage(error)}`);
          return '';
        }
    }
  }
}
