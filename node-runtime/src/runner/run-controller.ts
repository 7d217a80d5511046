import { AlreadyRunningError, type RunResult, type Step } from '../types/index.js';
import type { AutomationDriver } from '../engines/automation-driver.js';
import { DEFAULT_EXECUTION, type ExecutionSettings } from '../config/defaults.js';
import { extractMessage } from '../exception/classifier.js';
import type { RunLogger } from '../logging/run-logger.js';
import { describeStep } from '../model/describe.js';
import { cloneSteps } from '../model/steps.js';
import { createRunStore, IDLE_STATUS, type RunState, type RunStoreApi } from '../store/run-store.js';
import type { WorkflowStoreApi } from '../store/workflow-store.js';
import { RunSignal } from './run-signal.js';
import { StepExecutor } from './step-executor.js';
import { WorkflowEngine, type EngineObserver } from './workflow-engine.js';

export interface RunControllerOptions {
  driver: AutomationDriver;
  settings?: ExecutionSettings;
  /** Receives status, current step and iteration progress. */
  store?: RunStoreApi;
  /** Locked for the duration of each run. */
  workflowStore?: WorkflowStoreApi;
  createLogger?: (runId: string) => RunLogger | null;
  /** Extra observer, called after the store and logger are updated. */
  observer?: EngineObserver;
  createRunId?: () => string;
}

export function newRunId(): string {
  return `run-${Date.now()}-${Math.random().toString(36).slice(2, 7)}`;
}

/**
 * Owns the run lifecycle: at most one run at a time, a fresh signal per run,
 * and the idle/running/stopping state published to the run store.
 */
export class RunController {
  readonly store: RunStoreApi;
  private engine: WorkflowEngine;
  private signal: RunSignal | null = null;

  constructor(private options: RunControllerOptions) {
    this.store = options.store ?? createRunStore();
    const executor = new StepExecutor(options.driver, options.settings ?? DEFAULT_EXECUTION);
    this.engine = new WorkflowEngine(options.driver, executor);
  }

  get isRunning(): boolean {
    return this.signal !== null;
  }

  get state(): RunState {
    return this.store.getState().state;
  }

  /**
   * Run a snapshot of `steps` to completion, stop or failure. Rejects with
   * `AlreadyRunningError` while another run is active; leaf failures resolve
   * to a failed `RunResult`.
   */
  async start(steps: readonly Step[]): Promise<RunResult> {
    if (this.signal) {
      throw new AlreadyRunningError();
    }

    const signal = new RunSignal();
    this.signal = signal;
    const snapshot = cloneSteps(steps);
    const runId = (this.options.createRunId ?? newRunId)();
    const logger = this.options.createLogger?.(runId) ?? null;

    logger?.append({ type: 'run_start', runId, totalSteps: snapshot.length });
    const unsubscribe = this.store.subscribe((state, prev) => {
      if (state.status !== prev.status) {
        logger?.append({ type: 'status', status: state.status });
      }
    });

    this.options.workflowStore?.getState().lock();
    this.store.getState().setRunStart(runId);

    let result: RunResult;
    try {
      result = await this.engine.run(snapshot, signal, this.observe(logger));
    } catch (error) {
      this.release();
      this.store.getState().setRunError(`Run error: ${extractMessage(error)}`);
      unsubscribe();
      throw error;
    }

    this.release();
    const status = result.outcome === 'failed' ? (result.message ?? IDLE_STATUS) : IDLE_STATUS;
    this.store.getState().setRunEnd(result, status);
    unsubscribe();

    logger?.append({
      type: 'run_end',
      runId,
      outcome: result.outcome,
      durationMs: result.durationMs,
      ...(result.failedAt !== undefined ? { failedAt: result.failedAt } : {}),
      ...(result.message !== undefined ? { message: result.message } : {}),
    });
    try {
      await logger?.flush();
    } catch (error) {
      this.store.getState().setRunError(`Run error: ${extractMessage(error)}`);
      throw error;
    }
    return result;
  }

  /** Request a stop. Safe to call in any state and more than once. */
  stop(): void {
    const signal = this.signal;
    if (!signal || signal.stopped) return;
    signal.stop();
    this.store.getState().setStopping();
  }

  private release(): void {
    this.signal = null;
    this.options.workflowStore?.getState().unlock();
  }

  private observe(logger: RunLogger | null): EngineObserver {
    const store = this.store;
    const extra = this.options.observer;

    return {
      stepStart: async (stepId, step) => {
        store.getState().setStepStart(stepId);
        logger?.append({ type: 'step_start', stepId, description: describeStep(step) });
        await extra?.stepStart?.(stepId, step);
      },
      iteration: async (progress) => {
        logger?.append({ type: 'iteration', ...progress });
        store.getState().setIteration(progress);
        await extra?.iteration?.(progress);
      },
      stepEnd: async (result) => {
        logger?.append({ type: 'step_end', ...result });
        if (!result.ok && result.message !== undefined) {
          store.getState().setStatus(result.message);
        }
        await extra?.stepEnd?.(result);
      },
      warning: async (message) => {
        logger?.append({ type: 'warning', message });
        await extra?.warning?.(message);
      },
    };
  }
}
