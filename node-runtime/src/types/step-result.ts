export type ErrorType = 'TargetNotFound' | 'AutomationCapabilityError';

export interface StepResult {
  /** Dotted index of the step in the workflow, e.g. `2` or `2.0`. */
  stepId: string;
  ok: boolean;
  errorType?: ErrorType;
  message?: string;
  durationMs?: number;
}

export type RunOutcome = 'completed' | 'stopped' | 'failed';

export interface RunResult {
  ok: boolean;
  outcome: RunOutcome;
  stepResults: StepResult[];
  failedAt?: string;
  errorType?: ErrorType;
  message?: string;
  durationMs: number;
}
