import { appendFile, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { RunOutcome, StepResult } from '../types/step-result.js';

export type RunLogEvent =
  | { type: 'run_start'; runId: string; totalSteps: number }
  | { type: 'step_start'; stepId: string; description: string }
  | ({ type: 'step_end' } & StepResult)
  | { type: 'iteration'; stepId: string; index: number; count: number }
  | { type: 'status'; status: string }
  | { type: 'warning'; message: string }
  | {
      type: 'run_end';
      runId: string;
      outcome: RunOutcome;
      durationMs: number;
      failedAt?: string;
      message?: string;
    };

/**
 * Appends one JSON line per event to `<runDir>/logs.jsonl`.
 * Writes are queued in call order; `flush()` waits for them and rethrows the
 * first write failure.
 */
export class RunLogger {
  private logPath: string;
  private initialized = false;
  private pending: Promise<void> = Promise.resolve();
  private failure: unknown = null;

  constructor(private runDir: string) {
    this.logPath = join(runDir, 'logs.jsonl');
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    await mkdir(this.runDir, { recursive: true });
    this.initialized = true;
  }

  append(event: RunLogEvent): void {
    const timestamp = new Date().toISOString();
    this.pending = this.pending
      .then(() => (this.failure === null ? this.write({ timestamp, ...event }) : undefined))
      .catch((error: unknown) => {
        this.failure = error;
      });
  }

  async flush(): Promise<void> {
    await this.pending;
    if (this.failure !== null) {
      const failure = this.failure;
      this.failure = null;
      throw failure;
    }
  }

  getRunDir(): string {
    return this.runDir;
  }

  getLogPath(): string {
    return this.logPath;
  }

  private async write(line: Record<string, unknown>): Promise<void> {
    await this.ensureDir();
    await appendFile(this.logPath, JSON.stringify(line) + '\n', 'utf-8');
  }
}
