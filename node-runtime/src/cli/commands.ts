import { join } from 'node:path';
import { CURSOR_CAPTURE_DELAY_SEC } from '../config/defaults.js';
import type { Env } from '../config/env.js';
import type { AutomationDriver } from '../engines/automation-driver.js';
import { DryRunDriver } from '../engines/dry-run-driver.js';
import { XdotoolDriver } from '../engines/xdotool-driver.js';
import { extractMessage } from '../exception/classifier.js';
import { RunLogger } from '../logging/run-logger.js';
import { captureCursorPosition } from '../model/cursor.js';
import { describeStep, describeWorkflow } from '../model/describe.js';
import { listPresets, loadWorkflow, saveWorkflow, serializeWorkflow } from '../recipe/loader.js';
import { JsonlCaptureSource } from '../recorder/jsonl-capture-source.js';
import { recordSession } from '../recorder/record.js';
import { newRunId, RunController } from '../runner/run-controller.js';
import { parseArgs, type CliArgs } from './args.js';

export const USAGE = [
  'Usage:',
  '  macro-replay run <workflow.json> [--dry-run] [--log-dir <dir>]',
  '  macro-replay normalize <capture.jsonl> [--out <file>]',
  '  macro-replay describe <workflow.json>',
  '  macro-replay presets',
  '  macro-replay position [--wait <seconds>] [--dry-run]',
].join('\n');

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  env(): Env;
  createDriver?(dryRun: boolean): AutomationDriver;
  /** Registers an interrupt handler; returns its disposer. */
  onInterrupt?(handler: () => void): () => void;
}

function defaultDriver(dryRun: boolean): AutomationDriver {
  return dryRun ? new DryRunDriver() : new XdotoolDriver();
}

/** Runs one CLI invocation and resolves to the process exit code. */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  const args = parseArgs(argv);
  if (args.unknown.length > 0) {
    io.err(`Unknown option: ${args.unknown.join(' ')}`);
    io.err(USAGE);
    return 2;
  }

  try {
    switch (args.command) {
      case 'run':
        return await runWorkflow(args, io);
      case 'normalize':
        return await normalizeCapture(args, io);
      case 'describe':
        return await describe(args, io);
      case 'presets':
        return await presets(io);
      case 'position':
        return await position(args, io);
      default:
        io.err(USAGE);
        return 2;
    }
  } catch (error) {
    io.err(`macro-replay: ${extractMessage(error)}`);
    return 1;
  }
}

function requireFile(args: CliArgs, io: CliIO): string | null {
  if (args.file === undefined) {
    io.err(`${args.command ?? ''}: missing file argument`);
    io.err(USAGE);
    return null;
  }
  return args.file;
}

async function runWorkflow(args: CliArgs, io: CliIO): Promise<number> {
  const file = requireFile(args, io);
  if (file === null) return 2;

  const env = io.env();
  const steps = await loadWorkflow(file);
  const dryRun = args.dryRun || env.MACRO_REPLAY_DRY_RUN;
  const driver = (io.createDriver ?? defaultDriver)(dryRun);
  const logDir = args.logDir ?? env.MACRO_REPLAY_RUNS_DIR;
  const runId = newRunId();

  const emit = (event: Record<string, unknown>) => io.out(JSON.stringify(event));

  const controller = new RunController({
    driver,
    createRunId: () => runId,
    createLogger: (id) => new RunLogger(join(logDir, id)),
    observer: {
      stepStart: (stepId, step) => emit({ type: 'step_start', stepId, description: describeStep(step) }),
      iteration: (progress) => emit({ type: 'iteration', ...progress }),
      stepEnd: (result) => emit({ type: 'step_end', ...result }),
      warning: (message) => emit({ type: 'warning', message }),
    },
  });

  const unsubscribe = controller.store.subscribe((state, prev) => {
    if (state.status !== prev.status) emit({ type: 'status', status: state.status });
  });
  const disposeInterrupt = io.onInterrupt?.(() => controller.stop());

  emit({ type: 'run_start', runId, totalSteps: steps.length, dryRun });
  try {
    const result = await controller.start(steps);
    emit({
      type: 'run_complete',
      ok: result.ok,
      outcome: result.outcome,
      totalDurationMs: result.durationMs,
      ...(result.failedAt !== undefined ? { abortedAt: result.failedAt } : {}),
      ...(result.message !== undefined ? { message: result.message } : {}),
    });
    return result.outcome === 'failed' ? 1 : 0;
  } catch (error) {
    emit({ type: 'run_error', error: extractMessage(error) });
    return 1;
  } finally {
    disposeInterrupt?.();
    unsubscribe();
  }
}

async function normalizeCapture(args: CliArgs, io: CliIO): Promise<number> {
  const file = requireFile(args, io);
  if (file === null) return 2;

  const result = await recordSession(new JsonlCaptureSource(file));
  if (result.capability === 'unavailable') {
    io.err(`Recording unavailable: ${result.reason}`);
    return 1;
  }

  if (args.out !== undefined) {
    await saveWorkflow(args.out, result.steps);
    io.out(`Saved ${result.steps.length} steps to ${args.out}`);
  } else {
    io.out(serializeWorkflow(result.steps));
  }
  return 0;
}

async function describe(args: CliArgs, io: CliIO): Promise<number> {
  const file = requireFile(args, io);
  if (file === null) return 2;

  const steps = await loadWorkflow(file);
  for (const line of describeWorkflow(steps)) {
    io.out(line);
  }
  return 0;
}

async function presets(io: CliIO): Promise<number> {
  const files = await listPresets(io.env().MACRO_REPLAY_PRESETS_DIR);
  for (const file of files) {
    io.out(file);
  }
  return 0;
}

async function position(args: CliArgs, io: CliIO): Promise<number> {
  const delaySec = args.wait === undefined ? undefined : Number(args.wait);
  if (delaySec !== undefined && (!Number.isFinite(delaySec) || delaySec < 0)) {
    io.err(`position: --wait expects a non-negative number of seconds, got "${args.wait ?? ''}"`);
    return 2;
  }

  const dryRun = args.dryRun || io.env().MACRO_REPLAY_DRY_RUN;
  const driver = (io.createDriver ?? defaultDriver)(dryRun);
  if (delaySec !== 0) {
    io.err(`Move the pointer to the target; reading its position in ${delaySec ?? CURSOR_CAPTURE_DELAY_SEC}s`);
  }
  const { x, y } = await captureCursorPosition(driver, { delaySec });
  io.out(JSON.stringify({ x, y }));
  return 0;
}
