import { statSync } from 'node:fs';
import { isDeepStrictEqual } from 'node:util';
import { StepSchema } from '../schemas/step.schema.js';
import {
  DEFAULT_IMAGE_DELAY_SEC,
  DEFAULT_STEP_DELAY_SEC,
} from '../config/defaults.js';
import {
  KEYBOARD_ACTIONS,
  MOUSE_ACTIONS,
  ValidationError,
  isLeafStep,
  type Case,
  type ConditionSource,
  type ConditionalRecordStep,
  type ImageStep,
  type KeyboardAction,
  type KeyboardStep,
  type LeafStep,
  type LoopStep,
  type MouseAction,
  type MouseStep,
  type Step,
} from '../types/index.js';

/** Text fields hand values over as strings; programmatic callers pass numbers. */
export type NumericInput = number | string;

export interface MouseStepInput {
  action?: string;
  x: NumericInput;
  y: NumericInput;
  delay?: NumericInput;
}

export interface KeyboardStepInput {
  action?: string;
  value: string;
  delay?: NumericInput;
}

export interface ImageStepInput {
  path: string;
  delay?: NumericInput;
}

export interface CaseInput {
  value: string;
  steps?: readonly Step[];
}

export interface ConditionalRecordStepInput {
  source?: ConditionSource;
  cases?: readonly CaseInput[];
  else_steps?: readonly Step[];
  delay?: NumericInput;
}

export interface LoopStepInput {
  count: NumericInput;
  steps?: readonly Step[];
  delay?: NumericInput;
}

export interface ImageStepOptions {
  isFile?: (path: string) => boolean;
}

function parseNumber(field: string, raw: NumericInput): number {
  const value = typeof raw === 'number' ? raw : raw.trim() === '' ? Number.NaN : Number(raw.trim());
  if (!Number.isFinite(value)) {
    throw new ValidationError(field, `expected a number, got "${String(raw)}"`);
  }
  // -0 would not survive a JSON round trip
  return value === 0 ? 0 : value;
}

function parseInteger(field: string, raw: NumericInput): number {
  const value = parseNumber(field, raw);
  if (!Number.isInteger(value)) {
    throw new ValidationError(field, `expected a whole number, got "${String(raw)}"`);
  }
  return value;
}

function parseDelay(raw: NumericInput | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const delay = parseNumber('delay', raw);
  if (delay < 0) {
    throw new ValidationError('delay', 'must not be negative');
  }
  return delay;
}

function parseChoice<T extends string>(field: string, raw: string, choices: readonly T[]): T {
  const found = choices.find((choice) => choice === raw);
  if (found === undefined) {
    throw new ValidationError(field, `expected one of ${choices.join(', ')}, got "${raw}"`);
  }
  return found;
}

function defaultIsFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/** Deep copy, so the copy shares no objects with the original. */
export function cloneStep<S extends Step>(step: S): S {
  return deepFreeze(structuredClone(step));
}

export function cloneSteps<S extends Step>(steps: readonly S[]): S[] {
  return steps.map((step) => cloneStep(step));
}

export function stepsEqual(a: Step | readonly Step[], b: Step | readonly Step[]): boolean {
  return isDeepStrictEqual(a, b);
}

function adoptChild(field: string, child: Step): Step {
  const parsed = StepSchema.safeParse(child);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const suffix = issue.path.length > 0 ? `.${issue.path.join('.')}` : '';
    throw new ValidationError(`${field}${suffix}`, issue.message);
  }
  return cloneStep(parsed.data);
}

function adoptLeaf(field: string, child: Step): LeafStep {
  if (!isLeafStep(child)) {
    throw new ValidationError(field, 'conditional bodies hold only mouse, keyboard or image steps');
  }
  const adopted = adoptChild(field, child);
  if (!isLeafStep(adopted)) {
    throw new ValidationError(field, 'conditional bodies hold only mouse, keyboard or image steps');
  }
  return adopted;
}

export function createMouseStep(input: MouseStepInput): MouseStep {
  const action: MouseAction = parseChoice('action', input.action ?? 'Click', MOUSE_ACTIONS);
  const step: MouseStep = {
    type: 'mouse',
    action,
    x: parseInteger('x', input.x),
    y: parseInteger('y', input.y),
    delay: parseDelay(input.delay, DEFAULT_STEP_DELAY_SEC),
  };
  return deepFreeze(step);
}

export function createKeyboardStep(input: KeyboardStepInput): KeyboardStep {
  const action: KeyboardAction = parseChoice('action', input.action ?? 'Type Text', KEYBOARD_ACTIONS);
  if (input.value.length === 0) {
    throw new ValidationError('value', 'must not be empty');
  }
  const step: KeyboardStep = {
    type: 'keyboard',
    action,
    value: input.value,
    delay: parseDelay(input.delay, DEFAULT_STEP_DELAY_SEC),
  };
  return deepFreeze(step);
}

export function createImageStep(input: ImageStepInput, options: ImageStepOptions = {}): ImageStep {
  const isFile = options.isFile ?? defaultIsFile;
  if (!input.path || !isFile(input.path)) {
    throw new ValidationError('path', `"${input.path}" is not an existing image file`);
  }
  const step: ImageStep = {
    type: 'image',
    path: input.path,
    delay: parseDelay(input.delay, DEFAULT_IMAGE_DELAY_SEC),
  };
  return deepFreeze(step);
}

export function createCase(input: CaseInput, field = 'case'): Case {
  const built: Case = {
    value: input.value,
    steps: (input.steps ?? []).map((child, i) => adoptLeaf(`${field}.steps[${i}]`, child)),
  };
  return deepFreeze(built);
}

export function createConditionalRecordStep(
  input: ConditionalRecordStepInput = {},
): ConditionalRecordStep {
  const step: ConditionalRecordStep = {
    type: 'conditional_record',
    source: input.source ?? 'clipboard',
    cases: (input.cases ?? []).map((c, i) => createCase(c, `cases[${i}]`)),
    else_steps: (input.else_steps ?? []).map((child, i) => adoptLeaf(`else_steps[${i}]`, child)),
    delay: parseDelay(input.delay, DEFAULT_STEP_DELAY_SEC),
  };
  return deepFreeze(step);
}

export function createLoopStep(input: LoopStepInput): LoopStep {
  const count = parseInteger('count', input.count);
  if (count < 0) {
    throw new ValidationError('count', 'must not be negative');
  }
  const step: LoopStep = {
    type: 'loop',
    count,
    steps: (input.steps ?? []).map((child, i) => adoptChild(`steps[${i}]`, child)),
    delay: parseDelay(input.delay, DEFAULT_STEP_DELAY_SEC),
  };
  return deepFreeze(step);
}
