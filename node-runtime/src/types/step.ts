export const MOUSE_ACTIONS = ['Click', 'Right Click', 'Hold', 'Release'] as const;
export const KEYBOARD_ACTIONS = ['Type Text', 'Press Key', 'Hotkey'] as const;
export const CONDITION_SOURCES = ['clipboard'] as const;

export type MouseAction = (typeof MOUSE_ACTIONS)[number];
export type KeyboardAction = (typeof KEYBOARD_ACTIONS)[number];
export type ConditionSource = (typeof CONDITION_SOURCES)[number];

export interface MouseStep {
  readonly type: 'mouse';
  readonly action: MouseAction;
  readonly x: number;
  readonly y: number;
  /** Seconds to wait before the action runs. */
  readonly delay: number;
}

export interface KeyboardStep {
  readonly type: 'keyboard';
  readonly action: KeyboardAction;
  readonly value: string;
  readonly delay: number;
}

export interface ImageStep {
  readonly type: 'image';
  readonly path: string;
  readonly delay: number;
}

export type LeafStep = MouseStep | KeyboardStep | ImageStep;

export interface Case {
  readonly value: string;
  readonly steps: readonly LeafStep[];
}

export interface ConditionalRecordStep {
  readonly type: 'conditional_record';
  readonly source: ConditionSource;
  readonly cases: readonly Case[];
  readonly else_steps: readonly LeafStep[];
  readonly delay: number;
}

export interface LoopStep {
  readonly type: 'loop';
  readonly count: number;
  readonly steps: readonly Step[];
  readonly delay: number;
}

export type ContainerStep = ConditionalRecordStep | LoopStep;

export type Step = LeafStep | ContainerStep;

export type StepType = Step['type'];

export type Workflow = readonly Step[];

export function isLeafStep(step: Step): step is LeafStep {
  return step.type === 'mouse' || step.type === 'keyboard' || step.type === 'image';
}
