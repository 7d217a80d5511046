/** Seconds the pointer takes to glide to a mouse step's target. */
export const MOUSE_MOVE_DURATION_SEC = 0.2;

/** Seconds between characters when typing text. */
export const TYPE_INTERVAL_SEC = 0.01;

export const IMAGE_MATCH_CONFIDENCE = 0.8;

export interface ExecutionSettings {
  mouseMoveDurationSec: number;
  typeIntervalSec: number;
  imageConfidence: number;
}

export const DEFAULT_EXECUTION: ExecutionSettings = {
  mouseMoveDurationSec: MOUSE_MOVE_DURATION_SEC,
  typeIntervalSec: TYPE_INTERVAL_SEC,
  imageConfidence: IMAGE_MATCH_CONFIDENCE,
};

// Values the step editors start from.
export const DEFAULT_STEP_DELAY_SEC = 0.1;
export const DEFAULT_IMAGE_DELAY_SEC = 0.5;
export const DEFAULT_LOOP_COUNT = 3;

/** Seconds the user gets to place the pointer before its position is read. */
export const CURSOR_CAPTURE_DELAY_SEC = 3;

export interface RecorderSettings {
  stopKey: string;
  stopRightHoldSec: number;
}

export const DEFAULT_RECORDER: RecorderSettings = {
  stopKey: 'esc',
  stopRightHoldSec: 2.0,
};
