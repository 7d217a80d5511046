import type { LeafStep } from '../types/index.js';
import { DEFAULT_RECORDER, type RecorderSettings } from '../config/defaults.js';
import { createKeyboardStep, createMouseStep } from '../model/steps.js';
import { coalesceRecordedSteps } from './normalizer.js';
import type { RawInputEvent, RawKeyEvent, RawMouseEvent } from './raw-event.js';

export type RecordingState = 'recording' | 'finished';

function roundDelay(seconds: number): number {
  return Math.round(seconds * 1000) / 1000;
}

/**
 * Capture state machine. Turns raw input events into leaf steps until the
 * stop key or a long right-button hold ends the capture.
 */
export class RecordingSession {
  private recorded: LeafStep[] = [];
  private lastRecordedAt: number | null = null;
  private rightPressedAt: number | null = null;
  private current: RecordingState = 'recording';

  constructor(private settings: RecorderSettings = DEFAULT_RECORDER) {}

  get state(): RecordingState {
    return this.current;
  }

  /** Steps recorded so far, before coalescing. */
  get rawSteps(): readonly LeafStep[] {
    return this.recorded;
  }

  /** Feed one event. Returns whether capture continues. */
  push(event: RawInputEvent): boolean {
    if (this.current === 'finished') return false;

    const continues = event.kind === 'key' ? this.onKey(event) : this.onMouse(event);
    if (!continues) this.current = 'finished';
    return continues;
  }

  /** End capture and return the coalesced steps. */
  finish(): LeafStep[] {
    this.current = 'finished';
    return coalesceRecordedSteps(this.recorded);
  }

  private onKey(event: RawKeyEvent): boolean {
    if (event.key === this.settings.stopKey) return false;

    const delay = this.nextDelay(event.time);
    this.recorded.push(
      event.char !== undefined
        ? createKeyboardStep({ action: 'Type Text', value: event.char, delay })
        : createKeyboardStep({ action: 'Press Key', value: event.key, delay }),
    );
    return true;
  }

  private onMouse(event: RawMouseEvent): boolean {
    if (event.button === 'right') {
      if (event.pressed) {
        this.rightPressedAt = event.time;
      } else if (this.rightPressedAt !== null) {
        const held = event.time - this.rightPressedAt;
        this.rightPressedAt = null;
        if (held >= this.settings.stopRightHoldSec) return false;
      }
    }

    // Releases are not recorded
    if (event.pressed) {
      const delay = this.nextDelay(event.time);
      this.recorded.push(createMouseStep({ action: 'Click', x: event.x, y: event.y, delay }));
    }
    return true;
  }

  private nextDelay(time: number): number {
    const delay = this.lastRecordedAt === null ? 0 : roundDelay(Math.max(0, time - this.lastRecordedAt));
    this.lastRecordedAt = time;
    return delay;
  }
}
