import type { AutomationDriver, Point } from './automation-driver.js';

export type DriverCall =
  | { kind: 'moveCursor'; x: number; y: number; durationSec: number }
  | { kind: 'click' }
  | { kind: 'rightClick' }
  | { kind: 'hold' }
  | { kind: 'release' }
  | { kind: 'typeText'; text: string; intervalSec: number }
  | { kind: 'pressKey'; name: string }
  | { kind: 'sendHotkey'; keys: string[] }
  | { kind: 'locateOnScreen'; imagePath: string; confidence: number }
  | { kind: 'cursorPosition' }
  | { kind: 'readClipboardText' };

export interface DryRunDriverOptions {
  clipboardText?: string;
  /** Reported pointer position, updated by `moveCursor`. Defaults to the origin. */
  cursor?: Point;
  /** Defaults to every image being visible at the screen origin. */
  locate?: (imagePath: string, confidence: number) => Point | null;
  onCall?: (call: DriverCall) => void;
}

/** Records what a run would do without touching the OS. */
export class DryRunDriver implements AutomationDriver {
  readonly calls: DriverCall[] = [];
  clipboardText: string;
  cursor: Point;
  private locate: (imagePath: string, confidence: number) => Point | null;
  private onCall?: (call: DriverCall) => void;

  constructor(options: DryRunDriverOptions = {}) {
    this.clipboardText = options.clipboardText ?? '';
    this.cursor = options.cursor ?? { x: 0, y: 0 };
    this.locate = options.locate ?? (() => ({ x: 0, y: 0 }));
    this.onCall = options.onCall;
  }

  async moveCursor(x: number, y: number, durationSec: number): Promise<void> {
    this.record({ kind: 'moveCursor', x, y, durationSec });
    this.cursor = { x, y };
  }

  async click(): Promise<void> {
    this.record({ kind: 'click' });
  }

  async rightClick(): Promise<void> {
    this.record({ kind: 'rightClick' });
  }

  async hold(): Promise<void> {
    this.record({ kind: 'hold' });
  }

  async release(): Promise<void> {
    this.record({ kind: 'release' });
  }

  async typeText(text: string, intervalSec: number): Promise<void> {
    this.record({ kind: 'typeText', text, intervalSec });
  }

  async pressKey(name: string): Promise<void> {
    this.record({ kind: 'pressKey', name });
  }

  async sendHotkey(...keys: string[]): Promise<void> {
    this.record({ kind: 'sendHotkey', keys });
  }

  async locateOnScreen(imagePath: string, confidence: number): Promise<Point | null> {
    this.record({ kind: 'locateOnScreen', imagePath, confidence });
    return this.locate(imagePath, confidence);
  }

  async cursorPosition(): Promise<Point> {
    this.record({ kind: 'cursorPosition' });
    return { ...this.cursor };
  }

  async readClipboardText(): Promise<string> {
    this.record({ kind: 'readClipboardText' });
    return this.clipboardText;
  }

  private record(call: DriverCall): void {
    this.calls.push(call);
    this.onCall?.(call);
  }
}
