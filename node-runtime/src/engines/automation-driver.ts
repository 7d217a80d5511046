export interface Point {
  x: number;
  y: number;
}

/**
 * OS input and screen capabilities the engine drives. Implementations throw
 * `TargetNotFoundError` or `AutomationCapabilityError` on failure.
 */
export interface AutomationDriver {
  moveCursor(x: number, y: number, durationSec: number): Promise<void>;
  click(): Promise<void>;
  rightClick(): Promise<void>;
  /** Press the primary button and keep it down. */
  hold(): Promise<void>;
  release(): Promise<void>;
  typeText(text: string, intervalSec: number): Promise<void>;
  pressKey(name: string): Promise<void>;
  sendHotkey(...keys: string[]): Promise<void>;
  /** Center of the best on-screen match for the image file, or `null`. */
  locateOnScreen(imagePath: string, confidence: number): Promise<Point | null>;
  /** Current pointer position in screen coordinates. */
  cursorPosition(): Promise<Point>;
  /** Clipboard text; empty when the clipboard holds no text. */
  readClipboardText(): Promise<string>;
}
