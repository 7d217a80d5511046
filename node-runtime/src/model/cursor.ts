import { setTimeout as delay } from 'node:timers/promises';
import type { AutomationDriver, Point } from '../engines/automation-driver.js';
import { CURSOR_CAPTURE_DELAY_SEC } from '../config/defaults.js';

export interface CursorCaptureOptions {
  delaySec?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Read the pointer position for a mouse step's coordinates, after giving the
 * user `delaySec` to move the pointer onto the target.
 */
export async function captureCursorPosition(
  driver: AutomationDriver,
  options: CursorCaptureOptions = {},
): Promise<Point> {
  const delaySec = options.delaySec ?? CURSOR_CAPTURE_DELAY_SEC;
  if (delaySec > 0) {
    const sleep = options.sleep ?? ((ms: number) => delay(ms));
    await sleep(delaySec * 1000);
  }
  return driver.cursorPosition();
}
