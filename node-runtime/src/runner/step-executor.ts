import { basename } from 'node:path';
import type {
  ImageStep,
  KeyboardStep,
  LeafStep,
  MouseStep,
  StepResult,
} from '../types/index.js';
import type { AutomationDriver } from '../engines/automation-driver.js';
import { DEFAULT_EXECUTION, type ExecutionSettings } from '../config/defaults.js';
import { classifyError, extractMessage } from '../exception/classifier.js';

/** Runs one leaf step against the driver. Never retries. */
export class StepExecutor {
  constructor(
    private driver: AutomationDriver,
    private settings: ExecutionSettings = DEFAULT_EXECUTION,
  ) {}

  async execute(step: LeafStep, stepId: string): Promise<StepResult> {
    const start = Date.now();

    try {
      const result = await this.executeOp(step, stepId);
      return { ...result, durationMs: Date.now() - start };
    } catch (error) {
      return {
        stepId,
        ok: false,
        errorType: classifyError(error),
        message: this.failureMessage(step, stepId, error),
        durationMs: Date.now() - start,
      };
    }
  }

  private async executeOp(step: LeafStep, stepId: string): Promise<StepResult> {
    switch (step.type) {
      case 'mouse':
        return this.executeMouse(step, stepId);
      case 'keyboard':
        return this.executeKeyboard(step, stepId);
      case 'image':
        return this.executeImage(step, stepId);
    }
  }

  private async executeMouse(step: MouseStep, stepId: string): Promise<StepResult> {
    await this.driver.moveCursor(step.x, step.y, this.settings.mouseMoveDurationSec);
    switch (step.action) {
      case 'Click':
        await this.driver.click();
        break;
      case 'Right Click':
        await this.driver.rightClick();
        break;
      case 'Hold':
        await this.driver.hold();
        break;
      case 'Release':
        await this.driver.release();
        break;
    }
    return { stepId, ok: true };
  }

  private async executeKeyboard(step: KeyboardStep, stepId: string): Promise<StepResult> {
    switch (step.action) {
      case 'Type Text':
        await this.driver.typeText(step.value, this.settings.typeIntervalSec);
        break;
      case 'Press Key':
        await this.driver.pressKey(step.value);
        break;
      case 'Hotkey':
        await this.driver.sendHotkey(...parseHotkey(step.value));
        break;
    }
    return { stepId, ok: true };
  }

  private async executeImage(step: ImageStep, stepId: string): Promise<StepResult> {
    const location = await this.driver.locateOnScreen(step.path, this.settings.imageConfidence);
    if (!location) {
      return {
        stepId,
        ok: false,
        errorType: 'TargetNotFound',
        message: `Image not found '${basename(step.path)}'`,
      };
    }

    await this.driver.moveCursor(location.x, location.y, 0);
    await this.driver.click();
    return { stepId, ok: true };
  }

  private failureMessage(step: LeafStep, stepId: string, error: unknown): string {
    if (step.type === 'image') {
      return `Image search error for '${basename(step.path)}': ${extractMessage(error)}`;
    }
    return `Automation error at step ${stepId}: ${extractMessage(error)}`;
  }
}

/** `"ctrl + shift+t"` → `['ctrl', 'shift', 't']` */
export function parseHotkey(value: string): string[] {
  return value
    .split('+')
    .map((key) => key.trim())
    .filter((key) => key.length > 0);
}
