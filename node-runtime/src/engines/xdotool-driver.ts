import { execFile } from 'node:child_process';
import { readFile } from 'node:fs/promises';
import { setTimeout as delay } from 'node:timers/promises';
import { AutomationCapabilityError } from '../types/index.js';
import { extractMessage } from '../exception/classifier.js';
import type { AutomationDriver, Point } from './automation-driver.js';
import { CVEngine } from './cv-engine.js';
import { toKeysym } from './key-names.js';

export interface CommandResult {
  stdout: Buffer;
}

export type CommandRunner = (file: string, args: readonly string[]) => Promise<CommandResult>;

export interface XdotoolDriverOptions {
  exec?: CommandRunner;
  sleep?: (ms: number) => Promise<void>;
  cv?: CVEngine;
}

const MOVE_TICK_MS = 20;

export const execCommand: CommandRunner = (file, args) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      [...args],
      { encoding: 'buffer', maxBuffer: 256 * 1024 * 1024 },
      (error, stdout) => {
        if (error) reject(error);
        else resolve({ stdout });
      },
    );
  });

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * X11 backend: input through `xdotool`, clipboard through `xclip`, screen
 * capture through ImageMagick `import`.
 */
export class XdotoolDriver implements AutomationDriver {
  private exec: CommandRunner;
  private sleep: (ms: number) => Promise<void>;
  private cv: CVEngine;

  constructor(options: XdotoolDriverOptions = {}) {
    this.exec = options.exec ?? execCommand;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.cv = options.cv ?? new CVEngine();
  }

  async moveCursor(x: number, y: number, durationSec: number): Promise<void> {
    const ticks = Math.round((durationSec * 1000) / MOVE_TICK_MS);
    if (ticks <= 1) {
      await this.xdotool('mousemove', String(x), String(y));
      return;
    }

    const from = await this.cursorPosition();
    for (let i = 1; i <= ticks; i++) {
      const px = Math.round(from.x + ((x - from.x) * i) / ticks);
      const py = Math.round(from.y + ((y - from.y) * i) / ticks);
      await this.xdotool('mousemove', String(px), String(py));
      if (i < ticks) await this.sleep(MOVE_TICK_MS);
    }
  }

  async click(): Promise<void> {
    await this.xdotool('click', '1');
  }

  async rightClick(): Promise<void> {
    await this.xdotool('click', '3');
  }

  async hold(): Promise<void> {
    await this.xdotool('mousedown', '1');
  }

  async release(): Promise<void> {
    await this.xdotool('mouseup', '1');
  }

  async typeText(text: string, intervalSec: number): Promise<void> {
    await this.xdotool('type', '--delay', String(Math.round(intervalSec * 1000)), '--', text);
  }

  async pressKey(name: string): Promise<void> {
    await this.xdotool('key', '--', toKeysym(name));
  }

  async sendHotkey(...keys: string[]): Promise<void> {
    if (keys.length === 0) {
      throw new AutomationCapabilityError('Hotkey has no keys');
    }
    await this.xdotool('key', '--', keys.map(toKeysym).join('+'));
  }

  async locateOnScreen(imagePath: string, confidence: number): Promise<Point | null> {
    let templateData: Buffer;
    try {
      templateData = await readFile(imagePath);
    } catch (error) {
      if (isNotFound(error)) return null;
      throw new AutomationCapabilityError(`Cannot read ${imagePath}: ${extractMessage(error)}`, { cause: error });
    }

    const template = this.cv.decodePNG(templateData);
    if (!template) {
      throw new AutomationCapabilityError(`${imagePath} is not an 8-bit PNG image`);
    }

    const { stdout } = await this.run('import', ['-window', 'root', 'png:-']);
    const screen = this.cv.decodePNG(stdout);
    if (!screen) {
      throw new AutomationCapabilityError('Screen capture did not produce a readable PNG');
    }

    const match = this.cv.match(screen, template, confidence);
    return match ? { x: match.x, y: match.y } : null;
  }

  async readClipboardText(): Promise<string> {
    try {
      const { stdout } = await this.exec('xclip', ['-selection', 'clipboard', '-o']);
      return stdout.toString('utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        throw new AutomationCapabilityError('xclip is not installed', { cause: error });
      }
      // xclip exits non-zero when the clipboard holds no text
      return '';
    }
  }

  async cursorPosition(): Promise<Point> {
    const { stdout } = await this.xdotool('getmouselocation', '--shell');
    const text = stdout.toString('utf-8');
    const x = /^X=(-?\d+)$/m.exec(text);
    const y = /^Y=(-?\d+)$/m.exec(text);
    if (!x || !y) {
      throw new AutomationCapabilityError(`Unexpected getmouselocation output: ${text.trim()}`);
    }
    return { x: Number(x[1]), y: Number(y[1]) };
  }

  private xdotool(...args: string[]): Promise<CommandResult> {
    return this.run('xdotool', args);
  }

  private async run(file: string, args: readonly string[]): Promise<CommandResult> {
    try {
      return await this.exec(file, args);
    } catch (error) {
      if (isNotFound(error)) {
        throw new AutomationCapabilityError(`${file} is not installed`, { cause: error });
      }
      throw new AutomationCapabilityError(`${file} ${args[0] ?? ''} failed: ${extractMessage(error)}`, {
        cause: error,
      });
    }
  }
}
