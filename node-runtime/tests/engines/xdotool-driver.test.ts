import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { XdotoolDriver, type CommandRunner } from '../../src/engines/xdotool-driver.js';
import { AutomationCapabilityError } from '../../src/types/index.js';
import { createPNGWithRect } from '../helpers/png.js';

function mockExec(stdoutFor: (file: string, args: readonly string[]) => string | Buffer = () => '') {
  return vi.fn<CommandRunner>(async (file, args) => {
    const out = stdoutFor(file, args);
    return { stdout: typeof out === 'string' ? Buffer.from(out) : out };
  });
}

function enoent(file: string): Error {
  return Object.assign(new Error(`spawn ${file} ENOENT`), { code: 'ENOENT' });
}

describe('XdotoolDriver', () => {
  it('clicks, holds and releases through xdotool', async () => {
    const exec = mockExec();
    const driver = new XdotoolDriver({ exec });

    await driver.click();
    await driver.rightClick();
    await driver.hold();
    await driver.release();

    expect(exec.mock.calls).toEqual([
      ['xdotool', ['click', '1']],
      ['xdotool', ['click', '3']],
      ['xdotool', ['mousedown', '1']],
      ['xdotool', ['mouseup', '1']],
    ]);
  });

  it('jumps straight to the target for a zero-duration move', async () => {
    const exec = mockExec();
    const driver = new XdotoolDriver({ exec });

    await driver.moveCursor(300, 400, 0);

    expect(exec).toHaveBeenCalledTimes(1);
    expect(exec).toHaveBeenCalledWith('xdotool', ['mousemove', '300', '400']);
  });

  it('interpolates a timed move from the current pointer position', async () => {
    const exec = mockExec((_file, args) =>
      args[0] === 'getmouselocation' ? 'X=10\nY=20\nSCREEN=0\nWINDOW=123\n' : '',
    );
    const sleep = vi.fn(async (_ms: number) => {});
    const driver = new XdotoolDriver({ exec, sleep });

    await driver.moveCursor(100, 50, 0.06);

    expect(exec.mock.calls.map(([, args]) => args)).toEqual([
      ['getmouselocation', '--shell'],
      ['mousemove', '40', '30'],
      ['mousemove', '70', '40'],
      ['mousemove', '100', '50'],
    ]);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(20);
  });

  it('reads the pointer position', async () => {
    const exec = mockExec(() => 'X=-4\nY=310\nSCREEN=0\nWINDOW=9\n');
    const driver = new XdotoolDriver({ exec });

    await expect(driver.cursorPosition()).resolves.toEqual({ x: -4, y: 310 });
    expect(exec).toHaveBeenCalledWith('xdotool', ['getmouselocation', '--shell']);
  });

  it('types text with a per-character delay', async () => {
    const exec = mockExec();
    const driver = new XdotoolDriver({ exec });

    await driver.typeText('--hi', 0.01);

    expect(exec).toHaveBeenCalledWith('xdotool', ['type', '--delay', '10', '--', '--hi']);
  });

  it('maps key names to keysyms', async () => {
    const exec = mockExec();
    const driver = new XdotoolDriver({ exec });

    await driver.pressKey('enter');
    await driver.pressKey('f5');
    await driver.sendHotkey('ctrl', 'shift', 'esc');

    expect(exec.mock.calls.map(([, args]) => args)).toEqual([
      ['key', '--', 'Return'],
      ['key', '--', 'F5'],
      ['key', '--', 'ctrl+shift+Escape'],
    ]);
  });

  it('rejects a hotkey without keys', async () => {
    const driver = new XdotoolDriver({ exec: mockExec() });
    await expect(driver.sendHotkey()).rejects.toBeInstanceOf(AutomationCapabilityError);
  });

  it('reports a missing xdotool binary as a capability error', async () => {
    const exec = vi.fn<CommandRunner>().mockRejectedValue(enoent('xdotool'));
    const driver = new XdotoolDriver({ exec });

    await expect(driver.click()).rejects.toThrow(new AutomationCapabilityError('xdotool is not installed'));
  });

  it('wraps other command failures with the subcommand', async () => {
    const exec = vi.fn<CommandRunner>().mockRejectedValue(new Error('Command failed'));
    const driver = new XdotoolDriver({ exec });

    await expect(driver.click()).rejects.toThrow('xdotool click failed: Command failed');
  });

  describe('readClipboardText', () => {
    it('returns the clipboard contents', async () => {
      const exec = mockExec(() => 'ORDER-42');
      const driver = new XdotoolDriver({ exec });

      await expect(driver.readClipboardText()).resolves.toBe('ORDER-42');
      expect(exec).toHaveBeenCalledWith('xclip', ['-selection', 'clipboard', '-o']);
    });

    it('reads an empty clipboard as empty text', async () => {
      const exec = vi.fn<CommandRunner>().mockRejectedValue(new Error('Error: target STRING not available'));
      const driver = new XdotoolDriver({ exec });

      await expect(driver.readClipboardText()).resolves.toBe('');
    });

    it('fails when xclip is missing', async () => {
      const exec = vi.fn<CommandRunner>().mockRejectedValue(enoent('xclip'));
      const driver = new XdotoolDriver({ exec });

      await expect(driver.readClipboardText()).rejects.toBeInstanceOf(AutomationCapabilityError);
    });
  });

  describe('locateOnScreen', () => {
    let dir: string;

    beforeAll(async () => {
      dir = await mkdtemp(join(tmpdir(), 'macro-replay-locate-'));
    });

    afterAll(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('returns the center of the template on the captured screen', async () => {
      const templatePath = join(dir, 'button.png');
      await writeFile(templatePath, createPNGWithRect(4, 4, { r: 0, g: 0, b: 255 }));
      const screen = createPNGWithRect(
        16,
        12,
        { r: 255, g: 255, b: 255 },
        { x: 6, y: 3, w: 4, h: 4, r: 0, g: 0, b: 255 },
      );
      const exec = mockExec((file) => (file === 'import' ? screen : ''));
      const driver = new XdotoolDriver({ exec });

      await expect(driver.locateOnScreen(templatePath, 0.8)).resolves.toEqual({ x: 8, y: 5 });
      expect(exec).toHaveBeenCalledWith('import', ['-window', 'root', 'png:-']);
    });

    it('returns null when the template file does not exist', async () => {
      const exec = mockExec();
      const driver = new XdotoolDriver({ exec });

      await expect(driver.locateOnScreen(join(dir, 'missing.png'), 0.8)).resolves.toBeNull();
      expect(exec).not.toHaveBeenCalled();
    });

    it('rejects a template that is not a PNG', async () => {
      const templatePath = join(dir, 'notes.png');
      await writeFile(templatePath, 'plain text');
      const driver = new XdotoolDriver({ exec: mockExec() });

      await expect(driver.locateOnScreen(templatePath, 0.8)).rejects.toBeInstanceOf(AutomationCapabilityError);
    });
  });
});
