import { describe, it, expect, vi } from 'vitest';
import { WorkflowEngine, selectBranch, type EngineObserver } from '../../src/runner/workflow-engine.js';
import { StepExecutor } from '../../src/runner/step-executor.js';
import { RunSignal } from '../../src/runner/run-signal.js';
import { DryRunDriver } from '../../src/engines/dry-run-driver.js';
import type { ConditionalRecordStep, LeafStep, Step } from '../../src/types/index.js';

const click = (x: number, y: number): LeafStep => ({ type: 'mouse', action: 'Click', x, y, delay: 0 });
const press = (value: string, delay = 0): LeafStep => ({ type: 'keyboard', action: 'Press Key', value, delay });
const type = (value: string): LeafStep => ({ type: 'keyboard', action: 'Type Text', value, delay: 0 });

function setup(driver = new DryRunDriver()) {
  const engine = new WorkflowEngine(driver, new StepExecutor(driver));
  const signal = new RunSignal();
  return { driver, engine, signal };
}

function pressedKeys(driver: DryRunDriver): string[] {
  return driver.calls.flatMap((call) => (call.kind === 'pressKey' ? [call.name] : []));
}

describe('WorkflowEngine', () => {
  it('replays a click followed by a loop of typed text', async () => {
    const { driver, engine, signal } = setup();
    const stepStarts: string[] = [];
    const observer: EngineObserver = {
      stepStart: (stepId) => {
        stepStarts.push(stepId);
      },
      iteration: vi.fn(),
    };
    const workflow: Step[] = [click(10, 10), { type: 'loop', count: 2, steps: [type('hi')], delay: 0 }];

    const result = await engine.run(workflow, signal, observer);

    expect(driver.calls).toEqual([
      { kind: 'moveCursor', x: 10, y: 10, durationSec: 0.2 },
      { kind: 'click' },
      { kind: 'typeText', text: 'hi', intervalSec: 0.01 },
      { kind: 'typeText', text: 'hi', intervalSec: 0.01 },
    ]);
    expect(result.ok).toBe(true);
    expect(result.outcome).toBe('completed');
    expect(result.stepResults.map((r) => r.stepId)).toEqual(['0', '1.0', '1.0']);
    expect(stepStarts).toEqual(['0', '1', '1.0', '1.0']);
    expect(observer.iteration).toHaveBeenNthCalledWith(1, { stepId: '1', index: 1, count: 2 });
    expect(observer.iteration).toHaveBeenNthCalledWith(2, { stepId: '1', index: 2, count: 2 });
  });

  it('skips the body of a zero-count loop and moves on', async () => {
    const { driver, engine, signal } = setup();
    const workflow: Step[] = [{ type: 'loop', count: 0, steps: [click(1, 1)], delay: 0 }, press('tab')];

    const result = await engine.run(workflow, signal);

    expect(result.outcome).toBe('completed');
    expect(driver.calls).toEqual([{ kind: 'pressKey', name: 'tab' }]);
  });

  it('runs nested loops, reporting the same path for each iteration', async () => {
    const { driver, engine, signal } = setup();
    const inner: Step = { type: 'loop', count: 2, steps: [press('k')], delay: 0 };
    const workflow: Step[] = [{ type: 'loop', count: 2, steps: [inner], delay: 0 }];

    const result = await engine.run(workflow, signal);

    expect(pressedKeys(driver)).toEqual(['k', 'k', 'k', 'k']);
    expect(result.stepResults.map((r) => r.stepId)).toEqual(['0.0.0', '0.0.0', '0.0.0', '0.0.0']);
  });

  describe('conditional steps', () => {
    const conditional: ConditionalRecordStep = {
      type: 'conditional_record',
      source: 'clipboard',
      cases: [
        { value: 'WARN', steps: [press('a')] },
        { value: 'ERROR', steps: [press('b'), press('c')] },
        { value: '42', steps: [press('d')] },
      ],
      else_steps: [press('z'), press('y')],
      delay: 0,
    };

    it('runs only the first matching case', async () => {
      const { driver, engine, signal } = setup(new DryRunDriver({ clipboardText: 'Order ERROR 42' }));

      const result = await engine.run([conditional], signal);

      expect(pressedKeys(driver)).toEqual(['b', 'c']);
      expect(driver.calls.filter((call) => call.kind === 'readClipboardText')).toHaveLength(1);
      expect(result.stepResults.map((r) => r.stepId)).toEqual(['0.0', '0.1']);
    });

    it('runs the else branch once, in order, when nothing matches', async () => {
      const { driver, engine, signal } = setup(new DryRunDriver({ clipboardText: 'all good' }));

      await engine.run([conditional], signal);

      expect(pressedKeys(driver)).toEqual(['z', 'y']);
    });

    it('never matches a case with an empty value', async () => {
      const { driver, engine, signal } = setup(new DryRunDriver({ clipboardText: 'anything' }));
      const step: ConditionalRecordStep = { ...conditional, cases: [{ value: '', steps: [press('a')] }] };

      await engine.run([step], signal);

      expect(pressedKeys(driver)).toEqual(['z', 'y']);
    });

    it('treats an unreadable clipboard as empty text and warns', async () => {
      const driver = new DryRunDriver();
      vi.spyOn(driver, 'readClipboardText').mockRejectedValue(new Error('xclip is not installed'));
      const { engine, signal } = setup(driver);
      const warning = vi.fn();

      const result = await engine.run([conditional], signal, { warning });

      expect(result.outcome).toBe('completed');
      expect(pressedKeys(driver)).toEqual(['z', 'y']);
      expect(warning).toHaveBeenCalledWith('Could not read clipboard: xclip is not installed');
    });
  });

  describe('stopping', () => {
    it('ends a long delay as soon as the signal stops', async () => {
      const { driver, engine, signal } = setup();
      const observer: EngineObserver = {
        stepStart: (stepId) => {
          if (stepId === '1') setTimeout(() => signal.stop(), 10);
        },
      };
      const started = Date.now();

      const result = await engine.run([click(1, 1), press('enter', 10), press('tab')], signal, observer);

      expect(Date.now() - started).toBeLessThan(2_000);
      expect(result).toMatchObject({ ok: false, outcome: 'stopped' });
      expect(driver.calls).toEqual([{ kind: 'moveCursor', x: 1, y: 1, durationSec: 0.2 }, { kind: 'click' }]);
    });

    it('stops during the delay of a conditional sub-step', async () => {
      const { driver, engine, signal } = setup();
      const branch: ConditionalRecordStep = {
        type: 'conditional_record',
        source: 'clipboard',
        cases: [{ value: 'NEVER', steps: [press('n')] }],
        else_steps: [press('x'), press('y', 10), press('w')],
        delay: 0,
      };
      const observer: EngineObserver = {
        stepStart: (stepId) => {
          if (stepId === '0.1') setTimeout(() => signal.stop(), 10);
        },
      };

      const result = await engine.run([branch, press('after')], signal, observer);

      expect(result).toMatchObject({ ok: false, outcome: 'stopped' });
      expect(driver.calls).toEqual([{ kind: 'readClipboardText' }, { kind: 'pressKey', name: 'x' }]);
    });

    it('skips a sub-step whose delay ends because of a stop', async () => {
      const { driver, engine, signal } = setup();
      const observer: EngineObserver = {
        stepStart: (stepId) => {
          if (stepId === '0.1') signal.stop();
        },
      };
      const loop: Step = { type: 'loop', count: 2, steps: [press('a'), press('b'), press('c')], delay: 0 };

      const result = await engine.run([loop], signal, observer);

      expect(result.outcome).toBe('stopped');
      expect(pressedKeys(driver)).toEqual(['a']);
    });

    it('stops during the delay of a loop body step', async () => {
      const { driver, engine, signal } = setup();
      const iteration = vi.fn();
      const observer: EngineObserver = {
        iteration,
        stepStart: (stepId) => {
          if (stepId === '0.1') setTimeout(() => signal.stop(), 10);
        },
      };
      const loop: Step = { type: 'loop', count: 3, steps: [press('a'), press('b', 10)], delay: 0 };

      const result = await engine.run([loop, press('after')], signal, observer);

      expect(result).toMatchObject({ ok: false, outcome: 'stopped' });
      expect(iteration).toHaveBeenCalledTimes(1);
      expect(pressedKeys(driver)).toEqual(['a']);
    });

    it('does nothing when stopped before the run starts', async () => {
      const { driver, engine, signal } = setup();
      const stepStart = vi.fn();
      signal.stop();

      const result = await engine.run([click(1, 1)], signal, { stepStart });

      expect(result.outcome).toBe('stopped');
      expect(stepStart).not.toHaveBeenCalled();
      expect(driver.calls).toEqual([]);
    });

    it('checks the signal before each loop iteration', async () => {
      const { driver, engine, signal } = setup();
      const iteration = vi.fn(({ index }: { index: number }) => {
        if (index === 2) signal.stop();
      });

      await engine.run([{ type: 'loop', count: 5, steps: [press('k')], delay: 0 }], signal, { iteration });

      expect(iteration).toHaveBeenCalledTimes(2);
      expect(pressedKeys(driver)).toEqual(['k']);
    });
  });

  describe('failures', () => {
    it('halts the run after an image is not found', async () => {
      const { driver, engine, signal } = setup(new DryRunDriver({ locate: () => null }));
      const stepEnd = vi.fn();

      const result = await engine.run(
        [{ type: 'image', path: '/shots/submit.png', delay: 0 }, click(5, 5)],
        signal,
        { stepEnd },
      );

      expect(result).toMatchObject({
        ok: false,
        outcome: 'failed',
        failedAt: '0',
        errorType: 'TargetNotFound',
        message: "Image not found 'submit.png'",
      });
      expect(result.stepResults).toHaveLength(1);
      expect(stepEnd).toHaveBeenCalledTimes(1);
      expect(driver.calls).toEqual([{ kind: 'locateOnScreen', imagePath: '/shots/submit.png', confidence: 0.8 }]);
      expect(signal.stopped).toBe(true);
    });

    it('abandons the remaining loop iterations', async () => {
      const { driver, engine, signal } = setup(new DryRunDriver({ locate: () => null }));

      const result = await engine.run(
        [{ type: 'loop', count: 3, steps: [{ type: 'image', path: 'a.png', delay: 0 }], delay: 0 }],
        signal,
      );

      expect(result.failedAt).toBe('0.0');
      expect(driver.calls).toHaveLength(1);
    });
  });
});

describe('selectBranch', () => {
  const step: ConditionalRecordStep = {
    type: 'conditional_record',
    source: 'clipboard',
    cases: [
      { value: 'x', steps: [press('1')] },
      { value: 'xy', steps: [press('2')] },
    ],
    else_steps: [press('3')],
    delay: 0,
  };

  it('uses substring containment in case order', () => {
    expect(selectBranch(step, 'axyz')).toBe(step.cases[0].steps);
    expect(selectBranch(step, 'abc')).toBe(step.else_steps);
    expect(selectBranch(step, '')).toBe(step.else_steps);
  });
});
