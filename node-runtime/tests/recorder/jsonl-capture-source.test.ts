import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { JsonlCaptureSource } from '../../src/recorder/jsonl-capture-source.js';
import { recordSession } from '../../src/recorder/record.js';
import type { RawInputEvent } from '../../src/recorder/raw-event.js';
import { CaptureFormatError } from '../../src/types/index.js';

async function collect(source: JsonlCaptureSource): Promise<RawInputEvent[]> {
  const events: RawInputEvent[] = [];
  for await (const event of source) events.push(event);
  return events;
}

describe('JsonlCaptureSource', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'macro-replay-capture-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('yields one event per non-blank line', async () => {
    const file = join(dir, 'capture.jsonl');
    await writeFile(
      file,
      [
        '{"kind":"key","key":"a","char":"a","time":1}',
        '',
        '{"kind":"mouse","button":"left","x":3,"y":4,"pressed":true,"time":1.5}',
        '',
      ].join('\n'),
    );

    expect(await collect(new JsonlCaptureSource(file))).toEqual([
      { kind: 'key', key: 'a', char: 'a', time: 1 },
      { kind: 'mouse', button: 'left', x: 3, y: 4, pressed: true, time: 1.5 },
    ]);
  });

  it('names the line of an invalid event', async () => {
    const file = join(dir, 'capture.jsonl');
    await writeFile(file, '{"kind":"key","key":"a","time":1}\n{"kind":"mouse","button":"left"}\n');

    const error = await collect(new JsonlCaptureSource(file)).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(CaptureFormatError);
    expect(error).toHaveProperty('line', 2);
  });

  it('rejects a line that is not JSON', async () => {
    const file = join(dir, 'capture.jsonl');
    await writeFile(file, 'garbage\n');

    await expect(collect(new JsonlCaptureSource(file))).rejects.toThrow('line 1: not valid JSON');
  });

  it('stops yielding once closed', async () => {
    const file = join(dir, 'capture.jsonl');
    await writeFile(file, '{"kind":"key","key":"a","time":1}\n{"kind":"key","key":"b","time":2}\n');
    const source = new JsonlCaptureSource(file);

    const seen: RawInputEvent[] = [];
    for await (const event of source) {
      seen.push(event);
      source.close();
    }

    expect(seen).toHaveLength(1);
  });

  it('makes recording unavailable when the file cannot be read', async () => {
    const result = await recordSession(new JsonlCaptureSource(join(dir, 'missing.jsonl')));

    expect(result.capability).toBe('unavailable');
    expect(result.steps).toEqual([]);
  });
});
