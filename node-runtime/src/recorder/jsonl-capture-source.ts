import { readFile } from 'node:fs/promises';
import { RawInputEventSchema } from '../schemas/raw-event.schema.js';
import { CapabilityUnavailableError, CaptureFormatError } from '../types/index.js';
import { extractMessage } from '../exception/classifier.js';
import type { InputCaptureSource } from './record.js';
import type { RawInputEvent } from './raw-event.js';

/**
 * Replays raw input events from a JSONL file written by an external input
 * hook, one event object per line. Blank lines are skipped.
 */
export class JsonlCaptureSource implements InputCaptureSource {
  private closed = false;

  constructor(private filePath: string) {}

  async *[Symbol.asyncIterator](): AsyncGenerator<RawInputEvent> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw new CapabilityUnavailableError(
        `Cannot read capture file ${this.filePath}: ${extractMessage(error)}`,
      );
    }

    const lines = content.split('\n');
    for (let i = 0; i < lines.length; i++) {
      if (this.closed) return;
      const line = lines[i].trim();
      if (line === '') continue;
      yield parseLine(line, i + 1);
    }
  }

  close(): void {
    this.closed = true;
  }
}

function parseLine(line: string, lineNumber: number): RawInputEvent {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    throw new CaptureFormatError(lineNumber, 'not valid JSON');
  }

  const parsed = RawInputEventSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new CaptureFormatError(lineNumber, `${where}${issue.message}`);
  }
  return parsed.data;
}
