import { CapabilityUnavailableError, type LeafStep } from '../types/index.js';
import type { RecorderSettings } from '../config/defaults.js';
import { RecordingSession } from './session.js';
import type { RawInputEvent } from './raw-event.js';

/**
 * A stream of raw input events from a global input hook. Iteration throws
 * `CapabilityUnavailableError` when the hook cannot start.
 */
export interface InputCaptureSource extends AsyncIterable<RawInputEvent> {
  close(): void | Promise<void>;
}

export type RecordingResult =
  | { capability: 'available'; steps: LeafStep[] }
  | { capability: 'unavailable'; steps: LeafStep[]; reason: string };

export interface RecordOptions {
  settings?: RecorderSettings;
}

/**
 * Record until the stop gesture or the end of the source, then coalesce.
 * A missing or unavailable source yields an empty, `unavailable` result.
 */
export async function recordSession(
  source: InputCaptureSource | null,
  options: RecordOptions = {},
): Promise<RecordingResult> {
  if (!source) {
    return { capability: 'unavailable', steps: [], reason: 'No input capture source' };
  }

  const session = new RecordingSession(options.settings);
  try {
    for await (const event of source) {
      if (!session.push(event)) break;
    }
  } catch (error) {
    if (error instanceof CapabilityUnavailableError) {
      return { capability: 'unavailable', steps: [], reason: error.message };
    }
    throw error;
  } finally {
    await source.close();
  }

  return { capability: 'available', steps: session.finish() };
}
