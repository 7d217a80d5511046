import type { z } from 'zod';
import type {
  RawInputEventSchema,
  RawKeyEventSchema,
  RawMouseEventSchema,
} from '../schemas/raw-event.schema.js';

/** Key press. `char` is set for printable single characters; `time` is in seconds. */
export type RawKeyEvent = z.infer<typeof RawKeyEventSchema>;

/** Button press or release at screen coordinates. */
export type RawMouseEvent = z.infer<typeof RawMouseEventSchema>;

export type RawInputEvent = z.infer<typeof RawInputEventSchema>;
