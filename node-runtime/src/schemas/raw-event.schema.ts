import { z } from 'zod';

export const RawKeyEventSchema = z.object({
  kind: z.literal('key'),
  key: z.string().min(1),
  char: z.string().length(1).optional(),
  time: z.number().finite(),
});

export const RawMouseEventSchema = z.object({
  kind: z.literal('mouse'),
  button: z.enum(['left', 'right', 'middle']),
  x: z.number().int(),
  y: z.number().int(),
  pressed: z.boolean(),
  time: z.number().finite(),
});

export const RawInputEventSchema = z.discriminatedUnion('kind', [
  RawKeyEventSchema,
  RawMouseEventSchema,
]);
