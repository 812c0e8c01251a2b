import { z } from 'zod';

const identifier = z.string().trim().min(1);
const contextSchema = z.record(z.string(), z.unknown());

/** Wire shape of an evaluation request for hosts that receive JSON. */
export const evaluationRequestSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('transition'),
    contract: identifier,
    entity: identifier,
    from: identifier,
    to: identifier,
    guardContext: contextSchema.optional(),
  }),
  z.object({
    kind: z.literal('dependency'),
    contract: identifier,
    source: identifier,
    target: identifier,
  }),
  z.object({
    kind: z.literal('generic'),
    contract: identifier,
    predicateInput: contextSchema,
  }),
]);
