import { z } from 'zod';

const identifier = z.string().trim().min(1);

const severitySchema = z.enum(['block', 'warn']).default('block');

const transitionListSchema = z.array(
  z.object({
    from: identifier,
    to: identifier,
    guard: identifier.optional(),
  })
);

/** `{ "pending": ["paid"], "paid": [] }`: source state to target states. */
const transitionTableSchema = z.record(identifier, z.array(identifier));

const machineSchema = z.object({
  states: z.array(identifier),
  initial: identifier,
  terminal: z.array(identifier).default([]),
  transitions: z.union([transitionListSchema, transitionTableSchema]),
});

const graphSchema = z.object({
  layers: z.record(identifier, identifier),
  allowedEdges: z.array(z.tuple([identifier, identifier])),
  modules: z.array(identifier).optional(),
});

const ruleBase = {
  id: identifier,
  severity: severitySchema,
  description: z.string().optional(),
};

const ruleSchema = z.discriminatedUnion('type', [
  z.object({
    ...ruleBase,
    type: z.literal('state_transition'),
    entity: identifier,
    machine: machineSchema,
  }),
  z.object({
    ...ruleBase,
    type: z.literal('layer_dependency'),
    graph: graphSchema,
  }),
  z.object({
    ...ruleBase,
    type: z.literal('generic_predicate'),
    predicate: identifier,
  }),
]);

export const contractDocumentSchema = z.object({
  schemaVersion: z.string().regex(/^\d+\.\d+\.\d+$/, 'must be MAJOR.MINOR.PATCH'),
  name: identifier,
  rules: z.array(ruleSchema),
});

export type ContractDocument = z.infer<typeof contractDocumentSchema>;
export type RuleDocument = z.infer<typeof ruleSchema>;
export type MachineDocument = z.infer<typeof machineSchema>;
