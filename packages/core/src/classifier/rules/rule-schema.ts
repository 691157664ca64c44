/**
 * Zod schemas for rule files
 */

import { z } from 'zod';

import type { Predicate, PortRange } from './types.js';

export const SeveritySchema = z.enum(['low', 'medium', 'high', 'critical']);

export const ConnectionStateSchema = z.enum([
  'established',
  'listen',
  'syn-sent',
  'syn-received',
  'fin-wait-1',
  'fin-wait-2',
  'time-wait',
  'close-wait',
  'last-ack',
  'closing',
  'closed',
]);

export const LocalitySchema = z.enum(['loopback', 'private', 'public', 'listen-only']);

const Port = z.number().int().min(0).max(65535);

const PortRangeSchema: z.ZodType<PortRange> = z
  .object({ min: Port.optional(), max: Port.optional() })
  .strict()
  .refine((range) => range.min !== undefined || range.max !== undefined, {
    message: 'port range needs min, max or both',
  })
  .refine((range) => range.min === undefined || range.max === undefined || range.min <= range.max, {
    message: 'min must not exceed max',
  });

export const PredicateSchema: z.ZodType<Predicate> = z.lazy(() =>
  z.union([
    z.object({ all: z.array(PredicateSchema).min(1) }).strict(),
    z.object({ any: z.array(PredicateSchema).min(1) }).strict(),
    z.object({ not: PredicateSchema }).strict(),
    z.object({ state: z.object({ in: z.array(ConnectionStateSchema).min(1) }).strict() }).strict(),
    z.object({ protocol: z.object({ is: z.enum(['tcp', 'udp']) }).strict() }).strict(),
    z.object({ remotePort: PortRangeSchema }).strict(),
    z.object({ localPort: PortRangeSchema }).strict(),
    z.object({ locality: z.object({ in: z.array(LocalitySchema).min(1) }).strict() }).strict(),
    z
      .object({
        repetition: z
          .object({ min: z.number().int().min(1), state: z.array(ConnectionStateSchema).min(1).optional() })
          .strict(),
      })
      .strict(),
    z.object({ process: z.object({ known: z.boolean() }).strict() }).strict(),
  ])
);

export const RuleSchema = z.object({
  id: z.string().regex(/^[a-z0-9][a-z0-9_-]*$/, 'rule id must be lowercase letters, digits, - or _'),
  name: z.string().min(1),
  description: z.string().default(''),
  severity: SeveritySchema,
  tags: z.array(z.string().min(1)).default([]),
  match: PredicateSchema,
});

/**
 * Outer shape only; rules are validated one by one so that a single bad
 * rule does not take the rest down with it
 */
export const RuleSetEnvelopeSchema = z.object({
  version: z.number().int().positive(),
  rules: z.array(z.unknown()),
});
