// src/config.ts
// zod schemas for session options and the process environment.

import * as z from 'zod';
import { InvalidInputError } from './errors';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

export const envConfigSchema = z.object({
  SWISS_DATABASE_URL: z.string().min(1).default('file:tournament.db'),
  SWISS_DATABASE_AUTH_TOKEN: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  DEBUG: z.string().optional(),
});

export type EnvConfig = z.infer<typeof envConfigSchema>;

export const pairingConfigSchema = z.object({
  /** Search for a rematch-free pairing when the greedy walk dead-ends. */
  backtrack: z.boolean().default(false),
  maxBacktrack: z.number().int().positive().default(10_000),
  /** Shuffle equal-score players, seeded by tournament id and round. */
  shuffleScoreGroups: z.boolean().default(false),
});

export type PairingConfig = z.infer<typeof pairingConfigSchema>;

export const sessionConfigSchema = z.object({
  tournamentId: z.string().min(1),
  /** Defaults to recommendedRounds(player count) at start(). */
  rounds: z.number().int().nonnegative().optional(),
  pairing: pairingConfigSchema.default({}),
});

export type SessionConfigInput = z.input<typeof sessionConfigSchema>;
export type SessionConfig = z.output<typeof sessionConfigSchema>;

export const playerInputSchema = z.object({
  name: z.string().trim().min(1),
  id: z.string().min(1).optional(),
});

export type PlayerInput = z.input<typeof playerInputSchema>;

function issuesOf(err: z.ZodError): string[] {
  return err.issues.map(i => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message));
}

/** Parses with `schema`, turning validation failures into InvalidInputError. */
export function parseOrThrow<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  what: string,
): z.output<S> {
  const res = schema.safeParse(value);
  if (!res.success) throw new InvalidInputError(`Invalid ${what}`, issuesOf(res.error));
  return res.data;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  return parseOrThrow(envConfigSchema, env, 'environment');
}
