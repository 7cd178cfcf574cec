// server/src/simulation/simulationConfig.ts

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { SimulationConfig } from './types.js';

export const MAX_ITERATIONS = 200_000;

const segmentWeight = z.number().positive().max(5);

/** YYYY-MM-DD naming a real day; 2024-02-30 and 2024-13-01 are rejected. */
export const calendarDate = z.string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
  .refine(value => {
    const ms = Date.parse(`${value}T00:00:00Z`);
    return !Number.isNaN(ms) && new Date(ms).toISOString().slice(0, 10) === value;
  }, 'not a calendar date');

export const simulationConfigSchema = z.object({
  homeTeamId: z.number().int().positive(),
  awayTeamId: z.number().int().positive(),
  iterationCount: z.number().int().min(1).max(MAX_ITERATIONS).default(10_000),
  randomSeed: z.number().int().min(0).max(0xFFFFFFFF).optional(),
  features: z.object({
    synergy: z.boolean().default(true),
    clutch: z.boolean().default(true),
    fatigue: z.boolean().default(true),
    momentum: z.boolean().default(true),
    segmentWeights: z.boolean().default(true)
  }).strict().default({}),
  segmentWeights: z.object({
    early: segmentWeight.default(0.9),
    mid: segmentWeight.default(1.0),
    late: segmentWeight.default(1.1),
    overtime: segmentWeight.default(1.2)
  }).strict().default({})
}).strict();

export type SimulationConfigInput = z.input<typeof simulationConfigSchema>;

/** Validate one run's configuration; missing toggles and weights take their defaults. */
export function parseSimulationConfig(raw: unknown): SimulationConfig {
  const parsed = simulationConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Simulation configuration is invalid',
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  if (parsed.data.homeTeamId === parsed.data.awayTeamId) {
    throw new ConfigurationError('Simulation configuration is invalid', ['awayTeamId: must differ from homeTeamId']);
  }
  return Object.freeze(parsed.data);
}
