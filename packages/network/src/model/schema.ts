import { z } from 'zod';
import { ACTIVATION_NAMES, INITIALIZATION_SCHEMES } from '../layer/types.js';
import { resolveLayerConfig } from '../layer/Layer.js';
import type { ResolvedLayerConfig } from '../layer/types.js';

/**
 * Zod schemas for persisted models
 * A decoded model is fully typed; any structural mismatch is rejected.
 */

export const MODEL_VERSION = 1;

// =============================================================================
// Layer Config
// =============================================================================

export const LayerConfigSchema = z
  .object({
    inputs: z.number().int().positive(),
    outputs: z.number().int().positive(),
    activation: z.enum(ACTIVATION_NAMES).optional(),
    learningRate: z.number().positive().max(1).optional(),
    initialization: z.enum(INITIALIZATION_SCHEMES).optional(),
  })
  .strict();

// =============================================================================
// Numbers
// =============================================================================

// JSON has no NaN or Infinity; a diverged run stores them by name
export const NON_FINITE_NAMES = ['NaN', 'Infinity', '-Infinity'] as const;

const StoredNumberSchema = z.union([
  z.number(),
  z.enum(NON_FINITE_NAMES).transform((name) => Number(name)),
]);

// =============================================================================
// Durations
// =============================================================================

// [d.]hh:mm:ss[.fffffff], as written by older model files
const TIMESPAN_PATTERN = /^(?:(\d+)\.)?(\d{1,2}):(\d{2}):(\d{2})(?:\.(\d{1,7}))?$/;

export function parseTimeSpan(value: string): number | null {
  const match = TIMESPAN_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  const [, days = '0', hours, minutes, seconds, fraction = ''] = match;
  const wholeSeconds =
    ((Number(days) * 24 + Number(hours)) * 60 + Number(minutes)) * 60 + Number(seconds);
  const ticks = Number(fraction.padEnd(7, '0'));
  return wholeSeconds * 1000 + ticks / 10_000;
}

const DurationSchema = z.union([
  z.number().nonnegative(),
  z.string().transform((value, ctx) => {
    const ms = parseTimeSpan(value);
    if (ms === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid duration '${value}', expected milliseconds or hh:mm:ss.fffffff`,
      });
      return z.NEVER;
    }
    return ms;
  }),
]);

// =============================================================================
// Model
// =============================================================================

const LayerParametersSchema = z
  .object({
    config: LayerConfigSchema,
    weights: z.array(z.array(StoredNumberSchema)),
  })
  .strict()
  .superRefine(({ config, weights }, ctx) => {
    if (weights.length !== config.outputs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['weights'],
        message: `Expected ${config.outputs} weight rows, got ${weights.length}`,
      });
      return;
    }
    weights.forEach((row, r) => {
      if (row.length !== config.inputs + 1) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['weights', r],
          message: `Expected ${config.inputs + 1} weights, got ${row.length}`,
        });
      }
    });
  });

export const PersistedModelSchema = z
  .object({
    version: z.literal(MODEL_VERSION).optional(),
    // null is what older encoders wrote for NaN
    lastError: StoredNumberSchema.nullable(),
    lastLearningTime: DurationSchema.optional(),
    lastTime: DurationSchema.optional(),
    parameters: z.array(LayerParametersSchema).min(1, 'At least one layer is required'),
  })
  .strict()
  .superRefine(({ parameters }, ctx) => {
    for (let i = 1; i < parameters.length; i++) {
      const expected = parameters[i - 1].config.outputs;
      if (parameters[i].config.inputs !== expected) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['parameters', i, 'config', 'inputs'],
          message: `Layer ${i} takes ${parameters[i].config.inputs} inputs but layer ${i - 1} produces ${expected}`,
        });
      }
    }
  })
  .transform((model): PersistedModel => ({
    version: MODEL_VERSION,
    lastError: model.lastError ?? Number.NaN,
    lastLearningTime: model.lastLearningTime ?? model.lastTime ?? 0,
    parameters: model.parameters.map(({ config, weights }) => ({
      config: resolveLayerConfig(config),
      weights,
    })),
  }));

// =============================================================================
// Types
// =============================================================================

export interface LayerParameters {
  config: ResolvedLayerConfig;
  weights: number[][];
}

export interface PersistedModel {
  version: typeof MODEL_VERSION;
  /** Cost of the last training run; NaN or Infinity if it diverged */
  lastError: number;
  /** Duration of the last training run in ms */
  lastLearningTime: number;
  parameters: LayerParameters[];
}
