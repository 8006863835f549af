/**
 * Network Configuration Types
 *
 * Static description of a perceptron and its training run, loaded from YAML.
 */

import { z } from 'zod';
import { ACTIVATION_NAMES, INITIALIZATION_SCHEMES } from '../layer/types.js';
import { DEFAULT_THRESHOLD } from '../network/types.js';
import { LOG_LEVELS } from '../utils/logger.js';

// Substituted variables arrive as strings; only numeric fields read them as numbers
const NUMERIC_PATTERN = /^-?\d+(\.\d+)?([eE][-+]?\d+)?$/;

function numeric<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(
    (value) => (typeof value === 'string' && NUMERIC_PATTERN.test(value) ? Number(value) : value),
    schema
  );
}

const LayerSchema = z
  .object({
    inputs: numeric(z.number().int().positive()),
    outputs: numeric(z.number().int().positive()),
    activation: z.enum(ACTIVATION_NAMES).optional(),
    learningRate: numeric(z.number().positive().max(1)).optional(),
    initialization: z.enum(INITIALIZATION_SCHEMES).optional(),
  })
  .strict();

export const NetworkConfigSchema = z
  .object({
    layers: z.array(LayerSchema).min(1, 'At least one layer is required'),
    training: z
      .object({
        threshold: numeric(z.number().positive()).default(DEFAULT_THRESHOLD),
        maxEpochs: numeric(z.number().int().positive()).optional(),
        /** Applied to layers that do not set their own */
        learningRate: numeric(z.number().positive().max(1)).optional(),
      })
      .strict()
      .default({}),
    logging: z
      .object({
        level: z.enum(LOG_LEVELS).default('info'),
      })
      .strict()
      .default({}),
    model: z
      .object({
        directory: z.string().min(1).optional(),
      })
      .strict()
      .default({}),
  })
  .strict()
  .superRefine(({ layers }, ctx) => {
    for (let i = 1; i < layers.length; i++) {
      if (layers[i].inputs !== layers[i - 1].outputs) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['layers', i, 'inputs'],
          message: `expected ${layers[i - 1].outputs} to match the outputs of layer ${i - 1}, got ${layers[i].inputs}`,
        });
      }
    }
  });

export type NetworkConfig = z.infer<typeof NetworkConfigSchema>;

export const DEFAULT_SEARCH_PATHS = ['./perceptron.yaml', './perceptron.yml'];
