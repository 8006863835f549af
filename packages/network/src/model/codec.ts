/**
 * Model Codec
 *
 * Encodes perceptron snapshots to JSON and strictly decodes them back.
 * Saved files are named from the save timestamp (`model<ms>.json`) and are
 * never overwritten. Non-finite numbers are written as the strings
 * `"NaN"`, `"Infinity"` and `"-Infinity"`.
 */

import * as fs from 'fs';
import * as path from 'path';
import { MODEL_VERSION, PersistedModelSchema } from './schema.js';
import type { PersistedModel } from './schema.js';
import { ModelFormatError, ModelIOError, errorCode } from './errors.js';

export function encodeModel(model: PersistedModel): string {
  return JSON.stringify(
    {
      version: MODEL_VERSION,
      lastError: model.lastError,
      lastLearningTime: model.lastLearningTime,
      parameters: model.parameters.map(({ config, weights }) => ({ config, weights })),
    },
    storedNumber,
    2
  );
}

export function decodeModel(json: string, source?: string): PersistedModel {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new ModelFormatError(
      `Failed to parse JSON: ${error instanceof Error ? error.message : String(error)}`,
      [{ path: '', message: 'Invalid JSON syntax' }],
      source
    );
  }
  return parseModel(data, source);
}

/**
 * Validate already-parsed data against the model schema
 */
export function parseModel(data: unknown, source?: string): PersistedModel {
  const result = PersistedModelSchema.safeParse(data);

  if (!result.success) {
    const issues = result.error.errors.map((err) => ({
      path: err.path.join('.'),
      message: err.message,
    }));

    throw new ModelFormatError(
      `Invalid model: ${issues.map((e) => `${e.path}: ${e.message}`).join(', ')}`,
      issues,
      source
    );
  }

  return result.data;
}

export function readModelFile(filePath: string): PersistedModel {
  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ModelIOError(`Failed to read model file: ${filePath}`, filePath, toError(error));
  }
  return decodeModel(content, filePath);
}

/**
 * Write a model into `directory` and return the generated file name
 */
export function writeModelFile(
  directory: string,
  model: PersistedModel,
  now: Date = new Date()
): string {
  const content = encodeModel(model);
  const stamp = now.getTime();

  for (let attempt = 0; ; attempt++) {
    const filename = attempt === 0 ? `model${stamp}.json` : `model${stamp}-${attempt}.json`;
    const filePath = path.join(directory, filename);
    try {
      fs.writeFileSync(filePath, content, { encoding: 'utf8', flag: 'wx' });
      return filename;
    } catch (error) {
      if (errorCode(error) !== 'EEXIST') {
        throw new ModelIOError(`Failed to write model file: ${filePath}`, filePath, toError(error));
      }
    }
  }
}

function storedNumber(_key: string, value: unknown): unknown {
  return typeof value === 'number' && !Number.isFinite(value) ? String(value) : value;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
