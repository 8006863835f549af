/**
 * Model persistence exports
 */

export { encodeModel, decodeModel, parseModel, readModelFile, writeModelFile } from './codec.js';
export {
  MODEL_VERSION,
  LayerConfigSchema,
  PersistedModelSchema,
  parseTimeSpan,
} from './schema.js';
export { ModelFormatError, ModelIOError } from './errors.js';

export type { PersistedModel, LayerParameters } from './schema.js';
export type { FormatIssue } from './errors.js';
