// Field names
export { TYPE_FIELD, PLUGIN_FIELD } from './fields.js';

// Generic value model
export type { GenericValue, GenericMap } from './value.js';
export { isGenericMap, isGenericValue, freezeGenericValue } from './value.js';

// Reducer
export { generify } from './generify.js';
export {
  sanitizeComponent,
  sanitizeComponentOrThrow,
  detectComponentType,
} from './sanitize.js';
export type { SanitizeResult, SanitizeOptions } from './sanitize.js';

// Ordered emitters
export { SanitizedConfig } from './sanitized.js';
export { renderOrderedJSON, renderOrderedYAML, compareCodePoints } from './render.js';
export type { SanitizedEntries } from './render.js';

// Logging
export { createConsoleLogger, noopLogger } from './logger.js';
export type { SanitizeLogger } from './logger.js';

// Errors
export { SanitizeError, EncodingError, MissingOrInvalidTypeError } from './errors.js';
export type { SanitizeErrorKind } from './errors.js';
