/**
 * brainmeta public API.
 */

export * from './types/index.js';

export { BrainmetaError, UnknownSchemaError } from './core/errors.js';
export { loadConfig, getConfigValue, getDefaultConfig } from './core/config.js';
export { initLogger, getLogger, closeLogger } from './core/logger.js';

export {
  RecordValidator,
  validate,
  isValidMetadata,
  resetValidator,
  type RecordValidatorOptions,
} from './core/validation/schema-validator.js';
export {
  SchemaTable,
  getSchemaTable,
  resetSchemaTable,
  variantKey,
  type SchemaVariant,
} from './core/validation/schema-table.js';
export {
  loadSchemaDocuments,
  parseSchemaDocument,
  type SchemaDocument,
  type ObjectSchema,
  type PropertySchema,
} from './core/validation/schema-documents.js';
export { InMemoryChannelRegistry, type ChannelRegistry } from './core/validation/channel-registry.js';
export { normalizeRecord } from './core/validation/normalize.js';
export {
  parseCalendarDate,
  canonicalDate,
  isEmail,
  parseInstant,
  compareInstants,
  type CalendarDate,
  type Instant,
} from './core/validation/formats.js';

export {
  buildUserProfile,
  buildSessionMetadata,
  buildTaggedInterval,
  type UserProfileInput,
  type SessionMetadataInput,
  type TaggedIntervalInput,
} from './core/records/builders.js';
export { convertDatetimes } from './core/records/datetimes.js';
