/**
 * @shiplog/config
 *
 * Project configuration and note schema descriptors for shiplog.
 *
 * @packageDocumentation
 */

export {
  SHIPLOG_DEFAULTS,
  RESERVED_ATTRIBUTE_NAMES,
  isReservedAttributeName,
  type ReservedAttributeName,
  type ShiplogDefaults,
} from './constants.js';

export {
  CONDITION_OPERATORS,
  FieldConditionSchema,
  FieldDefinitionSchema,
  NoteSchemaDescriptorSchema,
  ShiplogConfigSchema,
  safeValidateConfig,
  safeValidateNoteSchema,
  type ConditionOperator,
  type FieldCondition,
  type FieldDefinition,
  type NoteSchemaDescriptor,
  type ShiplogConfig,
  type ShiplogConfigInput,
} from './schema.js';

export { createSafeValidator, formatIssues } from './schema-utils.js';

export { loadConfig, loadConfigFromFile, loadNoteSchema } from './loader.js';
