/**
 * Validated environment configuration
 *
 * Single read of the environment at startup, checked against a declared
 * schema:
 * - Typed fields (string, number, enum) with optional defaults
 * - Every violation reported at once, before anything starts
 * - Immutable result, injected into the components that need it
 * - Secret fields masked when printed
 */

export {
  ConfigSchema,
  defineSchema,
  parseSchemaDocument,
  loadSchemaFile,
  type FieldType,
  type FieldDeclaration,
  type StringField,
  type NumberField,
  type EnumField,
  type ConfigValue,
  type ConfigValues,
  type FieldValue,
} from './schema.js';
export { initialize, compileSchema, type RawEnvironment, type InitializeOptions } from './loader.js';
export { ValidatedConfig } from './validated-config.js';
export { parseEnvFile, findEnvFile, readEnvFile, mergeEnvVars } from './env-file.js';
export { redactConfig, printConfig, type PrintConfigOptions, type PrintableConfig } from './redaction.js';
