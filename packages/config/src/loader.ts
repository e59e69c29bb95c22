/**
 * Configuration Loader
 *
 * Validates an environment against a schema exactly once, at startup, and
 * returns an immutable {@link ValidatedConfig}. Every violation is collected
 * and thrown together as one {@link ConfigValidationError}; the caller is
 * expected to exit before opening any listener.
 *
 * Each call is independent and shares no state with other calls. Running
 * calls with different injected environments concurrently is left to the
 * caller to serialize.
 */

import { z } from 'zod';
import {
  ConfigValidationError,
  EnvGuardError,
  InvalidEnumValueError,
  MissingRequiredFieldError,
  TypeMismatchError,
  getLogger,
  type FieldViolationError,
  type Logger,
} from '@envguard/core';
import type { ConfigSchema, ConfigValue, ConfigValues, FieldDeclaration } from './schema.js';
import { findEnvFile, mergeEnvVars, readEnvFile } from './env-file.js';
import { ValidatedConfig } from './validated-config.js';

export type RawEnvironment = Readonly<Record<string, string | undefined>>;

export interface InitializeOptions {
  /**
   * Layer a .env file under the process environment. `true` searches the
   * working directory; a string names the file. Ignored when an environment
   * is passed explicitly, and never applied when NODE_ENV is production.
   */
  envFile?: string | boolean;
  logger?: Logger;
}

// ============================================================================
// Schema compilation
// ============================================================================

const violationParamsSchema = z.discriminatedUnion('violation', [
  z.object({ violation: z.literal('type'), expected: z.string(), actual: z.string() }),
  z.object({ violation: z.literal('enum'), allowed: z.array(z.string()), actual: z.string() }),
]);

type ViolationParams = z.infer<typeof violationParamsSchema>;

/** Plain decimal notation; no hex, binary, octal or Infinity. */
const DECIMAL_NUMBER = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse a decimal number, tolerating surrounding whitespace. Integers beyond
 * the safe range are rejected because they cannot be represented exactly.
 */
function parseDecimal(raw: string): number | undefined {
  const text = raw.trim();
  if (!DECIMAL_NUMBER.test(text)) {
    return undefined;
  }
  const parsed = Number(text);
  if (!Number.isFinite(parsed) || (Number.isInteger(parsed) && !Number.isSafeInteger(parsed))) {
    return undefined;
  }
  return parsed;
}

function valueParser(field: FieldDeclaration): z.ZodType<ConfigValue, z.ZodTypeDef, string> {
  switch (field.type) {
    case 'string':
      return z.string();
    case 'number':
      return z.string().transform((raw, ctx) => {
        const parsed = parseDecimal(raw);
        if (parsed === undefined) {
          const params: ViolationParams = { violation: 'type', expected: 'number', actual: raw };
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected a number', params });
          return z.NEVER;
        }
        return parsed;
      });
    case 'enum': {
      const allowed = field.values;
      return z.string().superRefine((raw, ctx) => {
        if (!allowed.includes(raw)) {
          const params: ViolationParams = { violation: 'enum', allowed: [...allowed], actual: raw };
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected one of ${allowed.join(', ')}`, params });
        }
      });
    }
  }
}

function fieldSchema(field: FieldDeclaration): z.ZodTypeAny {
  const parser = valueParser(field);
  if (field.required) {
    return parser;
  }
  const optional = parser.optional();
  const fallback = field.default;
  return fallback === undefined ? optional : optional.transform((value) => value ?? fallback);
}

/**
 * Compile a schema to a zod object. Keys the schema does not declare are
 * stripped, so nothing undeclared can reach a ValidatedConfig.
 */
export function compileSchema(schema: ConfigSchema): z.ZodObject<Record<string, z.ZodTypeAny>> {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const field of schema.fields) {
    shape[field.name] = fieldSchema(field);
  }
  return z.object(shape);
}

function toViolation(issue: z.ZodIssue, field: FieldDeclaration): FieldViolationError {
  if (issue.code === z.ZodIssueCode.custom) {
    const parsed = violationParamsSchema.safeParse(issue.params);
    if (parsed.success) {
      const params = parsed.data;
      return params.violation === 'type'
        ? new TypeMismatchError(field.name, params.expected, params.actual)
        : new InvalidEnumValueError(field.name, params.allowed, params.actual);
    }
  }

  if (issue.code === z.ZodIssueCode.invalid_type) {
    return issue.received === 'undefined'
      ? new MissingRequiredFieldError(field.name)
      : new TypeMismatchError(field.name, field.type === 'number' ? 'number' : 'string', issue.received);
  }

  return new TypeMismatchError(field.name, field.type, issue.message);
}

function collectViolations(error: z.ZodError, schema: ConfigSchema): FieldViolationError[] {
  const byField = new Map<string, FieldViolationError>();
  for (const issue of error.errors) {
    const name = issue.path[0];
    const field = typeof name === 'string' ? schema.field(name) : undefined;
    if (field && !byField.has(field.name)) {
      byField.set(field.name, toViolation(issue, field));
    }
  }
  // Schema order, one violation per field
  return schema.names().flatMap((name) => {
    const violation = byField.get(name);
    return violation ? [violation] : [];
  });
}

function conformsTo<F extends readonly FieldDeclaration[]>(
  schema: ConfigSchema<F>,
  values: Readonly<Record<string, ConfigValue>>,
): values is Readonly<Record<string, ConfigValue>> & Partial<ConfigValues<F>> {
  return Object.entries(values).every(([name, value]) => {
    const field = schema.field(name);
    if (!field) {
      return false;
    }
    switch (field.type) {
      case 'number':
        return typeof value === 'number';
      case 'enum':
        return typeof value === 'string' && field.values.includes(value);
      case 'string':
        return typeof value === 'string';
    }
  });
}

// ============================================================================
// Environment
// ============================================================================

function readProcessEnvironment(options: InitializeOptions, logger: Logger): RawEnvironment {
  const processEnv: Record<string, string | undefined> = { ...process.env };

  if (!options.envFile) {
    return processEnv;
  }

  if (processEnv['NODE_ENV'] === 'production') {
    logger.warn('Ignoring env file in production');
    return processEnv;
  }

  const envPath = options.envFile === true ? findEnvFile() : options.envFile;
  if (!envPath) {
    return processEnv;
  }

  const fileVars = readEnvFile(envPath);
  logger.debug('Loaded env file', { path: envPath, variables: Object.keys(fileVars).length });
  return mergeEnvVars(fileVars, processEnv);
}

/**
 * Validate an environment against a schema.
 *
 * Without `rawEnvironment` the real process environment is read once; with
 * it, the given mapping is used verbatim. That second form is how tests run
 * without touching `process.env`.
 *
 * @throws ConfigValidationError listing every violated field
 */
export function initialize<F extends readonly FieldDeclaration[]>(
  schema: ConfigSchema<F>,
  rawEnvironment?: RawEnvironment,
  options: InitializeOptions = {},
): ValidatedConfig<ConfigValues<F>> {
  const logger = options.logger ?? getLogger('config');
  const environment = rawEnvironment ?? readProcessEnvironment(options, logger);

  const result = compileSchema(schema).safeParse(environment);
  if (!result.success) {
    const violations = collectViolations(result.error, schema);
    logger.debug('Configuration rejected', { fields: violations.map((violation) => violation.field) });
    throw new ConfigValidationError(violations);
  }

  const parsed: Record<string, unknown> = result.data;
  const values: Record<string, ConfigValue> = {};
  for (const field of schema.fields) {
    const value = parsed[field.name];
    if (typeof value === 'string' || typeof value === 'number') {
      values[field.name] = value;
    }
  }

  if (!conformsTo(schema, values)) {
    throw new EnvGuardError('Validated values do not match the schema', {
      code: 'INTERNAL_ERROR',
      component: 'ConfigLoader',
      operation: 'initialize',
    });
  }

  logger.debug('Configuration validated', { fields: Object.keys(values).length });
  return new ValidatedConfig<ConfigValues<F>>(values, schema);
}
