/**
 * Custom Error Classes
 *
 * Structured errors with codes, context, and recovery hints. Nothing in
 * envguard retries: every error is raised to the immediate caller and only a
 * corrected input, schema or registry can make the next attempt succeed.
 */

export type ErrorCode =
  | 'MISSING_REQUIRED_FIELD'
  | 'TYPE_MISMATCH'
  | 'INVALID_ENUM_VALUE'
  | 'CONFIG_INVALID'
  | 'UNKNOWN_OR_UNSET_FIELD'
  | 'UNREGISTERED_REDACTION_FIELD'
  | 'SCHEMA_INVALID'
  | 'PARAMETERIZATION_INVALID'
  | 'ENV_FILE_READ_FAILED'
  | 'INTERNAL_ERROR';

export interface ErrorContext {
  code: ErrorCode;
  component: string;
  operation: string;
  details?: Record<string, unknown>;
  recoveryHint?: string;
}

/**
 * Base error class for all envguard errors
 */
export class EnvGuardError extends Error {
  public readonly code: ErrorCode;
  public readonly component: string;
  public readonly operation: string;
  public readonly details: Record<string, unknown>;
  public readonly recoveryHint?: string;
  public readonly retryable = false;
  public readonly timestamp: Date;
  public override readonly cause?: Error;

  constructor(message: string, context: ErrorContext, cause?: Error) {
    super(message);
    this.name = 'EnvGuardError';
    this.code = context.code;
    this.component = context.component;
    this.operation = context.operation;
    this.details = context.details ?? {};
    this.recoveryHint = context.recoveryHint;
    this.timestamp = new Date();
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      component: this.component,
      operation: this.operation,
      details: this.details,
      recoveryHint: this.recoveryHint,
      retryable: this.retryable,
      timestamp: this.timestamp.toISOString(),
      cause: this.cause?.message,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.component}.${this.operation}: ${this.message}`;
  }
}

// ============================================================================
// Configuration validation
// ============================================================================

/**
 * A single field that failed validation. `initialize` never throws these
 * directly; they are collected into a {@link ConfigValidationError}.
 */
export abstract class FieldViolationError extends EnvGuardError {
  public readonly field: string;

  protected constructor(message: string, field: string, code: ErrorCode, details: Record<string, unknown>, recoveryHint: string) {
    super(message, {
      code,
      component: 'ConfigLoader',
      operation: 'initialize',
      details: { field, ...details },
      recoveryHint,
    });
    this.field = field;
  }
}

export class MissingRequiredFieldError extends FieldViolationError {
  constructor(field: string) {
    super(`${field} is required but was not set`, field, 'MISSING_REQUIRED_FIELD', {}, `Set ${field} in the environment`);
    this.name = 'MissingRequiredFieldError';
  }
}

export class TypeMismatchError extends FieldViolationError {
  public readonly expected: string;
  public readonly actual: string;

  constructor(field: string, expected: string, actual: string) {
    super(
      `${field} must be a ${expected}, got ${JSON.stringify(actual)}`,
      field,
      'TYPE_MISMATCH',
      { expected, actual },
      `Provide a ${expected} value for ${field}`,
    );
    this.name = 'TypeMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class InvalidEnumValueError extends FieldViolationError {
  public readonly allowed: readonly string[];
  public readonly actual: string;

  constructor(field: string, allowed: readonly string[], actual: string) {
    super(
      `${field} must be one of ${allowed.join(', ')}, got ${JSON.stringify(actual)}`,
      field,
      'INVALID_ENUM_VALUE',
      { allowed: [...allowed], actual },
      `Use one of: ${allowed.join(', ')}`,
    );
    this.name = 'InvalidEnumValueError';
    this.allowed = allowed;
    this.actual = actual;
  }
}

/**
 * Aggregate startup failure: every violated field, in schema order.
 */
export class ConfigValidationError extends EnvGuardError {
  public readonly violations: readonly FieldViolationError[];

  constructor(violations: readonly FieldViolationError[]) {
    const lines = violations.map((violation) => `  • ${violation.message}`);
    super(`Invalid configuration (${violations.length} problem${violations.length === 1 ? '' : 's'}):\n${lines.join('\n')}`, {
      code: 'CONFIG_INVALID',
      component: 'ConfigLoader',
      operation: 'initialize',
      details: { fields: violations.map((violation) => violation.field) },
      recoveryHint: 'Fix every listed variable and restart the process',
    });
    this.name = 'ConfigValidationError';
    this.violations = violations;
  }
}

export class UnknownOrUnsetFieldError extends EnvGuardError {
  public readonly field: string;

  constructor(field: string) {
    super(`${field} is not declared in the schema or has no value`, {
      code: 'UNKNOWN_OR_UNSET_FIELD',
      component: 'ValidatedConfig',
      operation: 'get',
      details: { field },
      recoveryHint: `Check has('${field}') before reading an optional field`,
    });
    this.name = 'UnknownOrUnsetFieldError';
    this.field = field;
  }
}

// ============================================================================
// Redaction
// ============================================================================

export class UnregisteredRedactionFieldError extends EnvGuardError {
  public readonly field: string;

  constructor(field: string) {
    super(`No redaction rule is registered for ${field}`, {
      code: 'UNREGISTERED_REDACTION_FIELD',
      component: 'RedactionEngine',
      operation: 'redact',
      details: { field },
      recoveryHint: `Register a rule for ${field} or remove it from the parameterization`,
    });
    this.name = 'UnregisteredRedactionFieldError';
    this.field = field;
  }
}

export class ParameterizationError extends EnvGuardError {
  constructor(message: string, options: { issues?: string[]; cause?: Error } = {}) {
    super(
      message,
      {
        code: 'PARAMETERIZATION_INVALID',
        component: 'Parameterization',
        operation: 'parse',
        details: { issues: options.issues ?? [] },
        recoveryHint: 'Pass a JSON object mapping field names to true or false',
      },
      options.cause,
    );
    this.name = 'ParameterizationError';
  }
}

// ============================================================================
// Declarations and files
// ============================================================================

export class SchemaError extends EnvGuardError {
  public readonly problems: readonly string[];

  constructor(
    message: string,
    options: { component: string; problems?: readonly string[]; cause?: Error },
  ) {
    const problems = options.problems ?? [];
    super(
      problems.length > 0 ? `${message}:\n${problems.map((problem) => `  • ${problem}`).join('\n')}` : message,
      {
        code: 'SCHEMA_INVALID',
        component: options.component,
        operation: 'define',
        details: { problems: [...problems] },
        recoveryHint: 'Correct the declarations before starting the process',
      },
      options.cause,
    );
    this.name = 'SchemaError';
    this.problems = problems;
  }
}

export class EnvFileError extends EnvGuardError {
  public readonly filePath: string;

  constructor(filePath: string, cause?: Error) {
    super(
      `Failed to read env file at ${filePath}${cause ? `: ${cause.message}` : ''}`,
      {
        code: 'ENV_FILE_READ_FAILED',
        component: 'ConfigLoader',
        operation: 'loadEnvFile',
        details: { filePath },
        recoveryHint: 'Check the path and file permissions',
      },
      cause,
    );
    this.name = 'EnvFileError';
    this.filePath = filePath;
  }
}

/**
 * Check if an error is an EnvGuardError
 */
export function isEnvGuardError(error: unknown): error is EnvGuardError {
  return error instanceof EnvGuardError;
}

/**
 * Wrap unknown errors in an EnvGuardError
 */
export function wrapError(
  error: unknown,
  context: { component: string; operation: string },
): EnvGuardError {
  if (isEnvGuardError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new EnvGuardError(message, {
    code: 'INTERNAL_ERROR',
    component: context.component,
    operation: context.operation,
  }, cause);
}
