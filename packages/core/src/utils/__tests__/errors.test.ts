/**
 * Error Taxonomy Tests
 */

import { describe, it, expect } from 'vitest';
import {
  EnvGuardError,
  MissingRequiredFieldError,
  TypeMismatchError,
  InvalidEnumValueError,
  ConfigValidationError,
  UnknownOrUnsetFieldError,
  UnregisteredRedactionFieldError,
  SchemaError,
  isEnvGuardError,
  wrapError,
} from '../errors.js';

describe('EnvGuardError', () => {
  it('carries code, component and operation', () => {
    const error = new EnvGuardError('boom', {
      code: 'INTERNAL_ERROR',
      component: 'Test',
      operation: 'run',
    });

    expect(error.code).toBe('INTERNAL_ERROR');
    expect(error.toString()).toBe('[INTERNAL_ERROR] Test.run: boom');
    expect(error.retryable).toBe(false);
    expect(error.details).toEqual({});
  });

  it('serializes the cause message in toJSON', () => {
    const cause = new Error('root cause');
    const error = new EnvGuardError('outer', {
      code: 'INTERNAL_ERROR',
      component: 'Test',
      operation: 'run',
    }, cause);

    const json = error.toJSON();
    expect(json.cause).toBe('root cause');
    expect(json.name).toBe('EnvGuardError');
  });
});

describe('field violations', () => {
  it('names the missing field', () => {
    const error = new MissingRequiredFieldError('DATABASE_URL');
    expect(error.field).toBe('DATABASE_URL');
    expect(error.code).toBe('MISSING_REQUIRED_FIELD');
    expect(error.message).toBe('DATABASE_URL is required but was not set');
  });

  it('records expected and actual types', () => {
    const error = new TypeMismatchError('PORT', 'number', 'eighty');
    expect(error.expected).toBe('number');
    expect(error.actual).toBe('eighty');
    expect(error.message).toBe('PORT must be a number, got "eighty"');
  });

  it('records the permitted enum values', () => {
    const error = new InvalidEnumValueError('NODE_ENV', ['development', 'production'], 'staging');
    expect(error.allowed).toEqual(['development', 'production']);
    expect(error.message).toBe('NODE_ENV must be one of development, production, got "staging"');
  });
});

describe('ConfigValidationError', () => {
  it('enumerates every violation in its message', () => {
    const error = new ConfigValidationError([
      new MissingRequiredFieldError('DATABASE_URL'),
      new TypeMismatchError('PORT', 'number', 'abc'),
    ]);

    expect(error.message).toBe(
      'Invalid configuration (2 problems):\n' +
        '  • DATABASE_URL is required but was not set\n' +
        '  • PORT must be a number, got "abc"',
    );
    expect(error.details.fields).toEqual(['DATABASE_URL', 'PORT']);
  });

  it('uses the singular for one problem', () => {
    const error = new ConfigValidationError([new MissingRequiredFieldError('HOST')]);
    expect(error.message.split('\n')[0]).toBe('Invalid configuration (1 problem):');
  });
});

describe('access and redaction errors', () => {
  it('UnknownOrUnsetFieldError reports the field', () => {
    const error = new UnknownOrUnsetFieldError('MISSING');
    expect(error.field).toBe('MISSING');
    expect(error.code).toBe('UNKNOWN_OR_UNSET_FIELD');
  });

  it('UnregisteredRedactionFieldError reports the field', () => {
    const error = new UnregisteredRedactionFieldError('ssn');
    expect(error.message).toBe('No redaction rule is registered for ssn');
    expect(error.component).toBe('RedactionEngine');
  });

  it('SchemaError lists its problems', () => {
    const error = new SchemaError('Invalid schema', {
      component: 'Schema',
      problems: ['duplicate field PORT'],
    });
    expect(error.message).toBe('Invalid schema:\n  • duplicate field PORT');
    expect(error.problems).toEqual(['duplicate field PORT']);
  });
});

describe('isEnvGuardError', () => {
  it('recognizes subclasses', () => {
    expect(isEnvGuardError(new MissingRequiredFieldError('X'))).toBe(true);
    expect(isEnvGuardError(new Error('plain'))).toBe(false);
    expect(isEnvGuardError('string')).toBe(false);
  });
});

describe('wrapError', () => {
  it('returns EnvGuardErrors unchanged', () => {
    const original = new UnknownOrUnsetFieldError('X');
    expect(wrapError(original, { component: 'A', operation: 'b' })).toBe(original);
  });

  it('wraps plain errors with INTERNAL_ERROR', () => {
    const cause = new Error('disk full');
    const wrapped = wrapError(cause, { component: 'Cli', operation: 'check' });

    expect(wrapped.code).toBe('INTERNAL_ERROR');
    expect(wrapped.message).toBe('disk full');
    expect(wrapped.cause).toBe(cause);
  });

  it('stringifies non-errors', () => {
    const wrapped = wrapError(42, { component: 'Cli', operation: 'check' });
    expect(wrapped.message).toBe('42');
    expect(wrapped.cause).toBeUndefined();
  });
});
