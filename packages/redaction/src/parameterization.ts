/**
 * Parameterization: which fields to redact.
 *
 * A parameterization is deliberately its own type and never part of a
 * ValidatedConfig. Changing it changes the output for identical input data,
 * which is exactly what configuration must not do.
 *
 * It usually arrives as text (a command-line argument or an environment
 * variable holding JSON) and is decoded here before reaching the engine.
 */

import { z } from 'zod';
import { ParameterizationError } from '@envguard/core';

export type ParameterizationSpec = Readonly<Record<string, boolean>>;

const parameterizationSchema = z.record(z.string().min(1, 'field names must not be empty'), z.boolean());

/**
 * Validate an already-decoded value as a parameterization.
 */
export function toParameterization(value: unknown): ParameterizationSpec {
  const result = parameterizationSchema.safeParse(value);
  if (!result.success) {
    throw invalid(
      result.error.errors.map((issue) => {
        const path = issue.path.join('.');
        return `${path || 'root'}: ${issue.message}`;
      }),
    );
  }

  // zod drops keys such as "__proto__" from records without an issue
  const parsed = result.data;
  const dropped = typeof value === 'object' && value !== null
    ? Object.keys(value).filter((key) => !Object.hasOwn(parsed, key))
    : [];
  if (dropped.length > 0) {
    throw invalid(dropped.map((key) => `${key}: field name is not allowed`));
  }

  return Object.freeze({ ...parsed });
}

function invalid(issues: string[]): ParameterizationError {
  return new ParameterizationError(`Invalid parameterization:\n${issues.map((issue) => `  • ${issue}`).join('\n')}`, {
    issues,
  });
}

/**
 * Decode a JSON object of booleans, e.g. `{"ssn":true,"dob":false}`.
 */
export function parseParameterization(text: string): ParameterizationSpec {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (error) {
    throw new ParameterizationError('Parameterization is not valid JSON', {
      cause: error instanceof Error ? error : undefined,
    });
  }
  return toParameterization(decoded);
}

/**
 * Build a parameterization that sets every listed field to `value`.
 */
export function parameterizationFor(fields: Iterable<string>, value = true): ParameterizationSpec {
  const spec: Record<string, boolean> = {};
  for (const field of fields) {
    spec[field] = value;
  }
  return Object.freeze(spec);
}
