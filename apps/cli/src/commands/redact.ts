/**
 * Redact command - apply a rules document to JSON records
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ParameterizationError, SchemaError, type Logger } from '@envguard/core';
import { defineSchema, initialize } from '@envguard/config';
import {
  RedactionEngine,
  parseParameterization,
  type ParameterizationSpec,
  type RedactableRecord,
} from '@envguard/redaction';
import { reportFailure } from '../lib/fail-fast.js';
import { loadRulesFile } from '../lib/rules-file.js';
import type { CommandIO, RedactOptions } from '../types.js';

const recordSchema = z.record(z.unknown());
const inputSchema = z.union([z.array(recordSchema), recordSchema]);

/**
 * Parameterization from --params, or from the environment variable named by
 * --params-env (read through the same validated path as any other setting).
 */
export function resolveParameterization(
  options: Pick<RedactOptions, 'params' | 'paramsEnv'>,
  io: Pick<CommandIO, 'environment'>,
  logger?: Logger,
): ParameterizationSpec {
  if (options.params !== undefined && options.paramsEnv !== undefined) {
    throw new ParameterizationError('Pass either --params or --params-env, not both');
  }
  if (options.params !== undefined) {
    return parseParameterization(options.params);
  }
  if (options.paramsEnv !== undefined) {
    const name = options.paramsEnv;
    const schema = defineSchema([{ name, type: 'string', required: true }] as const);
    const config = initialize(schema, io.environment, { logger });
    return parseParameterization(config.get(name));
  }
  throw new ParameterizationError('No parameterization given: pass --params or --params-env');
}

export function readRecords(filePath: string): RedactableRecord | RedactableRecord[] {
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new SchemaError(`Failed to read input file at ${filePath}`, {
      component: 'RedactCommand',
      cause: error instanceof Error ? error : undefined,
    });
  }

  const result = inputSchema.safeParse(document);
  if (!result.success) {
    throw new SchemaError('Input must be a JSON object or an array of objects', { component: 'RedactCommand' });
  }
  return result.data;
}

export function redactCommand(options: RedactOptions, io: CommandIO, logger?: Logger): void {
  try {
    const engine = new RedactionEngine(loadRulesFile(options.rules), { logger });
    const spec = resolveParameterization(options, io, logger);
    const input = readRecords(options.input);
    const output = Array.isArray(input) ? engine.redactAll(input, spec) : engine.redact(input, spec);

    io.stdout(`${JSON.stringify(output, null, 2)}\n`);
  } catch (error) {
    reportFailure(error, { operation: 'redact', headline: 'Redaction failed' }, io);
  }
}
