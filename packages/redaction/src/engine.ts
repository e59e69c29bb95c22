/**
 * Redaction engine.
 *
 * `redact` works on a copy: the input record is never mutated and a new
 * record is returned. Every field the parameterization names must have a
 * registered rule; this is checked before any rule runs, so a failing call
 * leaves nothing half-redacted. True fields are applied in registry
 * declaration order, which keeps output identical across runs regardless of
 * the parameterization's key order.
 */

import { UnregisteredRedactionFieldError, getLogger, type Logger } from '@envguard/core';
import type { ParameterizationSpec } from './parameterization.js';
import type { RedactionRegistry } from './registry.js';
import type { RedactableRecord } from './rules.js';

export function redact(
  record: RedactableRecord,
  spec: ParameterizationSpec,
  registry: RedactionRegistry,
): RedactableRecord {
  return applyRules(record, spec, registry).record;
}

function applyRules(
  record: RedactableRecord,
  spec: ParameterizationSpec,
  registry: RedactionRegistry,
): { record: RedactableRecord; applied: string[] } {
  for (const field of Object.keys(spec)) {
    if (!registry.has(field)) {
      throw new UnregisteredRedactionFieldError(field);
    }
  }

  let result: RedactableRecord = { ...record };
  const applied: string[] = [];
  for (const rule of registry.entries()) {
    if (spec[rule.field] === true) {
      result = rule.apply(result);
      applied.push(rule.field);
    }
  }
  return { record: result, applied };
}

export interface RedactionEngineOptions {
  logger?: Logger;
}

/**
 * Engine bound to one registry. Components that redact receive an engine
 * instead of reaching for a global registry.
 */
export class RedactionEngine {
  private readonly registry: RedactionRegistry;
  private readonly logger: Logger;

  constructor(registry: RedactionRegistry, options: RedactionEngineOptions = {}) {
    this.registry = registry;
    this.logger = options.logger ?? getLogger('redaction');
  }

  get fields(): string[] {
    return this.registry.fields();
  }

  redact(record: RedactableRecord, spec: ParameterizationSpec): RedactableRecord {
    const { record: result, applied } = applyRules(record, spec, this.registry);
    this.logger.debug('Redacted record', { fields: applied });
    return result;
  }

  /**
   * Redact a batch. The parameterization is checked once up front, so an
   * unregistered field fails the whole batch before any record is touched.
   */
  redactAll(records: readonly RedactableRecord[], spec: ParameterizationSpec): RedactableRecord[] {
    for (const field of Object.keys(spec)) {
      if (!this.registry.has(field)) {
        throw new UnregisteredRedactionFieldError(field);
      }
    }
    const results = records.map((record) => applyRules(record, spec, this.registry).record);
    this.logger.debug('Redacted batch', { records: results.length });
    return results;
  }
}
