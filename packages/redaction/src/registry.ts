/**
 * Closed registry of redaction rules.
 *
 * The set of rules is fixed when the registry is built; there is no way to
 * register a rule afterwards. Declaration order is kept and is the order in
 * which the engine applies rules.
 */

import { SchemaError } from '@envguard/core';
import type { RedactionRule } from './rules.js';

export class RedactionRegistry {
  private readonly rules: ReadonlyMap<string, RedactionRule>;

  constructor(rules: readonly RedactionRule[]) {
    const byField = new Map<string, RedactionRule>();
    const problems: string[] = [];

    for (const rule of rules) {
      if (rule.field.length === 0) {
        problems.push('rule field names must not be empty');
        continue;
      }
      if (byField.has(rule.field)) {
        problems.push(`duplicate rule for field ${rule.field}`);
        continue;
      }
      byField.set(rule.field, rule);
    }

    if (problems.length > 0) {
      throw new SchemaError('Invalid redaction registry', { component: 'RedactionRegistry', problems });
    }

    this.rules = byField;
    Object.freeze(this);
  }

  get size(): number {
    return this.rules.size;
  }

  has(field: string): boolean {
    return this.rules.has(field);
  }

  get(field: string): RedactionRule | undefined {
    return this.rules.get(field);
  }

  /** Registered field names in declaration order. */
  fields(): string[] {
    return [...this.rules.keys()];
  }

  /** Rules in declaration order. */
  entries(): RedactionRule[] {
    return [...this.rules.values()];
  }
}

export function createRegistry(rules: readonly RedactionRule[]): RedactionRegistry {
  return new RedactionRegistry(rules);
}
