/**
 * The immutable result of a successful `initialize`.
 *
 * Holds only fields the schema declares. There is no setter surface: the
 * object and its backing record are frozen, and it is passed to the
 * components that need it rather than read from a global.
 */

import { UnknownOrUnsetFieldError } from '@envguard/core';
import type { ConfigSchema, ConfigValue } from './schema.js';

export class ValidatedConfig<V extends object = Readonly<Record<string, ConfigValue>>> {
  readonly schema: ConfigSchema;
  private readonly values: Partial<V>;
  private readonly present: ReadonlyMap<string, ConfigValue>;

  constructor(values: Readonly<Record<string, ConfigValue>> & Partial<V>, schema: ConfigSchema) {
    this.schema = schema;
    this.values = Object.freeze<Partial<V>>({ ...values });
    this.present = new Map(Object.entries(values));
    Object.freeze(this);
  }

  /**
   * True iff the field is present with a non-falsy value. `0` counts as
   * falsy here, so use `keys()` to tell "absent" from "zero".
   */
  has(name: string): boolean {
    return Boolean(this.present.get(name));
  }

  /**
   * Read a field. Throws {@link UnknownOrUnsetFieldError} when the field is
   * undeclared or was optional and not set; never returns a placeholder.
   */
  get<K extends keyof V & string>(name: K): V[K] {
    const value = this.values[name];
    if (value === undefined) {
      throw new UnknownOrUnsetFieldError(name);
    }
    return value;
  }

  /** Names of the fields that hold a value, in declaration order. */
  keys(): string[] {
    return [...this.present.keys()];
  }

  /** Frozen plain-object view of every present field. */
  toObject(): Readonly<Record<string, ConfigValue>> {
    return Object.freeze(Object.fromEntries(this.present));
  }

  toJSON(): Readonly<Record<string, ConfigValue>> {
    return this.toObject();
  }
}
