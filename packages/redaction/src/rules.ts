/**
 * Redaction rules.
 *
 * A rule is bound to exactly one field and maps a record to a copy of that
 * record in which only that field has changed. Rules never mutate their
 * input. When the record does not carry the field the rule returns it as is,
 * so a rule never invents a field that was not there.
 */

export type RedactableRecord = Readonly<Record<string, unknown>>;

export interface RedactionRule {
  /** Field this rule rewrites. Registry key. */
  readonly field: string;
  apply(record: RedactableRecord): RedactableRecord;
}

export const REDACTED_MARKER = '[REDACTED]';
export const SECRET_PLACEHOLDER = '***REDACTED***';

/**
 * Build a rule that rewrites the value of `field` with `transform`.
 */
export function transformRule(field: string, transform: (value: unknown) => unknown): RedactionRule {
  return {
    field,
    apply(record) {
      if (!Object.hasOwn(record, field)) {
        return record;
      }
      return { ...record, [field]: transform(record[field]) };
    },
  };
}

/**
 * Replace the value with a fixed marker. Idempotent.
 */
export function markerRule(field: string, marker: string = REDACTED_MARKER): RedactionRule {
  return transformRule(field, () => marker);
}

export interface PartialMaskOptions {
  /** Characters left visible at the start. Default: 0. */
  keepStart?: number;
  /** Characters left visible at the end. Default: 4. */
  keepEnd?: number;
  /** Character used for hidden positions. Default: "*". */
  maskChar?: string;
}

/**
 * Hide the middle of a string or number value, e.g. `*****6789`.
 * Values too short to keep anything hidden are masked entirely; values that
 * are neither strings nor numbers become {@link REDACTED_MARKER}.
 */
export function partialMaskRule(field: string, options: PartialMaskOptions = {}): RedactionRule {
  const keepStart = options.keepStart ?? 0;
  const keepEnd = options.keepEnd ?? 4;
  const maskChar = options.maskChar ?? '*';

  return transformRule(field, (value) => {
    if (typeof value !== 'string' && typeof value !== 'number') {
      return REDACTED_MARKER;
    }
    const text = String(value);
    if (text.length <= keepStart + keepEnd) {
      return maskChar.repeat(text.length);
    }
    const hidden = text.length - keepStart - keepEnd;
    return `${text.slice(0, keepStart)}${maskChar.repeat(hidden)}${text.slice(text.length - keepEnd)}`;
  });
}

/**
 * Redaction for credentials: URLs lose their user info but keep their
 * structure, long values keep their first and last four characters, and
 * anything else becomes the placeholder. `null` and `undefined` pass through.
 */
export function secretRule(field: string, placeholder: string = SECRET_PLACEHOLDER): RedactionRule {
  return transformRule(field, (value) => {
    if (value === undefined || value === null) {
      return value;
    }
    const text = String(value);

    if (text.includes('://')) {
      try {
        const url = new URL(text);
        if (url.username || url.password) {
          return `${url.protocol}//${placeholder}@${url.host}${url.pathname}${url.search}${url.hash}`;
        }
        return placeholder;
      } catch {
        return placeholder;
      }
    }

    if (text.length > 8) {
      return `${text.slice(0, 4)}${placeholder}${text.slice(-4)}`;
    }
    return placeholder;
  });
}

/**
 * Remove the field from the record altogether.
 */
export function omitRule(field: string): RedactionRule {
  return {
    field,
    apply(record) {
      if (!Object.hasOwn(record, field)) {
        return record;
      }
      const copy: Record<string, unknown> = { ...record };
      delete copy[field];
      return copy;
    },
  };
}
