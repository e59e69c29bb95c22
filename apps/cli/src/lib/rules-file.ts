/**
 * Rules documents for `envguard redact`
 *
 * ```json
 * { "rules": [ { "field": "ssn", "kind": "mask", "keepEnd": 4 }, { "field": "name", "kind": "marker" } ] }
 * ```
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { SchemaError } from '@envguard/core';
import {
  createRegistry,
  markerRule,
  omitRule,
  partialMaskRule,
  secretRule,
  type RedactionRegistry,
  type RedactionRule,
} from '@envguard/redaction';

const fieldName = z.string().min(1, 'field must not be empty');
const keep = z.number().int().nonnegative();

const ruleSchema = z.discriminatedUnion('kind', [
  z.object({ field: fieldName, kind: z.literal('marker'), marker: z.string().optional() }).strict(),
  z
    .object({
      field: fieldName,
      kind: z.literal('mask'),
      keepStart: keep.optional(),
      keepEnd: keep.optional(),
      maskChar: z.string().length(1).optional(),
    })
    .strict(),
  z.object({ field: fieldName, kind: z.literal('secret'), placeholder: z.string().optional() }).strict(),
  z.object({ field: fieldName, kind: z.literal('omit') }).strict(),
]);

const rulesDocumentSchema = z.object({ rules: z.array(ruleSchema) }).strict();

export type RuleDeclaration = z.infer<typeof ruleSchema>;

export function toRule(declaration: RuleDeclaration): RedactionRule {
  switch (declaration.kind) {
    case 'marker':
      return markerRule(declaration.field, declaration.marker);
    case 'mask':
      return partialMaskRule(declaration.field, {
        keepStart: declaration.keepStart,
        keepEnd: declaration.keepEnd,
        maskChar: declaration.maskChar,
      });
    case 'secret':
      return secretRule(declaration.field, declaration.placeholder);
    case 'omit':
      return omitRule(declaration.field);
  }
}

/**
 * Build a closed registry from a decoded rules document. Rules keep the
 * order they are listed in.
 */
export function parseRulesDocument(document: unknown): RedactionRegistry {
  const result = rulesDocumentSchema.safeParse(document);
  if (!result.success) {
    throw new SchemaError('Invalid rules document', {
      component: 'RulesFile',
      problems: result.error.errors.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
    });
  }
  return createRegistry(result.data.rules.map(toRule));
}

export function loadRulesFile(filePath: string): RedactionRegistry {
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new SchemaError(`Failed to read rules file at ${filePath}`, {
      component: 'RulesFile',
      cause: error instanceof Error ? error : undefined,
    });
  }
  return parseRulesDocument(document);
}
