/**
 * Configuration Schema
 *
 * An ordered set of field declarations describing the environment a process
 * needs. Schemas are data: they can be written in code with
 * {@link defineSchema} (and keep precise value types) or loaded from a JSON
 * document with {@link parseSchemaDocument} / {@link loadSchemaFile}.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { SchemaError } from '@envguard/core';

export type FieldType = 'string' | 'number' | 'enum';

interface BaseField<N extends string> {
  readonly name: N;
  readonly required: boolean;
  /** Redact this field when printing the configuration. */
  readonly secret?: boolean;
  readonly description?: string;
}

export interface StringField<N extends string = string> extends BaseField<N> {
  readonly type: 'string';
  readonly default?: string;
}

export interface NumberField<N extends string = string> extends BaseField<N> {
  readonly type: 'number';
  readonly default?: number;
}

export interface EnumField<N extends string = string, V extends string = string> extends BaseField<N> {
  readonly type: 'enum';
  readonly values: readonly V[];
  readonly default?: V;
}

export type FieldDeclaration = StringField | NumberField | EnumField;

export type ConfigValue = string | number;

export type FieldValue<F> = F extends { readonly type: 'number' }
  ? number
  : F extends { readonly type: 'enum'; readonly values: readonly (infer V)[] }
    ? V
    : string;

/** Value types keyed by field name, e.g. `{ PORT: number; NODE_ENV: 'dev' | 'prod' }`. */
export type ConfigValues<F extends readonly FieldDeclaration[]> = {
  [D in F[number] as D['name']]: FieldValue<D>;
};

// ============================================================================
// Declaration validation
// ============================================================================

const baseShape = {
  name: z.string().min(1, 'field names must not be empty'),
  required: z.boolean(),
  secret: z.boolean().optional(),
  description: z.string().optional(),
};

const declarationSchema = z.discriminatedUnion('type', [
  z.object({ ...baseShape, type: z.literal('string'), default: z.string().optional() }).strict(),
  z.object({ ...baseShape, type: z.literal('number'), default: z.number().finite().optional() }).strict(),
  z
    .object({
      ...baseShape,
      type: z.literal('enum'),
      values: z.array(z.string().min(1)).nonempty('enum fields need at least one permitted value'),
      default: z.string().optional(),
    })
    .strict(),
]);

const declarationListSchema = z.array(declarationSchema).superRefine((fields, ctx) => {
  const seen = new Set<string>();
  fields.forEach((field, index) => {
    if (seen.has(field.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'name'],
        message: `duplicate field ${field.name}`,
      });
    }
    seen.add(field.name);

    if (field.type === 'enum') {
      if (new Set(field.values).size !== field.values.length) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, 'values'], message: 'permitted values must be unique' });
      }
      if (field.default !== undefined && !field.values.includes(field.default)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'default'],
          message: `default ${JSON.stringify(field.default)} is not one of ${field.values.join(', ')}`,
        });
      }
    }
  });
});

const schemaDocumentSchema = z.object({ fields: declarationListSchema }).strict();

function describeIssue(issue: z.ZodIssue, fields: unknown): string {
  const [index, ...rest] = issue.path;
  if (index === undefined) {
    return `schema: ${issue.message}`;
  }
  if (typeof index === 'string') {
    return `${[index, ...rest].join('.')}: ${issue.message}`;
  }
  const declared = Array.isArray(fields) ? nameOf(fields[index]) : undefined;
  return `${[declared ?? `#${index}`, ...rest].join('.')}: ${issue.message}`;
}

function nameOf(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null) {
    return undefined;
  }
  const name: unknown = Reflect.get(value, 'name');
  return typeof name === 'string' && name.length > 0 ? name : undefined;
}

// ============================================================================
// Schema
// ============================================================================

export class ConfigSchema<F extends readonly FieldDeclaration[] = readonly FieldDeclaration[]> {
  readonly fields: F;
  private readonly byName: ReadonlyMap<string, FieldDeclaration>;

  constructor(fields: F) {
    const result = declarationListSchema.safeParse(fields);
    if (!result.success) {
      throw new SchemaError('Invalid configuration schema', {
        component: 'ConfigSchema',
        problems: result.error.errors.map((issue) => describeIssue(issue, fields)),
      });
    }

    for (const field of fields) {
      Object.freeze(field);
    }
    Object.freeze(fields);
    this.fields = fields;
    this.byName = new Map(fields.map((field): [string, FieldDeclaration] => [field.name, field]));
    Object.freeze(this);
  }

  get size(): number {
    return this.fields.length;
  }

  field(name: string): FieldDeclaration | undefined {
    return this.byName.get(name);
  }

  /** Field names in declaration order. */
  names(): string[] {
    return this.fields.map((field) => field.name);
  }

  /** Names of fields marked `secret`, in declaration order. */
  secretFields(): string[] {
    return this.fields.filter((field) => field.secret === true).map((field) => field.name);
  }
}

/**
 * Declare a schema in code. Pass the fields `as const` to get precise value
 * types from `ValidatedConfig.get`.
 */
export function defineSchema<F extends readonly FieldDeclaration[]>(fields: F): ConfigSchema<F> {
  return new ConfigSchema(fields);
}

/**
 * Build a schema from a decoded JSON document of the form
 * `{ "fields": [ { "name": "PORT", "type": "number", "required": true } ] }`.
 */
export function parseSchemaDocument(document: unknown): ConfigSchema {
  const result = schemaDocumentSchema.safeParse(document);
  if (!result.success) {
    const fields: unknown = typeof document === 'object' && document !== null ? Reflect.get(document, 'fields') : undefined;
    throw new SchemaError('Invalid configuration schema', {
      component: 'ConfigSchema',
      problems: result.error.errors.map((issue) =>
        issue.path[0] === 'fields' && issue.path.length > 1
          ? describeIssue({ ...issue, path: issue.path.slice(1) }, fields)
          : describeIssue(issue, undefined),
      ),
    });
  }
  const declarations: readonly FieldDeclaration[] = result.data.fields;
  return new ConfigSchema(declarations);
}

export function loadSchemaFile(filePath: string): ConfigSchema {
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new SchemaError(`Failed to read schema file at ${filePath}`, {
      component: 'ConfigSchema',
      cause: error instanceof Error ? error : undefined,
    });
  }
  return parseSchemaDocument(document);
}
