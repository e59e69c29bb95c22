import { describe, it, expect, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { SchemaError } from '@envguard/core';
import { defineSchema, parseSchemaDocument, loadSchemaFile } from '../schema.js';

function schemaProblems(fn: () => unknown): readonly string[] {
  try {
    fn();
  } catch (error) {
    if (error instanceof SchemaError) {
      return error.problems;
    }
    throw error;
  }
  throw new Error('expected a SchemaError');
}

describe('defineSchema', () => {
  it('keeps declaration order', () => {
    const schema = defineSchema([
      { name: 'B', type: 'string', required: true },
      { name: 'A', type: 'number', required: false },
    ] as const);

    expect(schema.names()).toEqual(['B', 'A']);
    expect(schema.size).toBe(2);
    expect(schema.field('A')?.type).toBe('number');
    expect(schema.field('C')).toBeUndefined();
  });

  it('rejects duplicate names', () => {
    const problems = schemaProblems(() =>
      defineSchema([
        { name: 'PORT', type: 'number', required: true },
        { name: 'PORT', type: 'string', required: false },
      ] as const),
    );

    expect(problems).toEqual(['PORT.name: duplicate field PORT']);
  });

  it('rejects enums without permitted values', () => {
    const problems = schemaProblems(() =>
      defineSchema([{ name: 'MODE', type: 'enum', values: [], required: true }] as const),
    );

    expect(problems).toEqual(['MODE.values: enum fields need at least one permitted value']);
  });

  it('rejects an enum default outside the permitted set', () => {
    const problems = schemaProblems(() =>
      defineSchema([{ name: 'MODE', type: 'enum', values: ['a', 'b'], required: false, default: 'c' }]),
    );

    expect(problems).toEqual(['MODE.default: default "c" is not one of a, b']);
  });

  it('lists secret fields', () => {
    const schema = defineSchema([
      { name: 'API_KEY', type: 'string', required: true, secret: true },
      { name: 'PORT', type: 'number', required: true },
      { name: 'TOKEN', type: 'string', required: false, secret: true },
    ] as const);

    expect(schema.secretFields()).toEqual(['API_KEY', 'TOKEN']);
  });

  it('freezes the declarations', () => {
    const schema = defineSchema([{ name: 'A', type: 'string', required: true }] as const);

    expect(Object.isFrozen(schema.fields)).toBe(true);
    expect(Object.isFrozen(schema.fields[0])).toBe(true);
  });
});

describe('parseSchemaDocument', () => {
  it('builds a schema from JSON data', () => {
    const schema = parseSchemaDocument({
      fields: [
        { name: 'NODE_ENV', type: 'enum', values: ['development', 'production'], required: true },
        { name: 'SECRET', type: 'string', required: true, secret: true },
      ],
    });

    expect(schema.names()).toEqual(['NODE_ENV', 'SECRET']);
    expect(schema.secretFields()).toEqual(['SECRET']);
  });

  it('rejects a document that is not an object', () => {
    expect(schemaProblems(() => parseSchemaDocument(null))).toEqual(['schema: Expected object, received null']);
  });

  it('rejects a missing field list', () => {
    expect(schemaProblems(() => parseSchemaDocument({}))).toEqual(['fields: Required']);
  });

  it('names the declaration that has an unknown type', () => {
    const problems = schemaProblems(() =>
      parseSchemaDocument({ fields: [{ name: 'FLAG', type: 'boolean', required: true }] }),
    );

    expect(problems).toHaveLength(1);
    expect(problems[0]?.startsWith('FLAG.type: ')).toBe(true);
  });

  it('rejects a number default on a string field', () => {
    const problems = schemaProblems(() =>
      parseSchemaDocument({ fields: [{ name: 'HOST', type: 'string', required: false, default: 80 }] }),
    );

    expect(problems).toEqual(['HOST.default: Expected string, received number']);
  });
});

describe('loadSchemaFile', () => {
  let tempDir: string | null = null;

  afterEach(() => {
    if (tempDir) {
      rmSync(tempDir, { recursive: true, force: true });
      tempDir = null;
    }
  });

  it('reads a schema from disk', () => {
    tempDir = mkdtempSync(join(tmpdir(), 'envguard-schema-'));
    const schemaPath = join(tempDir, 'schema.json');
    writeFileSync(schemaPath, JSON.stringify({ fields: [{ name: 'PORT', type: 'number', required: true }] }));

    expect(loadSchemaFile(schemaPath).names()).toEqual(['PORT']);
  });

  it('wraps unreadable files', () => {
    expect(() => loadSchemaFile('/nonexistent/envguard/schema.json')).toThrow(
      'Failed to read schema file at /nonexistent/envguard/schema.json',
    );
  });
});
