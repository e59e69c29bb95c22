/**
 * .env file support
 *
 * Only used when `initialize` reads the real process environment. A file
 * never overrides a variable the process already has, and files are never
 * read when NODE_ENV is production.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { EnvFileError } from '@envguard/core';

const SEARCH_NAMES = ['.env', '.env.local', '.env.development'] as const;

/**
 * Parse .env file content into key-value pairs
 */
export function parseEnvFile(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();

    if (!trimmed || trimmed.startsWith('#')) {
      continue;
    }

    const match = trimmed.match(/^(?:export\s+)?([^#=\s]+)\s*=(.*)$/);
    if (!match || match[1] === undefined || match[2] === undefined) {
      continue;
    }

    const key = match[1];
    let value = match[2].trim();

    if ((value.startsWith('"') && value.endsWith('"') && value.length >= 2) ||
        (value.startsWith("'") && value.endsWith("'") && value.length >= 2)) {
      value = value.slice(1, -1);
    } else {
      // Unquoted values may carry a trailing comment
      const comment = value.search(/\s#/);
      if (comment !== -1) {
        value = value.slice(0, comment).trimEnd();
      }
    }

    result[key] = value;
  }

  return result;
}

/**
 * Find the first .env file in a directory
 */
export function findEnvFile(startPath: string = process.cwd()): string | null {
  for (const name of SEARCH_NAMES) {
    const candidate = resolve(startPath, name);
    if (existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Read and parse a .env file. A path that was asked for explicitly must exist.
 */
export function readEnvFile(filePath: string): Record<string, string> {
  try {
    return parseEnvFile(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new EnvFileError(filePath, error instanceof Error ? error : undefined);
  }
}

/**
 * Layer a process environment over .env file values. Only defined process
 * values are copied; the process always wins.
 */
export function mergeEnvVars(
  envFileVars: Readonly<Record<string, string>>,
  processEnv: Readonly<Record<string, string | undefined>>,
): Record<string, string> {
  const result: Record<string, string> = { ...envFileVars };

  for (const [key, value] of Object.entries(processEnv)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }

  return result;
}
