/**
 * Fail-fast bootstrap: validate configuration before anything starts, or
 * report every problem and exit.
 */

import { wrapError, type EnvGuardError, type Logger } from '@envguard/core';
import {
  initialize,
  type ConfigSchema,
  type ConfigValues,
  type FieldDeclaration,
  type RawEnvironment,
  type ValidatedConfig,
} from '@envguard/config';
import { createColors, symbols, type Colors } from '../ui/theme.js';

export interface FailFastDeps {
  /** Environment to validate; process.env when absent */
  environment?: RawEnvironment;
  envFile?: string | boolean;
  logger?: Logger;
  stderr?: (text: string) => void;
  exit?: (code: number) => never;
  colors?: Colors;
}

/**
 * Render an error for the terminal: headline, full message, recovery hint
 */
export function formatFailure(error: EnvGuardError, headline: string, colors: Colors): string {
  const lines = [colors.error(`${symbols.error} ${headline}`), error.message];
  if (error.recoveryHint) {
    lines.push(colors.muted(error.recoveryHint));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Write a failure to stderr and exit with status 1
 */
export function reportFailure(
  error: unknown,
  context: { operation: string; headline: string },
  io: { stderr: (text: string) => void; exit: (code: number) => never; colors: Colors },
): never {
  const wrapped = wrapError(error, { component: 'Cli', operation: context.operation });
  io.stderr(formatFailure(wrapped, context.headline, io.colors));
  return io.exit(1);
}

/**
 * Validate the environment against a schema. Returns the validated
 * configuration, or writes the aggregate report and exits with status 1.
 */
export function initializeOrExit<F extends readonly FieldDeclaration[]>(
  schema: ConfigSchema<F>,
  deps: FailFastDeps = {},
): ValidatedConfig<ConfigValues<F>> {
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));
  const exit = deps.exit ?? ((code: number) => process.exit(code));

  try {
    return initialize(schema, deps.environment, { envFile: deps.envFile, logger: deps.logger });
  } catch (error) {
    return reportFailure(
      error,
      { operation: 'initialize', headline: 'Startup aborted' },
      { stderr, exit, colors: deps.colors ?? createColors(false) },
    );
  }
}
