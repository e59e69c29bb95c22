/**
 * Check command - validate the environment against a schema
 */

import type { Logger } from '@envguard/core';
import { loadSchemaFile, printConfig, redactConfig, type ConfigSchema } from '@envguard/config';
import { initializeOrExit, reportFailure } from '../lib/fail-fast.js';
import { formatCount, symbols } from '../ui/theme.js';
import type { CheckOptions, CommandIO } from '../types.js';

export function checkCommand(options: CheckOptions, io: CommandIO, logger?: Logger): void {
  let schema: ConfigSchema;
  try {
    schema = loadSchemaFile(options.schema);
  } catch (error) {
    return reportFailure(error, { operation: 'check', headline: 'Schema rejected' }, io);
  }

  const config = initializeOrExit(schema, {
    environment: io.environment,
    envFile: options.envFile,
    logger,
    stderr: io.stderr,
    exit: io.exit,
    colors: io.colors,
  });

  if (options.json) {
    printConfig(config, {
      redactSecrets: !options.showSecrets,
      write: (text) => io.stdout(`${text}\n`),
    });
    return;
  }

  const { colors } = io;
  const values = options.showSecrets ? config.toObject() : redactConfig(config);

  io.stdout(
    `${colors.success(`${symbols.success} Configuration valid`)} ${colors.muted(`(${formatCount(config.keys().length, 'field')} set)`)}\n`,
  );
  for (const [name, value] of Object.entries(values)) {
    io.stdout(`  ${colors.highlight(name)} = ${String(value)}\n`);
  }
}
