/**
 * envguard command line
 *
 * check  - validate the environment against a schema document
 * redact - apply a closed set of redaction rules to JSON records
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { Logger } from '@envguard/core';
import { checkCommand, redactCommand } from './commands/index.js';
import { CLI_NAME, CLI_VERSION } from './lib/version.js';
import { createColors, shouldUseColors } from './ui/theme.js';
import type { CheckOptions, CommandIO, RedactOptions } from './types.js';

/**
 * Validate file path argument
 */
function validatePath(value: string): string {
  if (!value || value.trim() === '') {
    throw new InvalidArgumentError('Path cannot be empty');
  }
  return value.trim();
}

/**
 * Validate an environment variable name argument
 */
function validateVariableName(value: string): string {
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(value)) {
    throw new InvalidArgumentError('Must be a valid environment variable name');
  }
  return value;
}

export function createDefaultIO(): CommandIO {
  return {
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
    exit: (code) => process.exit(code),
    colors: createColors(shouldUseColors()),
  };
}

export function createProgram(io: CommandIO = createDefaultIO()): Command {
  const program = new Command();

  const commandContext = (): { io: CommandIO; logger: Logger } => {
    const verbose = program.getOptionValue('verbose') === true;
    const colorless = program.getOptionValue('color') === false;
    return {
      io: colorless ? { ...io, colors: createColors(false) } : io,
      logger: new Logger({ level: verbose ? 'debug' : 'warn', component: 'cli' }),
    };
  };

  program
    .name(CLI_NAME)
    .description('Fail-fast environment validation and field redaction')
    .version(CLI_VERSION, '-v, --version', 'Output the current version')
    .option('--verbose', 'Enable debug logging')
    .option('--no-color', 'Disable colored output')
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(str),
      outputError: (str, write) => {
        write(`\n${str}`);
      },
    });

  program
    .command('check')
    .description('Validate the environment against a schema document')
    .requiredOption('-s, --schema <path>', 'Path to the schema document', validatePath)
    .option('-e, --env-file <path>', 'Layer a .env file under the process environment', validatePath)
    .option('--json', 'Output in JSON format')
    .option('--show-secrets', 'Print secret fields unmasked')
    .action((options: CheckOptions) => {
      const { io: commandIO, logger } = commandContext();
      checkCommand(options, commandIO, logger);
    });

  program
    .command('redact')
    .description('Redact JSON records with a rules document')
    .requiredOption('-r, --rules <path>', 'Path to the rules document', validatePath)
    .requiredOption('-i, --input <path>', 'JSON record or array of records', validatePath)
    .addOption(new Option('-p, --params <json>', 'Parameterization, e.g. {"ssn":true}').conflicts('paramsEnv'))
    .addOption(
      new Option('--params-env <name>', 'Read the parameterization from an environment variable')
        .argParser(validateVariableName)
        .conflicts('params'),
    )
    .action((options: RedactOptions) => {
      const { io: commandIO, logger } = commandContext();
      redactCommand(options, commandIO, logger);
    });

  return program;
}
