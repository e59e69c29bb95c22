/**
 * CLI type definitions
 */

import type { RawEnvironment } from '@envguard/config';
import type { Colors } from './ui/theme.js';

export interface CliOptions {
  /** Output in JSON format */
  json?: boolean;
  /** Enable debug logging */
  verbose?: boolean;
  /** Disable colored output */
  color?: boolean;
}

export interface CheckOptions extends CliOptions {
  /** Path to the schema declaration document */
  schema: string;
  /** Path to a .env file layered under the process environment */
  envFile?: string;
  /** Print secret fields unmasked */
  showSecrets?: boolean;
}

export interface RedactOptions extends CliOptions {
  /** Path to the rules document */
  rules: string;
  /** Parameterization as JSON text */
  params?: string;
  /** Environment variable holding the parameterization */
  paramsEnv?: string;
  /** Path to a JSON record or array of records */
  input: string;
}

/**
 * Process boundary handed to every command. Tests replace it wholesale.
 */
export interface CommandIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  exit: (code: number) => never;
  /** Environment read by `check`; process.env when absent */
  environment?: RawEnvironment;
  colors: Colors;
}
