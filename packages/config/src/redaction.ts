/**
 * Secret Redaction for configuration output
 *
 * Printing a configuration is a redaction job like any other: fields the
 * schema marks `secret` form the parameterization, and each gets a
 * {@link secretRule}. The schema's secret flags stay declarations; they are
 * turned into a separate parameterization value here and never read back
 * from the config values.
 */

import {
  createRegistry,
  parameterizationFor,
  redact,
  secretRule,
  type RedactableRecord,
} from '@envguard/redaction';
import type { ValidatedConfig } from './validated-config.js';

/** The parts of a ValidatedConfig that printing needs; any field typing fits. */
export type PrintableConfig = Pick<ValidatedConfig, 'schema' | 'toObject'>;

/**
 * Copy of the configuration with every `secret` field masked.
 */
export function redactConfig(config: PrintableConfig): RedactableRecord {
  const secrets = config.schema.secretFields();
  const registry = createRegistry(secrets.map((name) => secretRule(name)));
  return redact(config.toObject(), parameterizationFor(secrets), registry);
}

export interface PrintConfigOptions {
  /** Mask `secret` fields (default: true). */
  redactSecrets?: boolean;
  /** Output sink (default: console.log). */
  write?: (text: string) => void;
}

/**
 * Print configuration as indented JSON
 */
export function printConfig(config: PrintableConfig, options: PrintConfigOptions = {}): void {
  const { redactSecrets: shouldRedact = true, write = (text: string) => console.log(text) } = options;

  const output = shouldRedact ? redactConfig(config) : config.toObject();

  write(JSON.stringify(output, null, 2));
}
