/**
 * @envguard/redaction - Parameterization-driven, field-level redaction.
 *
 * ```typescript
 * import { createRegistry, markerRule, redact } from '@envguard/redaction';
 *
 * const registry = createRegistry([markerRule('firstName'), markerRule('ssn')]);
 * redact({ firstName: 'Ada', ssn: '000000000' }, { firstName: false, ssn: true }, registry);
 * // => { firstName: 'Ada', ssn: '[REDACTED]' }
 * ```
 */

export type { RedactableRecord, RedactionRule, PartialMaskOptions } from './rules.js';
export {
  REDACTED_MARKER,
  SECRET_PLACEHOLDER,
  transformRule,
  markerRule,
  partialMaskRule,
  secretRule,
  omitRule,
} from './rules.js';
export { RedactionRegistry, createRegistry } from './registry.js';
export type { ParameterizationSpec } from './parameterization.js';
export { parseParameterization, toParameterization, parameterizationFor } from './parameterization.js';
export type { RedactionEngineOptions } from './engine.js';
export { RedactionEngine, redact } from './engine.js';
