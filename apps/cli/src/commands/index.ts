/**
 * Command exports
 */

export { checkCommand } from './check.js';
export { redactCommand, resolveParameterization, readRecords } from './redact.js';
