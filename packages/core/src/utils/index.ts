/**
 * Core Utilities Module
 *
 * Shared error taxonomy and logging.
 */

export * from './errors.js';
export * from './logger.js';
