/**
 * @envguard/core - Error taxonomy and structured logging shared by every
 * envguard package.
 */

export * from './utils/index.js';
