export { initializeOrExit, reportFailure, formatFailure, type FailFastDeps } from './fail-fast.js';
export { loadRulesFile, parseRulesDocument, toRule, type RuleDeclaration } from './rules-file.js';
export { CLI_NAME, CLI_VERSION } from './version.js';
