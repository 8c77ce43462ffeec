export type * from './types.js';
export { LOG_LEVELS, isLogLevel } from './types.js';
export { createRequestId, withLogContext, getLogContext } from './context.js';
export { createLogger, initObservability } from './logger.js';
export { redactSecrets, safeSnippet } from './redaction.js';
