/**
 * @gatehouse/observability
 *
 * Structured logging with Pino, shared by every workspace.
 */

export { createLogger, logger, redactTokens, redactObjectTokens } from './logger.js';
export type { Logger } from './logger.js';
