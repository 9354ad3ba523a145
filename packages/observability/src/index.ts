/**
 * @ledger/observability
 *
 * Structured logging for the token ledger.
 */

export { createLogger, logger } from './logger.js';
export type { Logger } from './logger.js';
