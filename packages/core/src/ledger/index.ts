/**
 * Ledger Domain
 *
 * Public exports for the token ledger
 */

// Core state machine
export { TokenLedger } from './token-ledger.js';

// State access layer
export { InMemoryLedgerStore } from './ledger-store.js';
export type { LedgerStore } from './ledger-store.js';

// Service layer
export { LedgerService } from './ledger-service.js';
export { loadLedgerConfig } from './ledger-config.js';

// Domain types
export type {
  Address,
  Balance,
  LedgerResult,
  LedgerSnapshot,
  TransferParams,
  ApproveParams,
  TransferFromParams,
} from './ledger-types.js';

// Domain errors
export {
  TokenError,
  SelfTransferError,
  ZeroAmountError,
  InsufficientBalanceError,
  BalanceOverflowError,
  SelfApprovalError,
  InsufficientAllowanceError,
  LedgerInputError,
  LedgerConfigError,
} from './ledger-errors.js';
export type { LedgerError, TokenErrorCode } from './ledger-errors.js';
