/**
 * Ledger Domain Types
 */

import type { Address, Balance } from '@ledger/types';
import type { LedgerError } from './ledger-errors.js';

/**
 * Outcome of a mutating ledger operation. A failed result leaves the
 * ledger exactly as it was before the call.
 */
export type LedgerResult = { ok: true } | { ok: false; error: LedgerError };

/**
 * Detached copy of ledger state
 */
export interface LedgerSnapshot {
  readonly totalSupply: Balance;
  readonly balances: Readonly<Record<Address, Balance>>;
  /** owner -> spender -> remaining allowance */
  readonly allowances: Readonly<Record<Address, Readonly<Record<Address, Balance>>>>;
}

export type {
  Address,
  Balance,
  TransferInput as TransferParams,
  ApproveInput as ApproveParams,
  TransferFromInput as TransferFromParams,
} from '@ledger/types';
