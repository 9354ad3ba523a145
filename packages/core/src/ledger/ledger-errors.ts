/**
 * Ledger Domain Errors
 *
 * TokenError subclasses are returned inside a LedgerResult, never thrown.
 * Each carries a stable `code` so callers can match on it without instanceof.
 * LedgerInputError and LedgerConfigError are thrown: they signal a broken
 * caller contract, not a ledger outcome.
 */

import type { Address, Balance } from '@ledger/types';

export type TokenErrorCode =
  | 'SELF_TRANSFER'
  | 'ZERO_AMOUNT'
  | 'INSUFFICIENT_BALANCE'
  | 'BALANCE_OVERFLOW'
  | 'SELF_APPROVAL'
  | 'INSUFFICIENT_ALLOWANCE';

export abstract class TokenError extends Error {
  abstract readonly code: TokenErrorCode;

  constructor(message: string) {
    super(message);
    this.name = 'TokenError';
  }
}

export class SelfTransferError extends TokenError {
  readonly code = 'SELF_TRANSFER' as const;

  constructor(address: Address) {
    super(`Cannot transfer from ${address} to itself`);
    this.name = 'SelfTransferError';
  }
}

export class ZeroAmountError extends TokenError {
  readonly code = 'ZERO_AMOUNT' as const;

  constructor() {
    super('Amount must be greater than zero');
    this.name = 'ZeroAmountError';
  }
}

export class InsufficientBalanceError extends TokenError {
  readonly code = 'INSUFFICIENT_BALANCE' as const;

  constructor(
    readonly required: Balance,
    readonly available: Balance
  ) {
    super(`Insufficient balance: required ${required}, available ${available}`);
    this.name = 'InsufficientBalanceError';
  }
}

export class BalanceOverflowError extends TokenError {
  readonly code = 'BALANCE_OVERFLOW' as const;

  constructor(address: Address) {
    super(`Crediting ${address} would exceed the maximum balance`);
    this.name = 'BalanceOverflowError';
  }
}

export class SelfApprovalError extends TokenError {
  readonly code = 'SELF_APPROVAL' as const;

  constructor(address: Address) {
    super(`${address} cannot approve itself as spender`);
    this.name = 'SelfApprovalError';
  }
}

export class InsufficientAllowanceError extends TokenError {
  readonly code = 'INSUFFICIENT_ALLOWANCE' as const;

  constructor(
    readonly required: Balance,
    readonly available: Balance
  ) {
    super(`Insufficient allowance: required ${required}, available ${available}`);
    this.name = 'InsufficientAllowanceError';
  }
}

export type LedgerError =
  | SelfTransferError
  | ZeroAmountError
  | InsufficientBalanceError
  | BalanceOverflowError
  | SelfApprovalError
  | InsufficientAllowanceError;

export class LedgerInputError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid ledger input: ${issues.join('; ')}`);
    this.name = 'LedgerInputError';
  }
}

export class LedgerConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid ledger configuration: ${issues.join('; ')}`);
    this.name = 'LedgerConfigError';
  }
}
