/**
 * Token Ledger
 *
 * Balances, allowances and a fixed total supply for a single fungible token.
 *
 * Business rules:
 * - The sum of all balances always equals the total supply
 * - Checks run in a fixed order and the first failure is reported
 * - A rejected operation writes nothing
 *
 * Operations never log and never throw for ledger outcomes; malformed
 * arguments (negative or out-of-range amounts, empty addresses) throw
 * LedgerInputError before any state is read.
 */

import type { z } from 'zod';
import {
  ApproveInputSchema,
  CreateLedgerInputSchema,
  MAX_BALANCE,
  TransferFromInputSchema,
  TransferInputSchema,
} from '@ledger/types';
import type { Address, Balance } from '@ledger/types';
import { InMemoryLedgerStore } from './ledger-store.js';
import type { LedgerStore } from './ledger-store.js';
import {
  BalanceOverflowError,
  InsufficientAllowanceError,
  InsufficientBalanceError,
  LedgerInputError,
  SelfApprovalError,
  SelfTransferError,
  ZeroAmountError,
} from './ledger-errors.js';
import type { LedgerError } from './ledger-errors.js';
import type { LedgerResult, LedgerSnapshot } from './ledger-types.js';

type Rejection = { ok: false; error: LedgerError };

interface BalanceMove {
  ok: true;
  from: Address;
  to: Address;
  fromBalance: Balance;
  toBalance: Balance;
}

const OK: LedgerResult = { ok: true };

function reject(error: LedgerError): Rejection {
  return { ok: false, error };
}

function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new LedgerInputError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export class TokenLedger {
  private constructor(
    private readonly store: LedgerStore,
    private readonly supply: Balance
  ) {}

  /**
   * Create a ledger holding `initialSupply` at `creator`
   *
   * A supply of zero is legal.
   *
   * `store` is a test seam for reaching states construction alone cannot,
   * such as a balance at MAX_BALANCE. Only the creator's entry is written and
   * the supply is taken from `initialSupply`, so entries seeded for other
   * addresses are not counted in totalSupply() and conservation holds only
   * for an empty store.
   *
   * @throws {LedgerInputError} If creator is empty or initialSupply is out of range
   */
  static create(
    creator: Address,
    initialSupply: Balance,
    store: LedgerStore = new InMemoryLedgerStore()
  ): TokenLedger {
    const input = parseInput(CreateLedgerInputSchema, { creator, initialSupply });
    store.setBalance(input.creator, input.initialSupply);
    return new TokenLedger(store, input.initialSupply);
  }

  totalSupply(): Balance {
    return this.supply;
  }

  /**
   * Balance held by `address`, 0 if it was never credited
   */
  balanceOf(address: Address): Balance {
    return this.store.getBalance(address) ?? 0n;
  }

  /**
   * Remaining amount `spender` may move out of `owner`, 0 if never approved
   */
  allowance(owner: Address, spender: Address): Balance {
    return this.store.getAllowance(owner, spender) ?? 0n;
  }

  /**
   * Move `amount` from `from` to `to`
   *
   * Checks, in order: self transfer, zero amount, sender balance, recipient overflow.
   */
  transfer(from: Address, to: Address, amount: Balance): LedgerResult {
    const input = parseInput(TransferInputSchema, { from, to, amount });

    if (input.from === input.to) {
      return reject(new SelfTransferError(input.from));
    }
    if (input.amount === 0n) {
      return reject(new ZeroAmountError());
    }

    const move = this.planMove(input.from, input.to, input.amount);
    if (!move.ok) {
      return move;
    }

    this.applyMove(move);
    return OK;
  }

  /**
   * Set the allowance `owner` grants `spender` to exactly `amount`
   *
   * Overwrites any previous value. Zero is accepted and reads the same as
   * never having approved.
   */
  approve(owner: Address, spender: Address, amount: Balance): LedgerResult {
    const input = parseInput(ApproveInputSchema, { owner, spender, amount });

    if (input.owner === input.spender) {
      return reject(new SelfApprovalError(input.owner));
    }

    this.store.setAllowance(input.owner, input.spender, input.amount);
    return OK;
  }

  /**
   * Move `amount` from `from` to `to` on behalf of `spender`, consuming the
   * allowance `from` granted `spender`
   *
   * Checks, in order: self transfer, zero amount, allowance, sender balance,
   * recipient overflow. The allowance is checked before the balance, so a
   * call short on both reports InsufficientAllowanceError.
   */
  transferFrom(spender: Address, from: Address, to: Address, amount: Balance): LedgerResult {
    const input = parseInput(TransferFromInputSchema, { spender, from, to, amount });

    if (input.from === input.to) {
      return reject(new SelfTransferError(input.from));
    }
    if (input.amount === 0n) {
      return reject(new ZeroAmountError());
    }

    const allowed = this.allowance(input.from, input.spender);
    if (allowed < input.amount) {
      return reject(new InsufficientAllowanceError(input.amount, allowed));
    }

    const move = this.planMove(input.from, input.to, input.amount);
    if (!move.ok) {
      return move;
    }

    this.applyMove(move);
    this.store.setAllowance(input.from, input.spender, allowed - input.amount);
    return OK;
  }

  snapshot(): LedgerSnapshot {
    const allowances = new Map<Address, [Address, Balance][]>();
    for (const [owner, spender, amount] of this.store.allowances()) {
      const spenders = allowances.get(owner) ?? [];
      spenders.push([spender, amount]);
      allowances.set(owner, spenders);
    }

    return {
      totalSupply: this.supply,
      balances: Object.fromEntries(this.store.balances()),
      allowances: Object.fromEntries(
        Array.from(
          allowances,
          ([owner, spenders]): [Address, Record<Address, Balance>] => [
            owner,
            Object.fromEntries(spenders),
          ]
        )
      ),
    };
  }

  private planMove(from: Address, to: Address, amount: Balance): BalanceMove | Rejection {
    const fromBalance = this.balanceOf(from);
    if (fromBalance < amount) {
      return reject(new InsufficientBalanceError(amount, fromBalance));
    }

    const toBalance = this.balanceOf(to) + amount;
    if (toBalance > MAX_BALANCE) {
      return reject(new BalanceOverflowError(to));
    }

    return { ok: true, from, to, fromBalance: fromBalance - amount, toBalance };
  }

  // Only called once every check has passed
  private applyMove(move: BalanceMove): void {
    this.store.setBalance(move.from, move.fromBalance);
    this.store.setBalance(move.to, move.toBalance);
  }
}
