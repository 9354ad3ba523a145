/**
 * Ledger Store
 *
 * State access layer for balances and allowances.
 * Plain reads and writes with no business rules; absence is reported as
 * undefined and left to the ledger to interpret.
 */

import type { Address, Balance } from '@ledger/types';

export interface LedgerStore {
  getBalance(address: Address): Balance | undefined;
  setBalance(address: Address, balance: Balance): void;
  getAllowance(owner: Address, spender: Address): Balance | undefined;
  setAllowance(owner: Address, spender: Address, amount: Balance): void;
  balances(): Iterable<[Address, Balance]>;
  allowances(): Iterable<[owner: Address, spender: Address, amount: Balance]>;
}

export class InMemoryLedgerStore implements LedgerStore {
  private readonly balanceEntries = new Map<Address, Balance>();
  // Keyed owner first so (a, b) and (b, a) never share an entry
  private readonly allowanceEntries = new Map<Address, Map<Address, Balance>>();

  getBalance(address: Address): Balance | undefined {
    return this.balanceEntries.get(address);
  }

  setBalance(address: Address, balance: Balance): void {
    this.balanceEntries.set(address, balance);
  }

  getAllowance(owner: Address, spender: Address): Balance | undefined {
    return this.allowanceEntries.get(owner)?.get(spender);
  }

  setAllowance(owner: Address, spender: Address, amount: Balance): void {
    let spenders = this.allowanceEntries.get(owner);
    if (!spenders) {
      spenders = new Map();
      this.allowanceEntries.set(owner, spenders);
    }
    spenders.set(spender, amount);
  }

  *balances(): IterableIterator<[Address, Balance]> {
    yield* this.balanceEntries;
  }

  *allowances(): IterableIterator<[Address, Address, Balance]> {
    for (const [owner, spenders] of this.allowanceEntries) {
      for (const [spender, amount] of spenders) {
        yield [owner, spender, amount];
      }
    }
  }
}
