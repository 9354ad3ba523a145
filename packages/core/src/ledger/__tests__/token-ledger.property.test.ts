/**
 * Property tests for ledger invariants over random operation sequences
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { TokenLedger } from '../token-ledger.js';
import type { LedgerResult } from '../ledger-types.js';

const ADDRESSES = ['alice', 'bob', 'carol', 'dave'] as const;
const SUPPLY = 1000n;

const address = fc.constantFrom(...ADDRESSES);
const amount = fc.bigInt({ min: 0n, max: 1500n });

const operation = fc.oneof(
  fc.record({ kind: fc.constant('transfer' as const), from: address, to: address, amount }),
  fc.record({
    kind: fc.constant('approve' as const),
    owner: address,
    spender: address,
    amount,
  }),
  fc.record({
    kind: fc.constant('transferFrom' as const),
    spender: address,
    from: address,
    to: address,
    amount,
  })
);

type Operation = typeof operation extends fc.Arbitrary<infer T> ? T : never;

function apply(ledger: TokenLedger, op: Operation): LedgerResult {
  switch (op.kind) {
    case 'transfer':
      return ledger.transfer(op.from, op.to, op.amount);
    case 'approve':
      return ledger.approve(op.owner, op.spender, op.amount);
    case 'transferFrom':
      return ledger.transferFrom(op.spender, op.from, op.to, op.amount);
  }
}

function sumOfBalances(ledger: TokenLedger): bigint {
  return Object.values(ledger.snapshot().balances).reduce((sum, balance) => sum + balance, 0n);
}

function allowanceGrid(ledger: TokenLedger): Map<string, bigint> {
  const grid = new Map<string, bigint>();
  for (const owner of ADDRESSES) {
    for (const spender of ADDRESSES) {
      grid.set(`${owner}->${spender}`, ledger.allowance(owner, spender));
    }
  }
  return grid;
}

describe('TokenLedger invariants', () => {
  it('should conserve the total supply across any operation sequence', () => {
    fc.assert(
      fc.property(fc.array(operation, { maxLength: 50 }), (ops) => {
        const ledger = TokenLedger.create('alice', SUPPLY);
        for (const op of ops) {
          apply(ledger, op);
          expect(sumOfBalances(ledger)).toBe(SUPPLY);
          expect(ledger.totalSupply()).toBe(SUPPLY);
        }
      })
    );
  });

  it('should leave state unchanged after any rejected operation', () => {
    fc.assert(
      fc.property(fc.array(operation, { maxLength: 50 }), (ops) => {
        const ledger = TokenLedger.create('alice', SUPPLY);
        for (const op of ops) {
          const before = ledger.snapshot();
          const result = apply(ledger, op);
          if (!result.ok) {
            expect(ledger.snapshot()).toEqual(before);
          }
        }
      })
    );
  });

  it('should decrement exactly one allowance by the amount moved', () => {
    fc.assert(
      fc.property(fc.array(operation, { maxLength: 50 }), (ops) => {
        const ledger = TokenLedger.create('alice', SUPPLY);
        for (const op of ops) {
          const before = allowanceGrid(ledger);
          const result = apply(ledger, op);
          if (op.kind !== 'transferFrom' || !result.ok) {
            continue;
          }

          const expected = new Map(before);
          const key = `${op.from}->${op.spender}`;
          expected.set(key, (before.get(key) ?? 0n) - op.amount);
          expect(allowanceGrid(ledger)).toEqual(expected);
        }
      })
    );
  });

  it('should keep only the last approved amount', () => {
    fc.assert(
      fc.property(
        address,
        address,
        fc.array(amount, { minLength: 1, maxLength: 10 }),
        (owner, spender, amounts) => {
          fc.pre(owner !== spender);
          const ledger = TokenLedger.create('alice', SUPPLY);
          for (const value of amounts) {
            ledger.approve(owner, spender, value);
          }
          expect(ledger.allowance(owner, spender)).toBe(amounts[amounts.length - 1]);
        }
      )
    );
  });

  it('should read zero for addresses and pairs never written', () => {
    fc.assert(
      fc.property(fc.string({ minLength: 1 }), fc.string({ minLength: 1 }), (owner, spender) => {
        fc.pre(owner !== 'alice');
        const ledger = TokenLedger.create('alice', SUPPLY);
        expect(ledger.balanceOf(owner)).toBe(0n);
        expect(ledger.allowance(owner, spender)).toBe(0n);
      })
    );
  });
});
