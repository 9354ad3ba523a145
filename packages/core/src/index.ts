/**
 * @ledger/core - Token ledger domain logic
 *
 * Balances, allowances and a conserved total supply, plus the service and
 * configuration layer around them.
 */

export * from './ledger/index.js';
