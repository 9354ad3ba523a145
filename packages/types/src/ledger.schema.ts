/**
 * Ledger value schemas for addresses, balances and operation inputs
 * Used to validate every argument before the ledger touches its state
 */

import { z } from "zod";

/**
 * Largest representable balance (unsigned 64-bit)
 */
export const MAX_BALANCE = 2n ** 64n - 1n;

/**
 * Opaque account identifier, compared by value
 */
export const AddressSchema = z.string().min(1, "Address must not be empty");

/**
 * Token quantity in base units: 0 through MAX_BALANCE inclusive
 */
export const BalanceSchema = z
  .bigint()
  .nonnegative("Balance must not be negative")
  .max(MAX_BALANCE, "Balance exceeds the 64-bit range");

export const CreateLedgerInputSchema = z.object({
  creator: AddressSchema,
  initialSupply: BalanceSchema,
});

export const TransferInputSchema = z.object({
  from: AddressSchema,
  to: AddressSchema,
  amount: BalanceSchema,
});

export const ApproveInputSchema = z.object({
  owner: AddressSchema,
  spender: AddressSchema,
  amount: BalanceSchema,
});

/**
 * Delegated transfer: `spender` moves `amount` out of `from` under the
 * allowance `from` granted it
 */
export const TransferFromInputSchema = TransferInputSchema.extend({
  spender: AddressSchema,
});

export type Address = z.infer<typeof AddressSchema>;
export type Balance = z.infer<typeof BalanceSchema>;
export type TransferInput = z.infer<typeof TransferInputSchema>;
export type ApproveInput = z.infer<typeof ApproveInputSchema>;
export type TransferFromInput = z.infer<typeof TransferFromInputSchema>;
