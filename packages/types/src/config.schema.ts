/**
 * Ledger configuration schema
 * Parsed from environment variables by @ledger/core's loadLedgerConfig
 */

import { z } from "zod";
import { AddressSchema, MAX_BALANCE } from "./ledger.schema.js";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

/**
 * - LEDGER_CREATOR: address funded with the whole supply at construction
 * - LEDGER_INITIAL_SUPPLY: decimal integer, defaults to 0
 * - LOG_LEVEL: pino level, defaults to info
 */
export const LedgerConfigSchema = z
  .object({
    LEDGER_CREATOR: AddressSchema,
    LEDGER_INITIAL_SUPPLY: z
      .string()
      .trim()
      .regex(/^\d+$/, "LEDGER_INITIAL_SUPPLY must be a non-negative integer")
      .optional()
      .default("0")
      .transform((value, ctx) => {
        const supply = BigInt(value);
        if (supply > MAX_BALANCE) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: "LEDGER_INITIAL_SUPPLY exceeds the 64-bit range",
          });
          return z.NEVER;
        }
        return supply;
      }),
    LOG_LEVEL: z.enum(LOG_LEVELS).optional().default("info"),
  })
  .transform((env) => ({
    creator: env.LEDGER_CREATOR,
    initialSupply: env.LEDGER_INITIAL_SUPPLY,
    logLevel: env.LOG_LEVEL,
  }));

export type LedgerConfig = z.output<typeof LedgerConfigSchema>;
