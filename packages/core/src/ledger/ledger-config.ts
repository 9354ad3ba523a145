import { LedgerConfigSchema } from '@ledger/types';
import type { LedgerConfig } from '@ledger/types';
import { LedgerConfigError } from './ledger-errors.js';

/**
 * Read ledger settings from the environment
 *
 * @throws {LedgerConfigError} Listing every invalid or missing variable
 */
export function loadLedgerConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const parsed = LedgerConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new LedgerConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return parsed.data;
}
