/**
 * Ledger Service
 *
 * Wraps a TokenLedger for callers that construct it from configuration and
 * want an operational record of each mutation. Results are passed through
 * untouched; the service only observes them.
 */

import type { LedgerConfig } from '@ledger/types';
import { createLogger, logger as defaultLogger } from '@ledger/observability';
import type { Logger } from '@ledger/observability';
import { TokenLedger } from './token-ledger.js';
import type { LedgerError } from './ledger-errors.js';
import type {
  Address,
  ApproveParams,
  Balance,
  LedgerResult,
  LedgerSnapshot,
  TransferFromParams,
  TransferParams,
} from './ledger-types.js';

type LedgerOperation = 'transfer' | 'approve' | 'transferFrom';

function errorDetails(error: LedgerError): Record<string, Balance> {
  switch (error.code) {
    case 'INSUFFICIENT_BALANCE':
    case 'INSUFFICIENT_ALLOWANCE':
      return { required: error.required, available: error.available };
    default:
      return {};
  }
}

export class LedgerService {
  private readonly log: Logger;

  constructor(
    private readonly ledger: TokenLedger,
    log: Logger = defaultLogger
  ) {
    this.log = log.child({ module: 'ledger' });
  }

  /**
   * Build a ledger funded per `config`
   *
   * Without an explicit logger, one is created at `config.logLevel`.
   */
  static fromConfig(config: LedgerConfig, log?: Logger): LedgerService {
    const ledger = TokenLedger.create(config.creator, config.initialSupply);
    const service = new LedgerService(ledger, log ?? createLogger({ level: config.logLevel }));
    service.log.info(
      { creator: config.creator, totalSupply: config.initialSupply },
      'ledger created'
    );
    return service;
  }

  totalSupply(): Balance {
    return this.ledger.totalSupply();
  }

  balanceOf(address: Address): Balance {
    return this.ledger.balanceOf(address);
  }

  allowance(owner: Address, spender: Address): Balance {
    return this.ledger.allowance(owner, spender);
  }

  snapshot(): LedgerSnapshot {
    return this.ledger.snapshot();
  }

  transfer(params: TransferParams): LedgerResult {
    const result = this.ledger.transfer(params.from, params.to, params.amount);
    this.record('transfer', { ...params }, result);
    return result;
  }

  approve(params: ApproveParams): LedgerResult {
    const result = this.ledger.approve(params.owner, params.spender, params.amount);
    this.record('approve', { ...params }, result);
    return result;
  }

  transferFrom(params: TransferFromParams): LedgerResult {
    const result = this.ledger.transferFrom(
      params.spender,
      params.from,
      params.to,
      params.amount
    );
    this.record('transferFrom', { ...params }, result);
    return result;
  }

  private record(
    operation: LedgerOperation,
    params: Record<string, Address | Balance>,
    result: LedgerResult
  ): void {
    if (result.ok) {
      this.log.info({ operation, ...params }, `${operation} applied`);
      return;
    }

    this.log.warn(
      { operation, ...params, code: result.error.code, ...errorDetails(result.error) },
      `${operation} rejected: ${result.error.message}`
    );
  }
}
