import { describe, it, expect } from 'vitest';
import { MAX_BALANCE } from '@ledger/types';
import { loadLedgerConfig } from '../ledger-config.js';
import { LedgerConfigError } from '../ledger-errors.js';

function captureConfigError(env: NodeJS.ProcessEnv): LedgerConfigError {
  try {
    loadLedgerConfig(env);
  } catch (error) {
    if (error instanceof LedgerConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected loadLedgerConfig to throw');
}

describe('loadLedgerConfig', () => {
  it('should parse creator, supply and log level', () => {
    const config = loadLedgerConfig({
      LEDGER_CREATOR: 'treasury',
      LEDGER_INITIAL_SUPPLY: '1000',
      LOG_LEVEL: 'debug',
    });

    expect(config).toEqual({ creator: 'treasury', initialSupply: 1000n, logLevel: 'debug' });
  });

  it('should default supply to zero and level to info', () => {
    expect(loadLedgerConfig({ LEDGER_CREATOR: 'treasury' })).toEqual({
      creator: 'treasury',
      initialSupply: 0n,
      logLevel: 'info',
    });
  });

  it('should ignore unrelated variables', () => {
    const config = loadLedgerConfig({ LEDGER_CREATOR: 'treasury', HOME: '/home/test' });

    expect(Object.keys(config)).toEqual(['creator', 'initialSupply', 'logLevel']);
  });

  it('should accept the maximum supply without precision loss', () => {
    const config = loadLedgerConfig({
      LEDGER_CREATOR: 'treasury',
      LEDGER_INITIAL_SUPPLY: '18446744073709551615',
    });

    expect(config.initialSupply).toBe(MAX_BALANCE);
  });

  it('should reject a supply above the 64-bit range', () => {
    const error = captureConfigError({
      LEDGER_CREATOR: 'treasury',
      LEDGER_INITIAL_SUPPLY: '18446744073709551616',
    });

    expect(error.issues).toEqual([
      'LEDGER_INITIAL_SUPPLY: LEDGER_INITIAL_SUPPLY exceeds the 64-bit range',
    ]);
  });

  it('should reject a negative supply', () => {
    const error = captureConfigError({ LEDGER_CREATOR: 'treasury', LEDGER_INITIAL_SUPPLY: '-5' });

    expect(error.issues).toEqual([
      'LEDGER_INITIAL_SUPPLY: LEDGER_INITIAL_SUPPLY must be a non-negative integer',
    ]);
  });

  it('should require a creator', () => {
    const error = captureConfigError({});

    expect(error.message).toBe('Invalid ledger configuration: LEDGER_CREATOR: Required');
  });

  it('should report every invalid variable at once', () => {
    const error = captureConfigError({ LEDGER_INITIAL_SUPPLY: '1.5', LOG_LEVEL: 'verbose' });

    expect(error.issues).toHaveLength(3);
    expect(error.issues[0]).toBe('LEDGER_CREATOR: Required');
    expect(error.issues[1]).toBe(
      'LEDGER_INITIAL_SUPPLY: LEDGER_INITIAL_SUPPLY must be a non-negative integer'
    );
    expect(error.issues[2]).toMatch(/^LOG_LEVEL: /);
  });
});
