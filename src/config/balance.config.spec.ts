import { loadBalanceStoreConfig, resolveBalanceStoreOptions } from './balance.config';

describe('resolveBalanceStoreOptions', () => {
  it('fills in defaults', () => {
    const options = resolveBalanceStoreOptions();

    expect(options).toMatchObject({
      allowNegativeBalances: false,
      unknownUserPolicy: 'create',
      maxAttempts: 3,
      retryBaseDelayMs: 50,
      historyPageSize: 100,
    });
    expect(options.operationTimeoutMs).toBeUndefined();
    expect(typeof options.clock()).toBe('number');
  });

  it('ignores undefined overrides and keeps the given clock', () => {
    const clock = () => 42;

    const options = resolveBalanceStoreOptions({ maxAttempts: undefined, clock });

    expect(options.maxAttempts).toBe(3);
    expect(options.clock).toBe(clock);
  });

  it('throws on invalid values', () => {
    expect(() => resolveBalanceStoreOptions({ maxAttempts: 0 })).toThrow(/maxAttempts/);
    expect(() => resolveBalanceStoreOptions({ historyPageSize: 1.5 })).toThrow(/historyPageSize/);
  });
});

describe('loadBalanceStoreConfig', () => {
  it('reads BALANCE_* variables', () => {
    const options = loadBalanceStoreConfig({
      BALANCE_ALLOW_NEGATIVE: 'true',
      BALANCE_UNKNOWN_USER_POLICY: 'reject',
      BALANCE_MAX_ATTEMPTS: '5',
      BALANCE_RETRY_BASE_DELAY_MS: '0',
      BALANCE_OPERATION_TIMEOUT_MS: '250',
      BALANCE_HISTORY_PAGE_SIZE: '10',
    });

    expect(options).toMatchObject({
      allowNegativeBalances: true,
      unknownUserPolicy: 'reject',
      maxAttempts: 5,
      retryBaseDelayMs: 0,
      operationTimeoutMs: 250,
      historyPageSize: 10,
    });
  });

  it('falls back to defaults for unset variables', () => {
    expect(loadBalanceStoreConfig({ BALANCE_ALLOW_NEGATIVE: '0' })).toMatchObject({
      allowNegativeBalances: false,
      unknownUserPolicy: 'create',
      maxAttempts: 3,
    });
  });

  it('rejects malformed variables', () => {
    expect(() => loadBalanceStoreConfig({ BALANCE_UNKNOWN_USER_POLICY: 'maybe' })).toThrow(
      /Invalid balance store environment/,
    );
    expect(() => loadBalanceStoreConfig({ BALANCE_MAX_ATTEMPTS: 'many' })).toThrow(
      /Invalid balance store environment/,
    );
  });
});
