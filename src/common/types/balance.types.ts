// src/common/types/balance.types.ts

/**
 * Currency code -> amount held by one user at one point in time.
 */
export type CurrencyMap = Record<string, number>;

/**
 * What `adjustBalance` does when the user has no `current_balance` row yet.
 * - `create`: start from an empty mapping and commit the row with the change.
 * - `reject`: fail with `UnknownUserException`.
 */
export type UnknownUserPolicy = 'create' | 'reject';

export interface BalanceStoreOptions {
    allowNegativeBalances: boolean;
    unknownUserPolicy: UnknownUserPolicy;
    /** Attempts per operation, the first one included. */
    maxAttempts: number;
    retryBaseDelayMs: number;
    /** Aborts operations that have not committed after this many ms. */
    operationTimeoutMs?: number;
    historyPageSize: number;
    /** Source of `changed` timestamps, epoch ms. */
    clock: () => number;
}

export interface OperationOptions {
    signal?: AbortSignal;
}

export interface HistoryQuery extends OperationOptions {
    since?: Date | number;
    until?: Date | number;
    pageSize?: number;
}

export interface PastBalanceRecord {
    id: number;
    userId: number;
    balances: CurrencyMap;
    changed: number;
}

export interface BalanceMutation {
    userId: number;
    balances: CurrencyMap;
    snapshot: PastBalanceRecord;
}
