// src/common/retry/storage-retry.ts
import { setTimeout as sleep } from 'node:timers/promises';
import { QueryFailedError } from 'typeorm';

export type TransientKind = 'unreachable' | 'conflict';

// mysql2 / pg / sqlite error codes
const UNREACHABLE_CODES = new Set([
    'ECONNREFUSED',
    'ECONNRESET',
    'ETIMEDOUT',
    'EPIPE',
    'EHOSTUNREACH',
    'ENOTFOUND',
    'PROTOCOL_CONNECTION_LOST',
    'ER_CON_COUNT_ERROR',
    '08000',
    '08001',
    '08003',
    '08006',
    '57P01',
    '57P03',
]);

const CONFLICT_CODES = new Set([
    'ER_LOCK_DEADLOCK',
    'ER_LOCK_WAIT_TIMEOUT',
    '40001',
    '40P01',
    'SQLITE_BUSY',
    'SQLITE_LOCKED',
]);

export function driverErrorCode(error: unknown): string | undefined {
    if (error instanceof QueryFailedError) {
        return driverErrorCode(error.driverError);
    }
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

export function classifyTransient(error: unknown): TransientKind | null {
    const code = driverErrorCode(error);
    if (code === undefined) return null;
    if (UNREACHABLE_CODES.has(code)) return 'unreachable';
    if (CONFLICT_CODES.has(code)) return 'conflict';
    return null;
}

export interface StorageRetryOptions {
    maxAttempts: number;
    baseDelayMs: number;
    signal?: AbortSignal;
    onRetry?: (attempt: number, kind: TransientKind, error: unknown) => void;
    /** Builds the error thrown once a transient failure outlives every attempt. */
    exhausted: (kind: TransientKind, attempts: number, error: unknown) => Error;
}

/**
 * Runs `task` until it succeeds, fails with a non-transient error, or
 * `maxAttempts` is reached. Waits `baseDelayMs * 2^(n-1)` before attempt n+1.
 */
export async function withStorageRetry<T>(
    task: (attempt: number) => Promise<T>,
    options: StorageRetryOptions,
): Promise<T> {
    for (let attempt = 1; ; attempt++) {
        try {
            return await task(attempt);
        } catch (error) {
            const kind = classifyTransient(error);
            if (kind === null) throw error;
            if (attempt >= options.maxAttempts) {
                throw options.exhausted(kind, attempt, error);
            }

            options.onRetry?.(attempt, kind, error);
            const delay = options.baseDelayMs * 2 ** (attempt - 1);
            if (delay > 0) {
                await sleep(delay, undefined, { signal: options.signal });
            }
        }
    }
}
