// src/config/balance.config.ts
import { z } from 'zod';
import { BalanceStoreOptions } from '../common/types/balance.types';

export const DEFAULT_BALANCE_STORE_OPTIONS: BalanceStoreOptions = {
    allowNegativeBalances: false,
    unknownUserPolicy: 'create',
    maxAttempts: 3,
    retryBaseDelayMs: 50,
    historyPageSize: 100,
    clock: () => Date.now(),
};

const BalanceStoreOptionsSchema = z.object({
    allowNegativeBalances: z.boolean(),
    unknownUserPolicy: z.enum(['create', 'reject']),
    maxAttempts: z.number().int().min(1).max(20),
    retryBaseDelayMs: z.number().int().min(0),
    operationTimeoutMs: z.number().int().positive().optional(),
    historyPageSize: z.number().int().min(1).max(10_000),
    clock: z.function().returns(z.number()),
});

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .transform((value) => value === 'true' || value === '1');

const BalanceStoreEnvSchema = z.object({
    BALANCE_ALLOW_NEGATIVE: booleanFlag.optional(),
    BALANCE_UNKNOWN_USER_POLICY: z.enum(['create', 'reject']).optional(),
    BALANCE_MAX_ATTEMPTS: z.coerce.number().int().optional(),
    BALANCE_RETRY_BASE_DELAY_MS: z.coerce.number().int().optional(),
    BALANCE_OPERATION_TIMEOUT_MS: z.coerce.number().int().optional(),
    BALANCE_HISTORY_PAGE_SIZE: z.coerce.number().int().optional(),
});

function describeIssues(error: z.ZodError): string {
    return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

/**
 * Fills in defaults and validates. Throws on the first invalid option set,
 * so a misconfigured module fails at bootstrap rather than on first use.
 */
export function resolveBalanceStoreOptions(
    overrides: Partial<BalanceStoreOptions> = {},
): BalanceStoreOptions {
    const merged: BalanceStoreOptions = { ...DEFAULT_BALANCE_STORE_OPTIONS };
    for (const [key, value] of Object.entries(overrides)) {
        if (value !== undefined) {
            Object.assign(merged, { [key]: value });
        }
    }

    const result = BalanceStoreOptionsSchema.safeParse(merged);
    if (!result.success) {
        throw new Error(`Invalid balance store options: ${describeIssues(result.error)}`);
    }
    // zod wraps functions in a validating proxy; keep the caller's clock as given
    return { ...result.data, clock: merged.clock };
}

/**
 * Reads `BALANCE_*` variables. Unset variables fall back to the defaults.
 */
export function loadBalanceStoreConfig(env: NodeJS.ProcessEnv = process.env): BalanceStoreOptions {
    const result = BalanceStoreEnvSchema.safeParse(env);
    if (!result.success) {
        throw new Error(`Invalid balance store environment: ${describeIssues(result.error)}`);
    }
    const vars = result.data;

    return resolveBalanceStoreOptions({
        allowNegativeBalances: vars.BALANCE_ALLOW_NEGATIVE,
        unknownUserPolicy: vars.BALANCE_UNKNOWN_USER_POLICY,
        maxAttempts: vars.BALANCE_MAX_ATTEMPTS,
        retryBaseDelayMs: vars.BALANCE_RETRY_BASE_DELAY_MS,
        operationTimeoutMs: vars.BALANCE_OPERATION_TIMEOUT_MS,
        historyPageSize: vars.BALANCE_HISTORY_PAGE_SIZE,
    });
}
