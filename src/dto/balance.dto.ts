// src/dto/balance.dto.ts
import { z } from 'zod';
import { InvalidBalanceRequestException } from '../common/errors/balance.exceptions';

const MAX_USER_ID = 0xffffffff; // INT UNSIGNED

export const UserIdSchema = z.number().int().min(0).max(MAX_USER_ID);

export const CurrencySchema = z
    .string()
    .min(1)
    .max(64)
    .refine((code) => code !== '__proto__', { message: 'reserved currency code' });

export const AmountSchema = z.number().finite();

export const CurrencyMapSchema = z.record(CurrencySchema, AmountSchema);

export const SetBalanceSchema = z.object({
    userId: UserIdSchema,
    currency: CurrencySchema,
    amount: AmountSchema,
});

export type SetBalanceDto = z.infer<typeof SetBalanceSchema>;

export const AdjustBalanceSchema = z.object({
    userId: UserIdSchema,
    currency: CurrencySchema,
    delta: AmountSchema,
});

export type AdjustBalanceDto = z.infer<typeof AdjustBalanceSchema>;

const EpochOrDate = z.union([z.date(), z.number().finite()]).transform((value) =>
    value instanceof Date ? value.getTime() : value,
);

export const HistoryWindowSchema = z
    .object({
        userId: UserIdSchema,
        since: EpochOrDate.optional(),
        until: EpochOrDate.optional(),
        pageSize: z.number().int().positive().optional(),
    })
    .refine((w) => w.since === undefined || w.until === undefined || w.since <= w.until, {
        message: 'since must not be after until',
        path: ['since'],
    });

export type HistoryWindowDto = z.infer<typeof HistoryWindowSchema>;

/**
 * Parses `input` or throws `InvalidBalanceRequestException` listing every issue.
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
    const result = schema.safeParse(input);
    if (!result.success) {
        throw new InvalidBalanceRequestException(
            result.error.issues.map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`),
        );
    }
    return result.data;
}
