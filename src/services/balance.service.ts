// src/services/balance.service.ts
import { HttpException, Inject, Injectable, Logger } from '@nestjs/common';
import { DataSource, DataSourceOptions, EntityManager, QueryRunner } from 'typeorm';
import { BALANCE_STORE_OPTIONS } from '../balance.constants';
import {
    ConcurrentUpdateConflictException,
    CorruptBalanceDataException,
    InsufficientFundsException,
    InvalidBalanceRequestException,
    OperationCancelledException,
    StorageUnavailableException,
    UnknownUserException,
    UserAlreadyRegisteredException,
} from '../common/errors/balance.exceptions';
import { UserLockRegistry } from '../common/locks/user-lock.registry';
import { classifyTransient, driverErrorCode, withStorageRetry } from '../common/retry/storage-retry';
import {
    BalanceMutation,
    BalanceStoreOptions,
    CurrencyMap,
    HistoryQuery,
    OperationOptions,
    PastBalanceRecord,
} from '../common/types/balance.types';
import {
    AdjustBalanceSchema,
    CurrencyMapSchema,
    CurrencySchema,
    HistoryWindowDto,
    HistoryWindowSchema,
    SetBalanceSchema,
    UserIdSchema,
    parseRequest,
} from '../dto/balance.dto';
import { CurrentBalance } from '../entity/current-balance.entity';
import { PastBalance } from '../entity/past-balance.entity';
import { HistoryCursor } from './history.cursor';

// These drivers hand every query runner the same connection, so transactions
// cannot overlap and `SELECT ... FOR UPDATE` does not exist.
const SINGLE_CONNECTION_DRIVERS: ReadonlyArray<DataSourceOptions['type']> = [
    'sqlite',
    'better-sqlite3',
    'sqljs',
    'capacitor',
    'cordova',
    'expo',
    'react-native',
    'nativescript',
];

const DUPLICATE_KEY_CODES = new Set(['ER_DUP_ENTRY', '23505', 'SQLITE_CONSTRAINT_PRIMARYKEY']);

// user ids are unsigned, so this never collides with one
const GLOBAL_LOCK_KEY = -1;

@Injectable()
export class BalanceService {
    private readonly logger = new Logger(BalanceService.name);
    private readonly locks = new UserLockRegistry<number>();
    private readonly singleConnection: boolean;

    constructor(
        private readonly dataSource: DataSource,
        @Inject(BALANCE_STORE_OPTIONS) private readonly options: BalanceStoreOptions,
    ) {
        this.singleConnection = SINGLE_CONNECTION_DRIVERS.includes(dataSource.options.type);
    }

    // -----------------------------
    // Reads
    // -----------------------------

    /**
     * The user's currency mapping, or `{}` if the user has never been written.
     */
    async getCurrentBalance(userId: number, options: OperationOptions = {}): Promise<CurrencyMap> {
        const id = parseRequest(UserIdSchema, userId);

        return this.execute(id, false, options.signal, async () => {
            const row = await this.readRow(id, () =>
                this.dataSource.getRepository(CurrentBalance).findOneBy({ userId: id }),
            );
            return row ? this.toCurrencyMap(id, row.balances) : {};
        });
    }

    /**
     * Amount of a single currency, `0` when absent.
     */
    async getBalance(userId: number, currency: string, options: OperationOptions = {}): Promise<number> {
        const code = parseRequest(CurrencySchema, currency);
        const balances = await this.getCurrentBalance(userId, options);
        return amountOf(balances, code);
    }

    /**
     * Snapshots of the user in ascending `id` order, optionally limited to
     * `since <= changed <= until`. Arguments are checked now; rows are read
     * page by page as the cursor is iterated.
     */
    getHistory(userId: number, query: HistoryQuery = {}): HistoryCursor {
        const window = parseRequest(HistoryWindowSchema, {
            userId,
            since: query.since,
            until: query.until,
            pageSize: query.pageSize,
        });

        return new HistoryCursor(
            (afterId, limit) =>
                this.execute(window.userId, false, query.signal, () =>
                    this.fetchHistoryPage(window, afterId, limit),
                ),
            window.pageSize ?? this.options.historyPageSize,
        );
    }

    // -----------------------------
    // Writes
    // -----------------------------

    /**
     * Creates an empty balance row. Fails if the user already has one.
     */
    async registerUser(userId: number, options: OperationOptions = {}): Promise<void> {
        const id = parseRequest(UserIdSchema, userId);

        await this.execute(id, true, options.signal, (signal) =>
            this.inTransaction(id, signal, async (manager) => {
                const existing = await this.lockRow(manager, id, false);
                if (existing) {
                    throw new UserAlreadyRegisteredException(id);
                }
                try {
                    await manager.insert(CurrentBalance, { userId: id, balances: {} });
                } catch (error) {
                    // another process registered the same id between our read and insert
                    const code = driverErrorCode(error);
                    if (code !== undefined && DUPLICATE_KEY_CODES.has(code)) {
                        throw new UserAlreadyRegisteredException(id);
                    }
                    throw error;
                }
            }),
        );

        this.logger.debug(`Registered user ${id}`);
    }

    /**
     * Sets one currency of the user to `amount`, leaving the others untouched,
     * and records the resulting mapping in history.
     */
    async setBalance(
        userId: number,
        currency: string,
        amount: number,
        options: OperationOptions = {},
    ): Promise<BalanceMutation> {
        const request = parseRequest(SetBalanceSchema, { userId, currency, amount });

        if (!this.options.allowNegativeBalances && request.amount < 0) {
            throw new InvalidBalanceRequestException(['amount: negative balances are not allowed']);
        }

        const mutation = await this.mutate(request.userId, true, options.signal, (current) => ({
            ...current,
            [request.currency]: request.amount,
        }));

        this.logger.debug(`Set ${request.currency}=${request.amount} for user ${request.userId}`);
        return mutation;
    }

    /**
     * Adds `delta` (possibly negative) to one currency of the user and records
     * the resulting mapping in history. A missing currency counts as `0`.
     */
    async adjustBalance(
        userId: number,
        currency: string,
        delta: number,
        options: OperationOptions = {},
    ): Promise<BalanceMutation> {
        const request = parseRequest(AdjustBalanceSchema, { userId, currency, delta });
        const createMissing = this.options.unknownUserPolicy === 'create';

        const mutation = await this.mutate(request.userId, createMissing, options.signal, (current) => {
            const available = amountOf(current, request.currency);
            const next = available + request.delta;

            if (!Number.isFinite(next)) {
                throw new InvalidBalanceRequestException([`delta: ${request.currency} would overflow`]);
            }
            if (!this.options.allowNegativeBalances && next < 0) {
                throw new InsufficientFundsException(request.userId, request.currency, available, request.delta);
            }

            return { ...current, [request.currency]: next };
        });

        this.logger.debug(`Adjusted ${request.currency} by ${request.delta} for user ${request.userId}`);
        return mutation;
    }

    /**
     * Appends the user's present mapping to history. An unknown user gets an
     * empty snapshot; no current row is created for it.
     */
    async recordSnapshot(userId: number, options: OperationOptions = {}): Promise<PastBalanceRecord> {
        const id = parseRequest(UserIdSchema, userId);

        return this.execute(id, true, options.signal, (signal) =>
            this.inTransaction(id, signal, async (manager) => {
                const row = await this.lockRow(manager, id, false);
                const balances = row ? this.toCurrencyMap(id, row.balances) : {};
                return this.appendSnapshot(manager, id, balances);
            }),
        );
    }

    // -----------------------------
    // Core Posting Engine
    // -----------------------------

    private mutate(
        userId: number,
        createMissing: boolean,
        signal: AbortSignal | undefined,
        apply: (current: CurrencyMap) => CurrencyMap,
    ): Promise<BalanceMutation> {
        return this.execute(userId, true, signal, (active) =>
            this.inTransaction(userId, active, async (manager) => {
                const row = await this.lockRow(manager, userId, createMissing);
                if (!row) {
                    throw new UnknownUserException(userId);
                }

                const balances = apply(this.toCurrencyMap(userId, row.balances));
                await manager.update(CurrentBalance, { userId }, { balances });
                const snapshot = await this.appendSnapshot(manager, userId, balances);

                return { userId, balances, snapshot };
            }),
        );
    }

    /**
     * Wraps one operation with the timeout, the caller's signal, the per-user
     * lock and the transient-failure retry. An abort surfaces as
     * `OperationCancelledException`, or `StorageUnavailableException` when it
     * came from the timeout.
     */
    private async execute<T>(
        userId: number,
        exclusive: boolean,
        callerSignal: AbortSignal | undefined,
        work: (signal: AbortSignal) => Promise<T>,
    ): Promise<T> {
        const controller = new AbortController();
        const forward = () => controller.abort(callerSignal?.reason);
        if (callerSignal?.aborted) {
            forward();
        } else {
            callerSignal?.addEventListener('abort', forward, { once: true });
        }

        let timedOut = false;
        const timeoutMs = this.options.operationTimeoutMs;
        const timer =
            timeoutMs === undefined
                ? undefined
                : setTimeout(() => {
                    timedOut = true;
                    controller.abort();
                }, timeoutMs);

        const signal = controller.signal;
        const attempt = () =>
            withStorageRetry(
                () => {
                    signal.throwIfAborted();
                    return work(signal);
                },
                {
                    maxAttempts: this.options.maxAttempts,
                    baseDelayMs: this.options.retryBaseDelayMs,
                    signal,
                    onRetry: (n, kind, error) =>
                        this.logger.warn(
                            `Transient ${kind} failure for user ${userId} ` +
                            `(attempt ${n}/${this.options.maxAttempts}): ${messageOf(error)}`,
                        ),
                    exhausted: (kind, attempts, error) =>
                        kind === 'unreachable'
                            ? new StorageUnavailableException(userId, 'unreachable', error)
                            : new ConcurrentUpdateConflictException(userId, attempts, error),
                },
            );

        try {
            if (exclusive || this.singleConnection) {
                const key = this.singleConnection ? GLOBAL_LOCK_KEY : userId;
                return await this.locks.runExclusive(key, attempt, signal);
            }
            return await attempt();
        } catch (error) {
            if (signal.aborted && !(error instanceof HttpException)) {
                throw timedOut
                    ? new StorageUnavailableException(userId, 'timeout', error)
                    : new OperationCancelledException(userId, error);
            }
            throw error;
        } finally {
            if (timer !== undefined) clearTimeout(timer);
            callerSignal?.removeEventListener('abort', forward);
        }
    }

    /**
     * Runs `work` in one transaction over both tables. The signal is checked
     * right before commit; an abort up to that point rolls everything back.
     * A transient failure raised by the commit itself is not retryable: the
     * server may have committed, so it surfaces as an unknown outcome.
     */
    private async inTransaction<T>(
        userId: number,
        signal: AbortSignal,
        work: (manager: EntityManager) => Promise<T>,
    ): Promise<T> {
        const queryRunner = this.dataSource.createQueryRunner();
        let committing = false;

        try {
            await queryRunner.connect();
            await queryRunner.startTransaction();

            const result = await work(queryRunner.manager);
            signal.throwIfAborted();

            committing = true;
            await queryRunner.commitTransaction();
            return result;
        } catch (error) {
            await this.rollback(queryRunner);
            if (committing && classifyTransient(error) !== null) {
                this.logger.error(`Commit for user ${userId} failed with unknown outcome: ${messageOf(error)}`);
                throw new StorageUnavailableException(userId, 'outcome-unknown', error);
            }
            throw error;
        } finally {
            await queryRunner.release();
        }
    }

    private async rollback(queryRunner: QueryRunner): Promise<void> {
        if (!queryRunner.isTransactionActive) return;
        try {
            await queryRunner.rollbackTransaction();
        } catch (rollbackError) {
            this.logger.error(`Rollback failed: ${messageOf(rollbackError)}`);
        }
    }

    /**
     * Loads the user's row inside a transaction and locks it for the rest of
     * the transaction. With `createMissing` an empty row is inserted first, so
     * there is always a row to lock and concurrent first writes cannot race.
     */
    private async lockRow(
        manager: EntityManager,
        userId: number,
        createMissing: boolean,
    ): Promise<CurrentBalance | null> {
        if (createMissing) {
            await manager
                .createQueryBuilder()
                .insert()
                .into(CurrentBalance)
                .values({ userId, balances: {} })
                .orIgnore()
                .execute();
        }

        const query = manager
            .getRepository(CurrentBalance)
            .createQueryBuilder('current')
            .where('current.userId = :userId', { userId });

        if (!this.singleConnection) {
            query.setLock('pessimistic_write');
        }

        return this.readRow(userId, () => query.getOne());
    }

    private async appendSnapshot(
        manager: EntityManager,
        userId: number,
        balances: CurrencyMap,
    ): Promise<PastBalanceRecord> {
        const latest = await manager
            .createQueryBuilder(PastBalance, 'past')
            .select('MAX(past.changed)', 'changed')
            .where('past.userId = :userId', { userId })
            .getRawOne<{ changed: string | number | null }>();

        // keep `changed` non-decreasing per user even if the clock steps back
        const last = latest?.changed;
        const previous = last === null || last === undefined ? 0 : Number(last);
        const changed = Math.max(this.options.clock(), previous);

        const record = await manager.save(
            manager.create(PastBalance, { userId, balances: { ...balances }, changed }),
        );

        return { id: record.id, userId, balances: { ...balances }, changed };
    }

    private async fetchHistoryPage(
        window: HistoryWindowDto,
        afterId: number,
        limit: number,
    ): Promise<PastBalanceRecord[]> {
        const query = this.dataSource
            .getRepository(PastBalance)
            .createQueryBuilder('past')
            .where('past.userId = :userId', { userId: window.userId })
            .andWhere('past.id > :afterId', { afterId });

        if (window.since !== undefined) {
            query.andWhere('past.changed >= :since', { since: window.since });
        }
        if (window.until !== undefined) {
            query.andWhere('past.changed <= :until', { until: window.until });
        }

        const rows = await this.readRow(window.userId, () =>
            query.orderBy('past.id', 'ASC').limit(limit).getMany(),
        );

        return rows.map((row) => ({
            id: row.id,
            userId: row.userId,
            balances: this.toCurrencyMap(row.userId, row.balances),
            changed: row.changed,
        }));
    }

    // -----------------------------
    // Stored Data
    // -----------------------------

    /**
     * `simple-json` columns are parsed while TypeORM hydrates the entity, so
     * unreadable JSON shows up there as a `SyntaxError`.
     */
    private async readRow<T>(userId: number, read: () => Promise<T>): Promise<T> {
        try {
            return await read();
        } catch (error) {
            if (error instanceof SyntaxError) {
                this.logger.error(`Unparseable balances for user ${userId}: ${error.message}`);
                throw new CorruptBalanceDataException(userId, 'balances is not valid JSON', undefined, error);
            }
            throw error;
        }
    }

    private toCurrencyMap(userId: number, stored: unknown): CurrencyMap {
        const result = CurrencyMapSchema.safeParse(stored);
        if (result.success) {
            return result.data;
        }

        const issue = result.error.issues[0];
        const key = issue?.path[0];
        const currency = typeof key === 'string' ? key : undefined;
        const detail = currency ? `${currency}: ${issue?.message}` : issue?.message ?? 'invalid mapping';

        this.logger.error(`Invalid balances for user ${userId}: ${detail}`);
        throw new CorruptBalanceDataException(userId, detail, currency);
    }
}

function amountOf(balances: CurrencyMap, currency: string): number {
    return Object.hasOwn(balances, currency) ? balances[currency] : 0;
}

function messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
