// src/common/errors/balance.exceptions.ts
import {
    BadRequestException,
    ConflictException,
    HttpException,
    InternalServerErrorException,
    NotFoundException,
    ServiceUnavailableException,
} from '@nestjs/common';

// nginx's "client closed request"; Nest has no constant for it
const CLIENT_CLOSED_REQUEST = 499;

export class InvalidBalanceRequestException extends BadRequestException {
    constructor(readonly issues: string[]) {
        super({
            error: 'InvalidBalanceRequest',
            message: `Invalid balance request: ${issues.join('; ')}`,
            issues,
        });
    }
}

export class InsufficientFundsException extends BadRequestException {
    constructor(
        readonly userId: number,
        readonly currency: string,
        readonly available: number,
        readonly delta: number,
    ) {
        super({
            error: 'InsufficientFunds',
            message: `Insufficient ${currency} balance for user ${userId}`,
            userId,
            currency,
            available,
            delta,
        });
    }
}

export class UnknownUserException extends NotFoundException {
    constructor(readonly userId: number) {
        super({
            error: 'UnknownUser',
            message: `User ${userId} has no balance record`,
            userId,
        });
    }
}

export class UserAlreadyRegisteredException extends ConflictException {
    constructor(readonly userId: number) {
        super({
            error: 'UserAlreadyRegistered',
            message: `User ${userId} is already registered`,
            userId,
        });
    }
}

export class ConcurrentUpdateConflictException extends ConflictException {
    constructor(readonly userId: number, readonly attempts: number, cause?: unknown) {
        super(
            {
                error: 'ConcurrentUpdateConflict',
                message: `Balance of user ${userId} is contended, gave up after ${attempts} attempt(s)`,
                userId,
                attempts,
            },
            { cause },
        );
    }
}

export type StorageUnavailableReason = 'unreachable' | 'timeout' | 'outcome-unknown';

const STORAGE_UNAVAILABLE_MESSAGES: Record<StorageUnavailableReason, (userId: number) => string> = {
    unreachable: (userId) => `Balance storage unreachable while serving user ${userId}`,
    timeout: (userId) => `Balance operation for user ${userId} timed out`,
    'outcome-unknown': (userId) =>
        `Connection lost while committing for user ${userId}; the change may have been applied`,
};

export class StorageUnavailableException extends ServiceUnavailableException {
    constructor(
        readonly userId: number,
        readonly reason: StorageUnavailableReason,
        cause?: unknown,
    ) {
        super(
            {
                error: 'StorageUnavailable',
                message: STORAGE_UNAVAILABLE_MESSAGES[reason](userId),
                userId,
                reason,
            },
            { cause },
        );
    }
}

export class CorruptBalanceDataException extends InternalServerErrorException {
    constructor(
        readonly userId: number,
        readonly detail: string,
        readonly currency?: string,
        cause?: unknown,
    ) {
        super(
            {
                error: 'CorruptBalanceData',
                message: `Stored balances of user ${userId} are corrupt: ${detail}`,
                userId,
                currency,
            },
            { cause },
        );
    }
}

export class OperationCancelledException extends HttpException {
    constructor(readonly userId: number, cause?: unknown) {
        super(
            {
                error: 'OperationCancelled',
                message: `Balance operation for user ${userId} was cancelled`,
                userId,
            },
            CLIENT_CLOSED_REQUEST,
            { cause },
        );
    }
}
