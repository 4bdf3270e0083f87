import 'reflect-metadata';

export { BalanceModule } from './balance.module';
export { BALANCE_STORE_OPTIONS } from './balance.constants';
export { BalanceService } from './services/balance.service';
export { HistoryCursor } from './services/history.cursor';
export { BALANCE_ENTITIES, CurrentBalance, PastBalance } from './entity';
export { loadBalanceStoreConfig, resolveBalanceStoreOptions, DEFAULT_BALANCE_STORE_OPTIONS } from './config/balance.config';
export { UserLockRegistry } from './common/locks/user-lock.registry';
export { classifyTransient, withStorageRetry } from './common/retry/storage-retry';
export * from './common/errors/balance.exceptions';
export * from './common/types/balance.types';
