import { DynamicModule, Module } from '@nestjs/common';
import { BALANCE_STORE_OPTIONS } from './balance.constants';
import { BalanceStoreOptions } from './common/types/balance.types';
import { loadBalanceStoreConfig, resolveBalanceStoreOptions } from './config/balance.config';
import { BalanceService } from './services/balance.service';

/**
 * Expects the host to make a TypeORM `DataSource` injectable (for instance
 * through `TypeOrmModule.forRoot`) with `BALANCE_ENTITIES` registered on it.
 */
@Module({})
export class BalanceModule {
  static forRoot(options: Partial<BalanceStoreOptions> = {}): DynamicModule {
    return {
      module: BalanceModule,
      providers: [
        { provide: BALANCE_STORE_OPTIONS, useValue: resolveBalanceStoreOptions(options) },
        BalanceService,
      ],
      exports: [BalanceService],
    };
  }

  static forRootFromEnv(env: NodeJS.ProcessEnv = process.env): DynamicModule {
    return {
      module: BalanceModule,
      providers: [
        { provide: BALANCE_STORE_OPTIONS, useFactory: () => loadBalanceStoreConfig(env) },
        BalanceService,
      ],
      exports: [BalanceService],
    };
  }
}
