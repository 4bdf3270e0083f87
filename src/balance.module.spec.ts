import { DynamicModule, Logger, Module } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { DataSource } from 'typeorm';
import { BALANCE_STORE_OPTIONS } from './balance.constants';
import { BalanceModule } from './balance.module';
import { UnknownUserException } from './common/errors/balance.exceptions';
import { BalanceStoreOptions } from './common/types/balance.types';
import { BalanceService } from './services/balance.service';
import { createSqliteDataSource } from './testing/sqlite-data-source';

@Module({})
class HostDataSourceModule {
  static register(dataSource: DataSource): DynamicModule {
    return {
      module: HostDataSourceModule,
      global: true,
      providers: [{ provide: DataSource, useValue: dataSource }],
      exports: [DataSource],
    };
  }
}

describe('BalanceModule', () => {
  let dataSource: DataSource;

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(async () => {
    dataSource = await createSqliteDataSource();
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  it('provides a BalanceService bound to the host DataSource', async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [HostDataSourceModule.register(dataSource), BalanceModule.forRoot({ allowNegativeBalances: true })],
    }).compile();

    const service = moduleRef.get(BalanceService);
    const options = moduleRef.get<BalanceStoreOptions>(BALANCE_STORE_OPTIONS);

    expect(options.allowNegativeBalances).toBe(true);
    await expect(service.adjustBalance(1, 'gold', -2)).resolves.toMatchObject({ balances: { gold: -2 } });
    await moduleRef.close();
  });

  it('configures the store from the environment', async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [
        HostDataSourceModule.register(dataSource),
        BalanceModule.forRootFromEnv({ BALANCE_UNKNOWN_USER_POLICY: 'reject' }),
      ],
    }).compile();

    const service = moduleRef.get(BalanceService);

    await expect(service.adjustBalance(1, 'gold', 1)).rejects.toBeInstanceOf(UnknownUserException);
    await moduleRef.close();
  });

  it('refuses invalid options at registration', () => {
    expect(() => BalanceModule.forRoot({ maxAttempts: 0 })).toThrow(/Invalid balance store options/);
  });
});
