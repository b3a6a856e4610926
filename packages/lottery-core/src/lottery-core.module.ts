import { type DynamicModule, Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { type LotteryConfig, LOTTERY_CONFIG, loadLotteryConfig } from "@lotto-stake/core-config";
import { DB_CLIENT, DbModule, type DbModuleOptions, type IDbClient } from "@lotto-stake/core-db";
import {
  type ILotteryEventRepository,
  InMemoryLotteryEventRepository,
  LOTTERY_EVENT_REPOSITORY,
  PgLotteryEventRepository,
} from "@lotto-stake/core-ledger";
import { type ILogger, LOGGER, LoggingModule } from "@lotto-stake/core-logging";
import { type IMetrics, METRICS, MetricsModule } from "@lotto-stake/core-metrics";
import { type IKeyValueStore, type ILockManager, KEY_VALUE_STORE, LOCK_MANAGER, RedisModule, type RedisModuleOptions } from "@lotto-stake/core-redis";
import { type Clock, SystemClock } from "@lotto-stake/core-types";
import { LOTTERY_SERVICE, LotteryService } from "./lottery.service";
import { LOTTERY_STATE_STORE, LotteryStateStore } from "./state-store";
import { CLOCK, LOTTERY_SYSTEM, type LotterySystem, createLotterySystem } from "./system";

export interface LotteryCoreModuleOptions {
  /** Skips reading `LOTTERY_*` settings. */
  config?: LotteryConfig;
  clock?: Clock;
  db?: DbModuleOptions;
  redis?: RedisModuleOptions;
  /** Load the saved snapshot while the module initializes. Defaults to true. */
  restoreState?: boolean;
}

@Module({})
export class LotteryCoreModule {
  static register(options: LotteryCoreModuleOptions = {}): DynamicModule {
    return {
      module: LotteryCoreModule,
      imports: [
        ConfigModule.forRoot({ isGlobal: true }),
        DbModule.forRoot(options.db),
        RedisModule.forRoot(options.redis),
        LoggingModule,
        MetricsModule,
      ],
      providers: [
        {
          provide: LOTTERY_CONFIG,
          inject: [ConfigService],
          useFactory: (config: ConfigService): LotteryConfig => options.config ?? loadLotteryConfig((key) => config.get<string>(key)),
        },
        {
          provide: CLOCK,
          useFactory: (): Clock => options.clock ?? new SystemClock(),
        },
        {
          provide: LOTTERY_SYSTEM,
          inject: [LOTTERY_CONFIG, CLOCK, LOGGER],
          useFactory: (config: LotteryConfig, clock: Clock, logger: ILogger) => createLotterySystem(config, { clock, logger }),
        },
        {
          provide: LOTTERY_EVENT_REPOSITORY,
          inject: [DB_CLIENT],
          useFactory: async (db: IDbClient | null): Promise<ILotteryEventRepository> => {
            if (!db) return new InMemoryLotteryEventRepository();
            const repository = new PgLotteryEventRepository(db);
            await repository.ensureSchema();
            return repository;
          },
        },
        {
          provide: LOTTERY_STATE_STORE,
          inject: [KEY_VALUE_STORE, LOTTERY_CONFIG],
          useFactory: (kv: IKeyValueStore, config: LotteryConfig) => new LotteryStateStore(kv, config.persistence.stateKey),
        },
        {
          provide: LOTTERY_SERVICE,
          inject: [LOTTERY_SYSTEM, LOCK_MANAGER, LOTTERY_EVENT_REPOSITORY, LOTTERY_STATE_STORE, LOGGER, METRICS, LOTTERY_CONFIG],
          useFactory: async (
            system: LotterySystem,
            lockManager: ILockManager,
            events: ILotteryEventRepository,
            stateStore: LotteryStateStore,
            logger: ILogger,
            metrics: IMetrics,
            config: LotteryConfig
          ) => {
            const service = new LotteryService({ system, lockManager, events, stateStore, logger, metrics, persistence: config.persistence });
            if (options.restoreState ?? true) {
              await service.restore();
            }
            return service;
          },
        },
      ],
      exports: [LOTTERY_CONFIG, CLOCK, LOTTERY_SYSTEM, LOTTERY_EVENT_REPOSITORY, LOTTERY_STATE_STORE, LOTTERY_SERVICE],
    };
  }
}
