import { DynamicModule, Module, Provider } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { DbModule, DB_CLIENT, DbModuleOptions, IDbClient } from "@coin-casino/core-db";
import { RedisModule, KEY_VALUE_STORE, LOCK_MANAGER, RedisModuleOptions, IKeyValueStore, ILockManager } from "@coin-casino/core-redis";
import { LoggingModule, LOGGER, ILogger } from "@coin-casino/core-logging";
import { MetricsModule, METRICS, IMetrics } from "@coin-casino/core-metrics";
import { DbGameConfigService, GAME_CONFIG_SERVICE, StaticGameConfigService } from "@coin-casino/core-config";
import { CryptoRandomSource, IRandomSource, RANDOM_SOURCE } from "@coin-casino/core-rng";
import { WAGER_VALIDATOR, WagerValidator } from "@coin-casino/core-risk";
import {
  AccountLedger,
  CoinRequestLedger,
  ILedgerStore,
  LEDGER_STORE,
  MemoryLedgerStore,
  PgLedgerStore,
  SettlementLedger,
  StoreBackend,
} from "@coin-casino/core-ledger";
import { CasinoService } from "./casino.service";

export type GameConfigOverrides = ConstructorParameters<typeof StaticGameConfigService>[0];

export interface CasinoEngineModuleOptions {
  /** Falls back to STORE_BACKEND, then "memory". */
  store?: StoreBackend;
  db?: DbModuleOptions;
  redis?: RedisModuleOptions;
  /** Only read by the memory store; postgres reads the game_configs table. */
  gameConfig?: GameConfigOverrides;
  random?: IRandomSource;
}

export function resolveStoreBackend(raw: string | undefined): StoreBackend {
  const value = (raw ?? "memory").trim().toLowerCase();
  if (value === "memory" || value === "postgres") {
    return value;
  }
  throw new Error(`STORE_BACKEND must be "memory" or "postgres", got "${raw}"`);
}

function storeProviders(backend: StoreBackend, options: CasinoEngineModuleOptions): Provider[] {
  if (backend === "postgres") {
    return [
      {
        provide: LEDGER_STORE,
        inject: [DB_CLIENT],
        useFactory: (db: IDbClient): ILedgerStore => new PgLedgerStore(db),
      },
      {
        provide: GAME_CONFIG_SERVICE,
        inject: [DB_CLIENT, KEY_VALUE_STORE],
        useFactory: (db: IDbClient, kv: IKeyValueStore) => new DbGameConfigService(db, kv),
      },
    ];
  }
  return [
    { provide: LEDGER_STORE, useFactory: (): ILedgerStore => new MemoryLedgerStore() },
    { provide: GAME_CONFIG_SERVICE, useFactory: () => new StaticGameConfigService(options.gameConfig) },
  ];
}

@Module({})
export class CasinoEngineModule {
  static register(options: CasinoEngineModuleOptions = {}): DynamicModule {
    const backend = options.store ?? resolveStoreBackend(process.env.STORE_BACKEND);

    return {
      module: CasinoEngineModule,
      imports: [
        ConfigModule.forRoot({ isGlobal: true }),
        ...(backend === "postgres" ? [DbModule.forRoot(options.db)] : []),
        LoggingModule,
        RedisModule.forRoot(options.redis),
        MetricsModule,
      ],
      providers: [
        ...storeProviders(backend, options),
        { provide: WAGER_VALIDATOR, useClass: WagerValidator },
        { provide: RANDOM_SOURCE, useFactory: (): IRandomSource => options.random ?? new CryptoRandomSource() },
        {
          provide: AccountLedger,
          inject: [LEDGER_STORE, LOCK_MANAGER, LOGGER],
          useFactory: (store: ILedgerStore, locks: ILockManager, logger: ILogger) => new AccountLedger(store, locks, logger),
        },
        {
          provide: SettlementLedger,
          inject: [LEDGER_STORE, LOCK_MANAGER, LOGGER, METRICS],
          useFactory: (store: ILedgerStore, locks: ILockManager, logger: ILogger, metrics: IMetrics) =>
            new SettlementLedger(store, locks, logger, metrics),
        },
        {
          provide: CoinRequestLedger,
          inject: [LEDGER_STORE, LOCK_MANAGER, LOGGER, METRICS],
          useFactory: (store: ILedgerStore, locks: ILockManager, logger: ILogger, metrics: IMetrics) =>
            new CoinRequestLedger(store, locks, logger, metrics),
        },
        CasinoService,
      ],
      exports: [CasinoService, LEDGER_STORE, GAME_CONFIG_SERVICE, RANDOM_SOURCE],
    };
  }
}
