import { Global, Inject, Module, OnModuleDestroy } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { readFileSync } from "fs";
import { join } from "path";
import { Pool, PoolClient } from "pg";

export interface IDbClient {
  query<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<T[]>;
  /** Runs `fn` inside BEGIN/COMMIT; any throw rolls back and is rethrown. */
  transaction<T>(fn: (tx: IDbClient) => Promise<T>): Promise<T>;
}

export const DB_CLIENT = Symbol("DB_CLIENT");

/** What PgDbClient needs from a pool. pg-mem's adapter pool fits as well. */
export type PgPool = Pick<Pool, "query" | "connect" | "end">;

export const SCHEMA_PATH = join(__dirname, "..", "sql", "schema.sql");

export function readSchema(): string {
  return readFileSync(SCHEMA_PATH, "utf8");
}

/** Bound to one checked-out connection for the length of a transaction. */
class PgTransactionClient implements IDbClient {
  constructor(private readonly client: PoolClient) {}

  async query<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<T[]> {
    const result = await this.client.query(sql, params);
    return result.rows;
  }

  transaction<T>(): Promise<T> {
    return Promise.reject(new Error("Nested transactions are not supported"));
  }
}

export class PgDbClient implements IDbClient {
  constructor(private readonly pool: PgPool) {}

  async query<T = Record<string, unknown>>(sql: string, params: unknown[] = []): Promise<T[]> {
    const result = await this.pool.query(sql, params);
    return result.rows;
  }

  async transaction<T>(fn: (tx: IDbClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const result = await fn(new PgTransactionClient(client));
      await client.query("COMMIT");
      return result;
    } catch (err) {
      await client.query("ROLLBACK");
      throw err;
    } finally {
      client.release();
    }
  }

  end(): Promise<void> {
    return this.pool.end();
  }
}

export interface DbModuleOptions {
  connectionString?: string;
  maxConnections?: number;
}

export const dbModuleOptionsToken = Symbol("DB_MODULE_OPTIONS");

export function createPgDbClient(config: ConfigService, options: DbModuleOptions = {}): PgDbClient {
  const connectionString = options.connectionString ?? config.get<string>("DATABASE_URL");
  if (!connectionString) {
    throw new Error("DATABASE_URL is not configured");
  }
  const pool = new Pool({
    connectionString,
    max: options.maxConnections ?? (Number(config.get("DB_MAX_CONNECTIONS")) || 10),
  });
  return new PgDbClient(pool);
}

@Global()
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true })],
  providers: [
    {
      provide: DB_CLIENT,
      inject: [ConfigService, dbModuleOptionsToken],
      useFactory: (config: ConfigService, options?: DbModuleOptions) => createPgDbClient(config, options),
    },
  ],
  exports: [DB_CLIENT],
})
export class DbModule implements OnModuleDestroy {
  constructor(@Inject(DB_CLIENT) private readonly db: PgDbClient) {}

  static forRoot(options?: DbModuleOptions) {
    return {
      module: DbModule,
      providers: [
        {
          provide: dbModuleOptionsToken,
          useValue: options ?? {},
        },
      ],
    };
  }

  async onModuleDestroy(): Promise<void> {
    await this.db.end();
  }
}
