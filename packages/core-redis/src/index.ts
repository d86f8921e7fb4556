import { Global, Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { Redis } from "ioredis";
import { randomUUID } from "crypto";
import { CasinoError, CasinoErrorCode } from "@coin-casino/core-errors";
import { LOGGER } from "@coin-casino/core-logging";
import type { ILogger } from "@coin-casino/core-logging";

export interface IKeyValueStore {
  get<T>(key: string): Promise<T | null>;
  set<T>(key: string, value: T, ttlSeconds?: number): Promise<void>;
  del(key: string): Promise<void>;
}

export interface LockOptions {
  /** Upper bound on the wait for the lock; exceeded waits fail with BUSY. */
  acquireTimeoutMs?: number;
  /** Aborting before the lock is granted rejects with BUSY and runs nothing. */
  signal?: AbortSignal;
}

export interface ILockManager {
  withLock<T>(key: string, options: LockOptions, fn: () => Promise<T>): Promise<T>;
}

export type LockBackend = "memory" | "redis";

export const REDIS_CLIENT = Symbol("REDIS_CLIENT");
export const KEY_VALUE_STORE = Symbol("KEY_VALUE_STORE");
export const LOCK_MANAGER = Symbol("LOCK_MANAGER");

export const DEFAULT_ACQUIRE_TIMEOUT_MS = 2000;

const BIGINT_FLAG = "__cc_bigint__";

export function serializeForRedis(value: unknown): string {
  const replacer = (input: unknown): unknown => {
    if (typeof input === "bigint") {
      return { [BIGINT_FLAG]: input.toString() };
    }
    if (Array.isArray(input)) {
      return input.map((item) => replacer(item));
    }
    if (input && typeof input === "object") {
      return Object.entries(input).reduce<Record<string, unknown>>((acc, [key, val]) => {
        acc[key] = replacer(val);
        return acc;
      }, {});
    }
    return input;
  };

  return JSON.stringify(replacer(value));
}

export function deserializeFromRedis<T>(payload: string | null): T | null {
  if (!payload) return null;
  const reviver = (input: unknown): unknown => {
    if (Array.isArray(input)) {
      return input.map((item) => reviver(item));
    }
    if (input && typeof input === "object") {
      const entries = Object.entries(input);
      const flagged = entries.length === 1 && entries[0][0] === BIGINT_FLAG ? entries[0][1] : undefined;
      if (typeof flagged === "string") {
        try {
          return BigInt(flagged);
        } catch {
          return flagged;
        }
      }
      return entries.reduce<Record<string, unknown>>((acc, [key, val]) => {
        acc[key] = reviver(val);
        return acc;
      }, {});
    }
    return input;
  };

  return reviver(JSON.parse(payload)) as T;
}

function lockBusy(key: string, acquireTimeoutMs: number): CasinoError {
  return new CasinoError(CasinoErrorCode.BUSY, `Failed to acquire lock for ${key}`, { key, acquireTimeoutMs });
}

function lockAborted(key: string): CasinoError {
  return new CasinoError(CasinoErrorCode.BUSY, `Lock acquisition for ${key} was abandoned`, { key, aborted: true });
}

export class RedisKeyValueStore implements IKeyValueStore {
  constructor(private readonly redis: Redis) {}

  async get<T>(key: string): Promise<T | null> {
    const result = await this.redis.get(key);
    return deserializeFromRedis<T>(result);
  }

  async set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    const payload = serializeForRedis(value);
    if (ttlSeconds) {
      await this.redis.set(key, payload, "EX", ttlSeconds);
    } else {
      await this.redis.set(key, payload);
    }
  }

  async del(key: string): Promise<void> {
    await this.redis.del(key);
  }
}

interface MemoryEntry {
  payload: string;
  expiresAt: number | null;
}

export class MemoryKeyValueStore implements IKeyValueStore {
  private readonly store = new Map<string, MemoryEntry>();

  async get<T>(key: string): Promise<T | null> {
    const entry = this.store.get(key);
    if (!entry) return null;
    if (entry.expiresAt !== null && entry.expiresAt <= Date.now()) {
      this.store.delete(key);
      return null;
    }
    return deserializeFromRedis<T>(entry.payload);
  }

  async set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    this.store.set(key, {
      payload: serializeForRedis(value),
      expiresAt: ttlSeconds ? Date.now() + ttlSeconds * 1000 : null,
    });
  }

  async del(key: string): Promise<void> {
    this.store.delete(key);
  }
}

export interface RedisLockManagerOptions {
  ttlMs?: number;
  retryDelayMs?: number;
  acquireTimeoutMs?: number;
  /** Receives release failures; the key's TTL frees such a lock. */
  logger?: ILogger;
}

/** The two commands the lock needs; an ioredis client satisfies it. */
export interface LockRedisClient {
  set(key: string, value: string, px: "PX", ttlMs: number, nx: "NX"): Promise<string | null>;
  eval(script: string, numKeys: number, key: string, token: string): Promise<unknown>;
}

const RELEASE_SCRIPT = `if redis.call("get", KEYS[1]) == ARGV[1] then return redis.call("del", KEYS[1]) else return 0 end`;

export class RedisLockManager implements ILockManager {
  private readonly ttlMs: number;
  private readonly retryDelayMs: number;
  private readonly acquireTimeoutMs: number;
  private readonly logger?: ILogger;

  constructor(private readonly redis: LockRedisClient, options: RedisLockManagerOptions = {}) {
    this.ttlMs = options.ttlMs ?? 5000;
    this.retryDelayMs = options.retryDelayMs ?? 25;
    this.acquireTimeoutMs = options.acquireTimeoutMs ?? DEFAULT_ACQUIRE_TIMEOUT_MS;
    this.logger = options.logger;
  }

  async withLock<T>(key: string, options: LockOptions, fn: () => Promise<T>): Promise<T> {
    const token = randomUUID();
    const acquireTimeoutMs = options.acquireTimeoutMs ?? this.acquireTimeoutMs;
    const deadline = Date.now() + acquireTimeoutMs;

    for (;;) {
      if (options.signal?.aborted) {
        throw lockAborted(key);
      }
      const acquired = await this.redis.set(key, token, "PX", this.ttlMs, "NX");
      if (acquired === "OK") {
        break;
      }
      if (Date.now() >= deadline) {
        throw lockBusy(key, acquireTimeoutMs);
      }
      await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs));
    }

    let result: T;
    try {
      result = await fn();
    } catch (err) {
      await this.release(key, token);
      throw err;
    }
    await this.release(key, token);
    return result;
  }

  /** Never throws: the work under the lock has already finished either way. */
  private async release(key: string, token: string): Promise<void> {
    try {
      await this.redis.eval(RELEASE_SCRIPT, 1, key, token);
    } catch (err) {
      this.logger?.warn("lock.release_failed", {
        key,
        ttlMs: this.ttlMs,
        message: err instanceof Error ? err.message : String(err),
      });
    }
  }
}

type Grant = () => void;

/**
 * Per-key FIFO mutex for a single process. Keys never share a queue, so
 * holders of different keys run in parallel.
 */
export class InMemoryLockManager implements ILockManager {
  private readonly queues = new Map<string, Grant[]>();

  constructor(private readonly acquireTimeoutMs = DEFAULT_ACQUIRE_TIMEOUT_MS) {}

  async withLock<T>(key: string, options: LockOptions, fn: () => Promise<T>): Promise<T> {
    await this.acquire(key, options);
    try {
      return await fn();
    } finally {
      this.release(key);
    }
  }

  isLocked(key: string): boolean {
    return this.queues.has(key);
  }

  private acquire(key: string, options: LockOptions): Promise<void> {
    if (options.signal?.aborted) {
      return Promise.reject(lockAborted(key));
    }
    const queue = this.queues.get(key);
    if (!queue) {
      this.queues.set(key, []);
      return Promise.resolve();
    }

    const acquireTimeoutMs = options.acquireTimeoutMs ?? this.acquireTimeoutMs;
    const signal = options.signal;

    return new Promise<void>((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };
      const grant: Grant = () => {
        cleanup();
        resolve();
      };
      const fail = (err: CasinoError) => {
        const idx = queue.indexOf(grant);
        if (idx >= 0) {
          queue.splice(idx, 1);
        }
        cleanup();
        reject(err);
      };
      const onAbort = () => fail(lockAborted(key));
      const timer = setTimeout(() => fail(lockBusy(key, acquireTimeoutMs)), acquireTimeoutMs);

      queue.push(grant);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  private release(key: string): void {
    const queue = this.queues.get(key);
    if (!queue) return;
    const next = queue.shift();
    if (next) {
      next();
    } else {
      this.queues.delete(key);
    }
  }
}

export interface RedisModuleOptions {
  backend?: LockBackend;
  url?: string;
  keyPrefix?: string;
}

export const redisModuleOptionsToken = Symbol("REDIS_MODULE_OPTIONS");

function resolveBackend(config: ConfigService, options?: RedisModuleOptions): LockBackend {
  const raw = options?.backend ?? config.get<string>("LOCK_BACKEND") ?? "memory";
  return raw === "redis" ? "redis" : "memory";
}

function acquireTimeoutFrom(config: ConfigService): number {
  return Number(config.get("LOCK_ACQUIRE_TIMEOUT_MS")) || DEFAULT_ACQUIRE_TIMEOUT_MS;
}

@Global()
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true })],
  providers: [
    {
      provide: REDIS_CLIENT,
      inject: [ConfigService, redisModuleOptionsToken],
      useFactory: (config: ConfigService, options?: RedisModuleOptions): Redis | null => {
        if (resolveBackend(config, options) !== "redis") {
          return null;
        }
        const url = options?.url ?? config.get<string>("REDIS_URL") ?? "redis://localhost:6379";
        const client = new Redis(url, {
          keyPrefix: options?.keyPrefix ?? config.get<string>("REDIS_KEY_PREFIX") ?? "cc:",
        });
        client.on("error", (err) => {
          console.error("Redis connection error", err);
        });
        return client;
      },
    },
    {
      provide: KEY_VALUE_STORE,
      inject: [REDIS_CLIENT],
      useFactory: (redis: Redis | null): IKeyValueStore => (redis ? new RedisKeyValueStore(redis) : new MemoryKeyValueStore()),
    },
    {
      provide: LOCK_MANAGER,
      inject: [REDIS_CLIENT, ConfigService, LOGGER],
      useFactory: (redis: Redis | null, config: ConfigService, logger: ILogger): ILockManager => {
        const acquireTimeoutMs = acquireTimeoutFrom(config);
        if (!redis) {
          return new InMemoryLockManager(acquireTimeoutMs);
        }
        return new RedisLockManager(redis, {
          acquireTimeoutMs,
          ttlMs: Number(config.get("LOCK_TTL_MS")) || undefined,
          logger,
        });
      },
    },
  ],
  exports: [REDIS_CLIENT, KEY_VALUE_STORE, LOCK_MANAGER],
})
export class RedisModule {
  static forRoot(options?: RedisModuleOptions) {
    return {
      module: RedisModule,
      providers: [
        {
          provide: redisModuleOptionsToken,
          useValue: options ?? {},
        },
      ],
      exports: [redisModuleOptionsToken],
    };
  }
}
