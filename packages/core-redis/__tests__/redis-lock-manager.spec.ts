import { describe, expect, it } from "vitest";
import { CasinoError, CasinoErrorCode } from "@coin-casino/core-errors";
import { InMemoryLogger } from "@coin-casino/test-utils";
import { LockRedisClient, RedisLockManager } from "../src";

/** Keeps lock keys in a map; `eval` deletes the key when the token matches. */
class FakeLockClient implements LockRedisClient {
  readonly keys = new Map<string, string>();
  releaseError: Error | null = null;

  async set(key: string, value: string): Promise<string | null> {
    if (this.keys.has(key)) return null;
    this.keys.set(key, value);
    return "OK";
  }

  async eval(_script: string, _numKeys: number, key: string, token: string): Promise<unknown> {
    if (this.releaseError) throw this.releaseError;
    if (this.keys.get(key) !== token) return 0;
    this.keys.delete(key);
    return 1;
  }
}

describe("RedisLockManager", () => {
  it("holds the key while the callback runs and frees it afterwards", async () => {
    const client = new FakeLockClient();
    const locks = new RedisLockManager(client);

    const result = await locks.withLock("account:lock:alice", {}, async () => {
      expect(client.keys.has("account:lock:alice")).toBe(true);
      return 42;
    });

    expect(result).toBe(42);
    expect(client.keys.size).toBe(0);
  });

  it("returns the callback's result when the release command fails", async () => {
    const client = new FakeLockClient();
    client.releaseError = new Error("connection reset");
    const logger = new InMemoryLogger();
    const locks = new RedisLockManager(client, { logger, ttlMs: 3000 });

    const result = await locks.withLock("account:lock:alice", {}, async () => "settled");

    expect(result).toBe("settled");
    expect(logger.entries).toEqual([
      {
        level: "warn",
        msg: "lock.release_failed",
        meta: { key: "account:lock:alice", ttlMs: 3000, message: "connection reset" },
      },
    ]);
  });

  it("rethrows the callback's error even when the release also fails", async () => {
    const client = new FakeLockClient();
    client.releaseError = new Error("connection reset");
    const locks = new RedisLockManager(client, { logger: new InMemoryLogger() });

    await expect(
      locks.withLock("k", {}, async () => {
        throw new Error("disk full");
      })
    ).rejects.toThrow("disk full");
  });

  it("fails with BUSY when the key stays taken past the acquire timeout", async () => {
    const client = new FakeLockClient();
    client.keys.set("k", "someone-else");
    const locks = new RedisLockManager(client, { retryDelayMs: 5 });

    let caught: unknown;
    try {
      await locks.withLock("k", { acquireTimeoutMs: 20 }, async () => "never");
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(CasinoError);
    expect(caught).toMatchObject({ code: CasinoErrorCode.BUSY, details: { key: "k", acquireTimeoutMs: 20 } });
    expect(client.keys.get("k")).toBe("someone-else");
  });
});
