import { afterEach, describe, expect, it, vi } from "vitest";
import { CasinoError, CasinoErrorCode } from "@coin-casino/core-errors";
import { InMemoryLockManager, MemoryKeyValueStore, deserializeFromRedis, serializeForRedis } from "../src";

const tick = () => new Promise((resolve) => setTimeout(resolve, 0));

async function rejection(promise: Promise<unknown>): Promise<CasinoError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof CasinoError) return err;
    throw err;
  }
  throw new Error("expected a CasinoError");
}

describe("InMemoryLockManager", () => {
  it("serializes holders of one key in arrival order", async () => {
    const locks = new InMemoryLockManager();
    const order: string[] = [];
    const task = (name: string) =>
      locks.withLock("k", {}, async () => {
        order.push(`${name}:start`);
        await tick();
        order.push(`${name}:end`);
      });

    await Promise.all([task("a"), task("b"), task("c")]);

    expect(order).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
    expect(locks.isLocked("k")).toBe(false);
  });

  it("lets different keys run side by side", async () => {
    const locks = new InMemoryLockManager();
    const order: string[] = [];
    await Promise.all(
      ["x", "y"].map((key) =>
        locks.withLock(key, {}, async () => {
          order.push(`${key}:start`);
          await tick();
          order.push(`${key}:end`);
        })
      )
    );
    expect(order).toEqual(["x:start", "y:start", "x:end", "y:end"]);
  });

  it("releases the key when the holder throws", async () => {
    const locks = new InMemoryLockManager();
    await expect(locks.withLock("k", {}, async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(await locks.withLock("k", {}, async () => "next")).toBe("next");
  });

  describe("timeouts", () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it("fails a waiter with BUSY once the acquire timeout elapses", async () => {
      vi.useFakeTimers();
      const locks = new InMemoryLockManager(100);
      let release = () => {};
      const holder = locks.withLock("k", {}, () => new Promise<void>((resolve) => (release = resolve)));

      const waiter = rejection(locks.withLock("k", {}, async () => "never"));
      await vi.advanceTimersByTimeAsync(100);
      const err = await waiter;

      expect(err.code).toBe(CasinoErrorCode.BUSY);
      expect(err.details).toEqual({ key: "k", acquireTimeoutMs: 100 });
      release();
      await holder;
      expect(locks.isLocked("k")).toBe(false);
    });
  });

  it("rejects an aborted waiter without running it", async () => {
    const locks = new InMemoryLockManager();
    let release = () => {};
    const holder = locks.withLock("k", {}, () => new Promise<void>((resolve) => (release = resolve)));
    const controller = new AbortController();
    const fn = vi.fn(async () => "ran");

    const waiter = rejection(locks.withLock("k", { signal: controller.signal }, fn));
    controller.abort();
    const err = await waiter;
    release();
    await holder;

    expect(err.code).toBe(CasinoErrorCode.BUSY);
    expect(err.details).toEqual({ key: "k", aborted: true });
    expect(fn).not.toHaveBeenCalled();
  });

  it("rejects at once when the signal is already aborted", async () => {
    const locks = new InMemoryLockManager();
    const controller = new AbortController();
    controller.abort();
    const err = await rejection(locks.withLock("free", { signal: controller.signal }, async () => "ran"));
    expect(err.details).toMatchObject({ aborted: true });
    expect(locks.isLocked("free")).toBe(false);
  });
});

describe("redis serialization", () => {
  it("round-trips bigints nested in objects and arrays", () => {
    const value = { balance: BigInt("123456789012345678901"), items: [BigInt(1), "x", null], nested: { n: 2 } };
    expect(deserializeFromRedis(serializeForRedis(value))).toEqual(value);
  });

  it("treats a missing payload as null", () => {
    expect(deserializeFromRedis(null)).toBeNull();
  });
});

describe("MemoryKeyValueStore", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("expires entries after their ttl", async () => {
    vi.useFakeTimers();
    const store = new MemoryKeyValueStore();
    await store.set("a", { v: BigInt(1) }, 1);
    await store.set("b", "kept");

    expect(await store.get("a")).toEqual({ v: BigInt(1) });
    vi.advanceTimersByTime(1000);
    expect(await store.get("a")).toBeNull();
    expect(await store.get("b")).toBe("kept");

    await store.del("b");
    expect(await store.get("b")).toBeNull();
  });
});
