import { afterEach, describe, expect, it } from "vitest";
import { Test, TestingModule } from "@nestjs/testing";
import { ConfigService } from "@nestjs/config";
import { CasinoError, CasinoErrorCode } from "@coin-casino/core-errors";
import { GAME_CONFIG_SERVICE } from "@coin-casino/core-config";
import { LOGGER } from "@coin-casino/core-logging";
import { METRICS } from "@coin-casino/core-metrics";
import { FixedRandomSource, IRandomSource } from "@coin-casino/core-rng";
import type { WagerRequest } from "@coin-casino/core-games";
import { InMemoryLogger, RecordingMetrics } from "@coin-casino/test-utils";
import { CasinoEngineModule, CasinoService, GameConfigOverrides, resolveStoreBackend, startingBalanceFrom } from "../src";

async function rejection(promise: Promise<unknown>): Promise<CasinoError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof CasinoError) return err;
    throw err;
  }
  throw new Error("expected a CasinoError");
}

// roll 11 wins "under 51", roll 51 loses it
const WIN = 0.105;
const LOSS = 0.505;

const evenMoneyDice = (betAmount: bigint): WagerRequest => ({
  game: "dice",
  betAmount,
  params: { condition: "under", target: 51 },
});

describe("CasinoService", () => {
  let moduleRef: TestingModule | undefined;

  afterEach(async () => {
    await moduleRef?.close();
    moduleRef = undefined;
  });

  async function bootstrap(random: IRandomSource, gameConfig?: GameConfigOverrides) {
    const logger = new InMemoryLogger();
    const metrics = new RecordingMetrics();
    moduleRef = await Test.createTestingModule({
      imports: [CasinoEngineModule.register({ store: "memory", random, gameConfig })],
    })
      .overrideProvider(LOGGER)
      .useValue(logger)
      .overrideProvider(METRICS)
      .useValue(metrics)
      .compile();
    return { casino: moduleRef.get(CasinoService), logger, metrics };
  }

  it("settles a winning even-money dice wager", async () => {
    const { casino, metrics } = await bootstrap(new FixedRandomSource([WIN]));
    await casino.openAccount("alice");

    const result = await casino.playGame("alice", evenMoneyDice(BigInt(100)));

    expect(result.balance).toBe(BigInt(1086));
    expect(result.bankrupt).toBe(false);
    expect(result.outcome.payoutMultiplier).toBe(1.86);
    expect(result.record.payout).toBe(BigInt(186));
    expect(result.record.balanceAfter).toBe(BigInt(1086));
    expect(await casino.getAccount("alice")).toMatchObject({
      balance: BigInt(1086),
      totalWagered: BigInt(100),
      totalWon: BigInt(186),
      gamesPlayed: 1,
    });
    expect(metrics.count("wagers_total", { game: "dice", result: "win" })).toBe(1);
  });

  it("reports bankruptcy after the last coins are lost", async () => {
    const { casino } = await bootstrap(new FixedRandomSource([LOSS]));
    await casino.openAccount("gina", BigInt(100));

    const result = await casino.playGame("gina", evenMoneyDice(BigInt(100)));

    expect(result.balance).toBe(BigInt(0));
    expect(result.bankrupt).toBe(true);
    expect((await casino.getAccount("gina")).totalLost).toBe(BigInt(100));
  });

  it("lists history newest first with paging and a game filter", async () => {
    const { casino } = await bootstrap(new FixedRandomSource([WIN, LOSS, WIN]));
    await casino.openAccount("alice");
    for (let i = 0; i < 3; i++) {
      await casino.playGame("alice", evenMoneyDice(BigInt(100)));
    }

    const history = await casino.listHistory("alice");
    expect(history.map((record) => record.balanceAfter)).toEqual([BigInt(1072), BigInt(986), BigInt(1086)]);
    expect(history.map((record) => record.result)).toEqual(["win", "loss", "win"]);
    expect(await casino.listHistory("alice", { limit: 1, offset: 1 })).toHaveLength(1);
    expect(await casino.listHistory("alice", { game: "roulette" })).toEqual([]);
  });

  it("rejects a wager above the balance without touching the account", async () => {
    const { casino, logger } = await bootstrap(new FixedRandomSource([WIN]));
    await casino.openAccount("bob", BigInt(50));

    const err = await rejection(casino.playGame("bob", evenMoneyDice(BigInt(100))));

    expect(err.code).toBe(CasinoErrorCode.INSUFFICIENT_FUNDS);
    expect(err.details).toEqual({ balance: "50", betAmount: "100" });
    expect((await casino.getAccount("bob")).balance).toBe(BigInt(50));
    expect(await casino.listHistory("bob")).toEqual([]);
    expect(logger.messages("warn")).toEqual(["wager.rejected"]);
  });

  it("rejects a game switched off in config", async () => {
    const { casino } = await bootstrap(new FixedRandomSource([WIN]), { roulette: { enabled: false } });
    await casino.openAccount("carol");

    const err = await rejection(
      casino.playGame("carol", { game: "roulette", betAmount: BigInt(10), params: { betType: "color", value: "red" } })
    );

    expect(err.code).toBe(CasinoErrorCode.INVALID_PARAMETERS);
    expect(err.details).toEqual({ reason: "GAME_DISABLED", game: "roulette" });
  });

  it("rejects a game it does not know", async () => {
    const { casino } = await bootstrap(new FixedRandomSource([WIN]));
    await casino.openAccount("dave");
    const request: WagerRequest = { ...JSON.parse('{"game":"craps"}'), betAmount: BigInt(10) };

    const err = await rejection(casino.playGame("dave", request));

    expect(err.code).toBe(CasinoErrorCode.INVALID_PARAMETERS);
    expect(err.details).toEqual({ reason: "UNKNOWN_GAME" });
  });

  it("reports a config read failure as INTERNAL without claiming a rollback", async () => {
    const logger = new InMemoryLogger();
    moduleRef = await Test.createTestingModule({
      imports: [CasinoEngineModule.register({ store: "memory", random: new FixedRandomSource([WIN]) })],
    })
      .overrideProvider(LOGGER)
      .useValue(logger)
      .overrideProvider(METRICS)
      .useValue(new RecordingMetrics())
      .overrideProvider(GAME_CONFIG_SERVICE)
      .useValue({
        getConfig: async () => {
          throw new Error("config store offline");
        },
      })
      .compile();
    const casino = moduleRef.get(CasinoService);
    await casino.openAccount("hana");

    const err = await rejection(casino.playGame("hana", evenMoneyDice(BigInt(10))));

    expect(err.code).toBe(CasinoErrorCode.INTERNAL);
    expect(err.message).toBe("Operation failed");
    expect(err.details).toEqual({ cause: "config store offline" });
    expect(logger.messages("warn")).toEqual(["wager.rejected"]);
  });

  it("reports NOT_FOUND for a wager on a missing account", async () => {
    const { casino } = await bootstrap(new FixedRandomSource([WIN]));
    const err = await rejection(casino.playGame("ghost", evenMoneyDice(BigInt(1))));
    expect(err.code).toBe(CasinoErrorCode.NOT_FOUND);
  });

  it("leaves the balance alone when the caller aborts before settlement", async () => {
    const { casino } = await bootstrap(new FixedRandomSource([WIN]));
    await casino.openAccount("erin");
    const controller = new AbortController();
    controller.abort();

    const err = await rejection(casino.playGame("erin", evenMoneyDice(BigInt(100)), { signal: controller.signal }));

    expect(err.code).toBe(CasinoErrorCode.BUSY);
    expect(err.details).toMatchObject({ aborted: true });
    expect((await casino.getAccount("erin")).balance).toBe(BigInt(1000));
  });

  it("approves and rejects coin requests", async () => {
    const { casino } = await bootstrap(new FixedRandomSource([WIN]));
    await casino.openAccount("frank", BigInt(0));

    const first = await casino.requestCoins("frank");
    expect(first).toMatchObject({ amount: BigInt(1000), status: "pending", reason: "" });
    expect((await casino.listPendingCoinRequests()).map((request) => request.id)).toEqual([first.id]);

    const account = await casino.approveCoinRequest(first.id, "admin");
    expect(account.balance).toBe(BigInt(1000));

    const second = await casino.requestCoins("frank", BigInt(200), "one more round");
    const rejected = await casino.rejectCoinRequest(second.id, "admin");
    expect(rejected).toMatchObject({ status: "rejected", reviewedBy: "admin" });

    expect((await casino.getAccount("frank")).balance).toBe(BigInt(1000));
    expect((await casino.listCoinRequests("frank")).map((request) => request.status)).toEqual(["rejected", "approved"]);
    expect(await casino.listPendingCoinRequests()).toEqual([]);

    const again = await rejection(casino.approveCoinRequest(first.id));
    expect(again.code).toBe(CasinoErrorCode.INVALID_STATE);
  });
});

describe("engine configuration", () => {
  it("reads STARTING_BALANCE", () => {
    expect(startingBalanceFrom(new ConfigService({ STARTING_BALANCE: "250" }))).toBe(BigInt(250));
    expect(startingBalanceFrom(new ConfigService({}))).toBe(BigInt(1000));
    expect(() => startingBalanceFrom(new ConfigService({ STARTING_BALANCE: "-5" }))).toThrow(
      'STARTING_BALANCE must be a non-negative integer, got "-5"'
    );
  });

  it("accepts only known store backends", () => {
    expect(resolveStoreBackend(undefined)).toBe("memory");
    expect(resolveStoreBackend(" Postgres ")).toBe("postgres");
    expect(() => resolveStoreBackend("mongo")).toThrow('STORE_BACKEND must be "memory" or "postgres", got "mongo"');
  });
});
