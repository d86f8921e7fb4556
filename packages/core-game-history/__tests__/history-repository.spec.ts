import { beforeEach, describe, expect, it } from "vitest";
import type { GameName } from "@coin-casino/core-types";
import type { IDbClient } from "@coin-casino/core-db";
import { createDbClient } from "@coin-casino/test-utils";
import { HistoryRecord, HistoryRepository, IHistoryRepository, MemoryHistoryRepository, NewHistoryRecord, normalizePage } from "../src";

function entry(game: GameName, betAmount: number, balanceAfter: number): NewHistoryRecord {
  return {
    accountId: "alice",
    game,
    betAmount: BigInt(betAmount),
    result: "loss",
    payout: BigInt(0),
    payoutMultiplier: 0,
    balanceAfter: BigInt(balanceAfter),
    detail: { note: `${game}-${betAmount}` },
  };
}

async function seed(repo: IHistoryRepository): Promise<void> {
  await repo.append(entry("dice", 10, 990));
  await repo.append(entry("roulette", 20, 970));
  await repo.append(entry("dice", 30, 940));
}

const suites: [string, () => Promise<IHistoryRepository>][] = [
  [
    "HistoryRepository",
    async () => {
      const db: IDbClient = await createDbClient();
      await db.query(`INSERT INTO accounts (id, balance) VALUES ('alice', 1000), ('bob', 1000)`);
      return new HistoryRepository(db);
    },
  ],
  ["MemoryHistoryRepository", async () => new MemoryHistoryRepository([])],
];

describe.each(suites)("%s", (_name, factory) => {
  let repo: IHistoryRepository;

  beforeEach(async () => {
    repo = await factory();
    await seed(repo);
  });

  it("lists newest first", async () => {
    const records = await repo.listForAccount("alice");
    expect(records.map((r) => r.betAmount)).toEqual([BigInt(30), BigInt(20), BigInt(10)]);
    expect(records[0].detail).toEqual({ note: "dice-30" });
    expect(records[0].balanceAfter).toBe(BigInt(940));
  });

  it("filters by game and pages", async () => {
    const dice = await repo.listForAccount("alice", { game: "dice" });
    expect(dice.map((r) => r.betAmount)).toEqual([BigInt(30), BigInt(10)]);

    const second = await repo.listForAccount("alice", { limit: 1, offset: 1 });
    expect(second.map((r) => r.game)).toEqual(["roulette"]);
  });

  it("keeps accounts apart and counts per account", async () => {
    expect(await repo.listForAccount("bob")).toEqual([]);
    expect(await repo.countForAccount("alice")).toBe(3);
    expect(await repo.countForAccount("bob")).toBe(0);
  });

  it("stores the multiplier and result as given", async () => {
    const stored: HistoryRecord = await repo.append({
      ...entry("dice", 100, 1086),
      result: "win",
      payout: BigInt(186),
      payoutMultiplier: 1.86,
    });
    expect(stored.id).toEqual(expect.any(String));
    expect(stored).toMatchObject({ result: "win", payout: BigInt(186), payoutMultiplier: 1.86 });
  });

  it("keeps stored detail apart from the objects it was given and hands out", async () => {
    const cards = ["Ah", "Kd"];
    const appended = await repo.append({ ...entry("poker", 5, 935), detail: { cards } });
    cards.push("XX");
    appended.detail.tampered = true;
    const [listed] = await repo.listForAccount("alice", { limit: 1 });
    listed.detail.cards = [];

    const [fresh] = await repo.listForAccount("alice", { limit: 1 });
    expect(fresh.detail).toEqual({ cards: ["Ah", "Kd"] });
  });
});

describe("normalizePage", () => {
  it("defaults to 50 and clamps bad input", () => {
    expect(normalizePage()).toEqual({ limit: 50, offset: 0 });
    expect(normalizePage({ limit: 0, offset: -5 })).toEqual({ limit: 1, offset: 0 });
    expect(normalizePage({ limit: 10_000 })).toEqual({ limit: 500, offset: 0 });
  });
});
