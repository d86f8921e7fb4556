import { describe, expect, it } from "vitest";
import { createDbClient } from "@coin-casino/test-utils";
import { winOutcome } from "@coin-casino/core-outcome";
import { PgLedgerStore } from "../src";
import { createHarness } from "./harness";

describe("PgLedgerStore", () => {
  it("commits settlement and coin requests through SQL repositories", async () => {
    const db = await createDbClient();
    const h = createHarness(new PgLedgerStore(db));

    await h.accounts.open("alice", BigInt(1000));
    const { account, record } = await h.settlement.settle({
      accountId: "alice",
      game: "dice",
      betAmount: BigInt(100),
      outcome: winOutcome(1.86, { roll: 11 }),
    });
    expect(account.balance).toBe(BigInt(1086));

    const request = await h.coinRequests.request("alice", BigInt(250), "top up");
    const credited = await h.coinRequests.approve(request.id, "admin");
    expect(credited.balance).toBe(BigInt(1336));

    const stored = await h.accounts.get("alice");
    expect(stored).toMatchObject({
      balance: BigInt(1336),
      totalWagered: BigInt(100),
      totalWon: BigInt(186),
      gamesPlayed: 1,
    });

    const history = await h.accounts.history("alice");
    expect(history).toHaveLength(1);
    expect(history[0]).toMatchObject({ id: record.id, payout: BigInt(186), detail: { roll: 11 } });

    const rows = await db.query<{ status: string; reviewed_by: string }>(
      `SELECT status, reviewed_by FROM coin_requests WHERE id = $1`,
      [request.id]
    );
    expect(rows).toEqual([{ status: "approved", reviewed_by: "admin" }]);
  });
});
