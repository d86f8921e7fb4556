import type { GameName } from "@coin-casino/core-types";
import { CasinoError, CasinoErrorCode, ROLLED_BACK_MESSAGE, toCasinoError } from "@coin-casino/core-errors";
import type { ILogger } from "@coin-casino/core-logging";
import type { IMetrics } from "@coin-casino/core-metrics";
import type { ILockManager } from "@coin-casino/core-redis";
import { Outcome, applyMultiplier } from "@coin-casino/core-outcome";
import { ACCOUNT_LOCK_KEY, Account } from "@coin-casino/core-wallet";
import type { HistoryRecord } from "@coin-casino/core-game-history";
import type { ILedgerStore } from "./store";

export interface SettlementRequest {
  accountId: string;
  game: GameName;
  betAmount: bigint;
  outcome: Outcome;
}

export interface SettlementResult {
  account: Account;
  record: HistoryRecord;
}

export interface LedgerCallOptions {
  signal?: AbortSignal;
}

export interface LedgerOptions {
  acquireTimeoutMs?: number;
}

export function accountNotFound(accountId: string): CasinoError {
  return new CasinoError(CasinoErrorCode.NOT_FOUND, `Account ${accountId} not found`, { accountId });
}

export function logLevelFor(error: CasinoError): "warn" | "error" {
  return error.code === CasinoErrorCode.INTERNAL ? "error" : "warn";
}

/** Debits the stake, credits the payout and appends history in one step. */
export class SettlementLedger {
  constructor(
    private readonly store: ILedgerStore,
    private readonly locks: ILockManager,
    private readonly logger: ILogger,
    private readonly metrics: IMetrics,
    private readonly options: LedgerOptions = {}
  ) {}

  async settle(request: SettlementRequest, options: LedgerCallOptions = {}): Promise<SettlementResult> {
    const start = Date.now();
    const { accountId, game, betAmount, outcome } = request;
    const fields = { accountId, game, betAmount: betAmount.toString() };

    try {
      const result = await this.locks.withLock(
        ACCOUNT_LOCK_KEY(accountId),
        { acquireTimeoutMs: this.options.acquireTimeoutMs, signal: options.signal },
        () =>
          this.store.transaction(async (tx) => {
            const account = await tx.accounts.findForUpdate(accountId);
            if (!account) {
              throw accountNotFound(accountId);
            }
            if (account.balance < betAmount) {
              throw new CasinoError(CasinoErrorCode.INSUFFICIENT_FUNDS, "Insufficient balance for this bet", {
                balance: account.balance.toString(),
                betAmount: betAmount.toString(),
              });
            }

            const payout = applyMultiplier(betAmount, outcome.payoutMultiplier);
            const updated = await tx.accounts.update({
              ...account,
              balance: account.balance - betAmount + payout,
              totalWagered: account.totalWagered + betAmount,
              totalWon: account.totalWon + payout,
              totalLost: outcome.result === "loss" ? account.totalLost + betAmount : account.totalLost,
              gamesPlayed: account.gamesPlayed + 1,
            });
            const record = await tx.history.append({
              accountId,
              game,
              betAmount,
              result: outcome.result,
              payout,
              payoutMultiplier: outcome.payoutMultiplier,
              balanceAfter: updated.balance,
              detail: outcome.detail,
            });
            return { account: updated, record };
          })
      );

      this.metrics.increment("wagers_total", { game, result: outcome.result });
      this.metrics.observe("settlement_latency_ms", Date.now() - start, { game });
      this.logger.info("wager.settled", {
        ...fields,
        historyId: result.record.id,
        result: outcome.result,
        payout: result.record.payout.toString(),
        balance: result.account.balance.toString(),
      });
      return result;
    } catch (err) {
      const error = toCasinoError(err, ROLLED_BACK_MESSAGE);
      this.metrics.increment("wagers_total", { game, result: "rejected" });
      this.logger[logLevelFor(error)]("wager.failed", { ...fields, error: error.code, message: error.message, ...error.details });
      throw error;
    }
  }
}
