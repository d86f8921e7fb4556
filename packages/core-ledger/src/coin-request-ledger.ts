import { CasinoError, CasinoErrorCode, invalidParameters, ROLLED_BACK_MESSAGE, toCasinoError } from "@coin-casino/core-errors";
import type { ILogger } from "@coin-casino/core-logging";
import type { IMetrics } from "@coin-casino/core-metrics";
import type { ILockManager } from "@coin-casino/core-redis";
import { ACCOUNT_LOCK_KEY, Account } from "@coin-casino/core-wallet";
import { CoinRequest, CoinRequestReview, DEFAULT_COIN_REQUEST_AMOUNT } from "@coin-casino/core-coin-requests";
import type { ILedgerStore, LedgerRepositories } from "./store";
import { LedgerCallOptions, LedgerOptions, accountNotFound, logLevelFor } from "./settlement-ledger";

function requestNotFound(id: string): CasinoError {
  return new CasinoError(CasinoErrorCode.NOT_FOUND, `Coin request ${id} not found`, { coinRequestId: id });
}

function notPending(request: CoinRequest): CasinoError {
  return new CasinoError(CasinoErrorCode.INVALID_STATE, `Coin request ${request.id} is already ${request.status}`, {
    coinRequestId: request.id,
    status: request.status,
  });
}

/**
 * Pending requests move one way, to approved or rejected. Each transition is
 * taken under the owning account's lock, the same one settlement uses.
 */
export class CoinRequestLedger {
  constructor(
    private readonly store: ILedgerStore,
    private readonly locks: ILockManager,
    private readonly logger: ILogger,
    private readonly metrics: IMetrics,
    private readonly options: LedgerOptions = {}
  ) {}

  async request(
    accountId: string,
    amount: bigint = DEFAULT_COIN_REQUEST_AMOUNT,
    reason = "",
    options: LedgerCallOptions = {}
  ): Promise<CoinRequest> {
    if (amount <= BigInt(0)) {
      throw invalidParameters("amount must be a positive integer", { field: "amount" });
    }
    const created = await this.guarded("coin_request.create_failed", { accountId }, () =>
      this.locks.withLock(ACCOUNT_LOCK_KEY(accountId), this.lockOptions(options), () =>
        this.store.transaction(async (tx) => {
          if (!(await tx.accounts.findById(accountId))) {
            throw accountNotFound(accountId);
          }
          const pending = await tx.coinRequests.findPendingForAccount(accountId);
          if (pending) {
            throw new CasinoError(CasinoErrorCode.INVALID_STATE, "A coin request is already pending for this account", {
              accountId,
              coinRequestId: pending.id,
            });
          }
          return tx.coinRequests.create({ accountId, amount, reason });
        })
      )
    );
    this.metrics.increment("coin_requests_total", { status: "pending" });
    this.logger.info("coin_request.created", { accountId, coinRequestId: created.id, amount: amount.toString() });
    return created;
  }

  async approve(id: string, reviewer: string | null = null, options: LedgerCallOptions = {}): Promise<Account> {
    const { account } = await this.review(id, { status: "approved", reviewedBy: reviewer }, options, async (tx, request) => {
      const current = await tx.accounts.findForUpdate(request.accountId);
      if (!current) {
        throw accountNotFound(request.accountId);
      }
      return tx.accounts.update({ ...current, balance: current.balance + request.amount });
    });
    return account;
  }

  async reject(id: string, reviewer: string | null = null, options: LedgerCallOptions = {}): Promise<CoinRequest> {
    const { request } = await this.review(id, { status: "rejected", reviewedBy: reviewer }, options, async (tx, request) => {
      const current = await tx.accounts.findById(request.accountId);
      if (!current) {
        throw accountNotFound(request.accountId);
      }
      return current;
    });
    return request;
  }

  listForAccount(accountId: string): Promise<CoinRequest[]> {
    return this.store.reader.coinRequests.listForAccount(accountId);
  }

  listPending(): Promise<CoinRequest[]> {
    return this.store.reader.coinRequests.listPending();
  }

  private async review(
    id: string,
    review: CoinRequestReview,
    options: LedgerCallOptions,
    effect: (tx: LedgerRepositories, request: CoinRequest) => Promise<Account>
  ): Promise<{ request: CoinRequest; account: Account }> {
    const fields = { coinRequestId: id, status: review.status, reviewedBy: review.reviewedBy };
    const result = await this.guarded("coin_request.review_failed", fields, async () => {
      const existing = await this.store.reader.coinRequests.findById(id);
      if (!existing) {
        throw requestNotFound(id);
      }
      return this.locks.withLock(ACCOUNT_LOCK_KEY(existing.accountId), this.lockOptions(options), () =>
        this.store.transaction(async (tx) => {
          const current = await tx.coinRequests.findById(id);
          if (!current) {
            throw requestNotFound(id);
          }
          if (current.status !== "pending") {
            throw notPending(current);
          }
          const account = await effect(tx, current);
          const request = await tx.coinRequests.review(id, review);
          if (!request) {
            throw notPending(current);
          }
          return { request, account };
        })
      );
    });

    this.metrics.increment("coin_requests_total", { status: review.status });
    this.logger.info(`coin_request.${review.status}`, {
      ...fields,
      accountId: result.request.accountId,
      amount: result.request.amount.toString(),
      balance: result.account.balance.toString(),
    });
    return result;
  }

  private lockOptions(options: LedgerCallOptions) {
    return { acquireTimeoutMs: this.options.acquireTimeoutMs, signal: options.signal };
  }

  private async guarded<T>(event: string, fields: Record<string, unknown>, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      const error = toCasinoError(err, ROLLED_BACK_MESSAGE);
      this.logger[logLevelFor(error)](event, { ...fields, error: error.code, message: error.message, ...error.details });
      throw error;
    }
  }
}
