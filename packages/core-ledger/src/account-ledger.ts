import { CasinoError, CasinoErrorCode, invalidParameters, ROLLED_BACK_MESSAGE, toCasinoError } from "@coin-casino/core-errors";
import type { ILogger } from "@coin-casino/core-logging";
import type { ILockManager } from "@coin-casino/core-redis";
import { ACCOUNT_LOCK_KEY, Account } from "@coin-casino/core-wallet";
import type { HistoryQuery, HistoryRecord } from "@coin-casino/core-game-history";
import type { ILedgerStore } from "./store";
import { LedgerOptions, accountNotFound } from "./settlement-ledger";

export class AccountLedger {
  constructor(
    private readonly store: ILedgerStore,
    private readonly locks: ILockManager,
    private readonly logger: ILogger,
    private readonly options: LedgerOptions = {}
  ) {}

  async open(accountId: string, startingBalance: bigint): Promise<Account> {
    if (!accountId.trim()) {
      throw invalidParameters("accountId must not be empty", { field: "accountId" });
    }
    if (startingBalance < BigInt(0)) {
      throw invalidParameters("startingBalance must not be negative", { field: "startingBalance" });
    }
    try {
      const account = await this.locks.withLock(
        ACCOUNT_LOCK_KEY(accountId),
        { acquireTimeoutMs: this.options.acquireTimeoutMs },
        () =>
          this.store.transaction(async (tx) => {
            if (await tx.accounts.findById(accountId)) {
              throw new CasinoError(CasinoErrorCode.INVALID_STATE, `Account ${accountId} already exists`, { accountId });
            }
            return tx.accounts.create(accountId, startingBalance);
          })
      );
      this.logger.info("account.opened", { accountId, balance: account.balance.toString() });
      return account;
    } catch (err) {
      const error = toCasinoError(err, ROLLED_BACK_MESSAGE);
      this.logger.warn("account.open_failed", { accountId, error: error.code, message: error.message });
      throw error;
    }
  }

  async get(accountId: string): Promise<Account> {
    const account = await this.store.reader.accounts.findById(accountId);
    if (!account) {
      throw accountNotFound(accountId);
    }
    return account;
  }

  async history(accountId: string, query: HistoryQuery = {}): Promise<HistoryRecord[]> {
    await this.get(accountId);
    return this.store.reader.history.listForAccount(accountId, query);
  }
}
