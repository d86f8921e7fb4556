import type { IDbClient } from "@coin-casino/core-db";
import { Account, AccountRepository, IAccountRepository, MemoryAccountRepository } from "@coin-casino/core-wallet";
import {
  HistoryRecord,
  HistoryRepository,
  IHistoryRepository,
  MemoryHistoryRepository,
} from "@coin-casino/core-game-history";
import {
  CoinRequest,
  CoinRequestRepository,
  ICoinRequestRepository,
  MemoryCoinRequestRepository,
} from "@coin-casino/core-coin-requests";

export interface LedgerRepositories {
  accounts: IAccountRepository;
  history: IHistoryRepository;
  coinRequests: ICoinRequestRepository;
}

/**
 * Unit of work over accounts, history and coin requests: everything written
 * inside `transaction` commits together or not at all.
 */
export interface ILedgerStore {
  transaction<T>(fn: (tx: LedgerRepositories) => Promise<T>): Promise<T>;
  /** Repositories outside any transaction, for reads. */
  readonly reader: LedgerRepositories;
}

export const LEDGER_STORE = Symbol("LEDGER_STORE");

export type StoreBackend = "memory" | "postgres";

export function repositoriesFor(db: IDbClient): LedgerRepositories {
  return {
    accounts: new AccountRepository(db),
    history: new HistoryRepository(db),
    coinRequests: new CoinRequestRepository(db),
  };
}

export class PgLedgerStore implements ILedgerStore {
  readonly reader: LedgerRepositories;

  constructor(
    private readonly db: IDbClient,
    private readonly repoFactory: (db: IDbClient) => LedgerRepositories = repositoriesFor
  ) {
    this.reader = repoFactory(db);
  }

  transaction<T>(fn: (tx: LedgerRepositories) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => fn(this.repoFactory(tx)));
  }
}

interface MemoryState {
  accounts: Map<string, Account>;
  history: HistoryRecord[];
  coinRequests: Map<string, CoinRequest>;
}

function memoryRepositories(state: MemoryState): LedgerRepositories {
  return {
    accounts: new MemoryAccountRepository(state.accounts),
    history: new MemoryHistoryRepository(state.history),
    coinRequests: new MemoryCoinRequestRepository(state.coinRequests),
  };
}

function copyState(state: MemoryState): MemoryState {
  return {
    accounts: new Map(state.accounts),
    history: [...state.history],
    coinRequests: new Map(state.coinRequests),
  };
}

/** Entries the working copy holds that differ from the snapshot it started from. */
function* writtenEntries<V>(base: Map<string, V>, working: Map<string, V>): Generator<[string, V], void, undefined> {
  for (const [key, value] of working) {
    if (base.get(key) !== value) {
      yield [key, value];
    }
  }
}

/**
 * In-process store. A transaction works on a private copy of the committed
 * state; on success only the accounts and coin requests it wrote, and the
 * history rows it appended, are merged back. Isolation between writers of
 * one account comes from the account lock the ledgers hold, so transactions
 * on different accounts run side by side.
 */
export class MemoryLedgerStore implements ILedgerStore {
  private readonly committed: MemoryState = { accounts: new Map(), history: [], coinRequests: new Map() };

  get reader(): LedgerRepositories {
    return memoryRepositories(this.committed);
  }

  async transaction<T>(fn: (tx: LedgerRepositories) => Promise<T>): Promise<T> {
    const base = copyState(this.committed);
    const working = copyState(this.committed);
    const result = await fn(memoryRepositories(working));

    for (const [id, account] of writtenEntries(base.accounts, working.accounts)) {
      this.committed.accounts.set(id, account);
    }
    for (const [id, request] of writtenEntries(base.coinRequests, working.coinRequests)) {
      this.committed.coinRequests.set(id, request);
    }
    this.committed.history.push(...working.history.slice(base.history.length));
    return result;
  }
}
