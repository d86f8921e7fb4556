import type { IDbClient } from "@coin-casino/core-db";

export interface Account {
  id: string;
  balance: bigint;
  totalWagered: bigint;
  totalWon: bigint;
  /** Sum of stakes on lost wagers. */
  totalLost: bigint;
  /** Count of settled wagers. */
  gamesPlayed: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface IAccountRepository {
  findById(id: string): Promise<Account | null>;
  /** Same as findById, but holds the row until the surrounding transaction ends. */
  findForUpdate(id: string): Promise<Account | null>;
  /** Fails when the id is taken. */
  create(id: string, startingBalance: bigint): Promise<Account>;
  update(account: Account): Promise<Account>;
}

export const ACCOUNT_LOCK_KEY = (accountId: string) => `account:lock:${accountId}`;

export function newAccount(id: string, startingBalance: bigint, now = new Date()): Account {
  return {
    id,
    balance: startingBalance,
    totalWagered: BigInt(0),
    totalWon: BigInt(0),
    totalLost: BigInt(0),
    gamesPlayed: 0,
    createdAt: now,
    updatedAt: now,
  };
}

/** Nothing left to stake; the account can only continue through a coin request. */
export function isBankrupt(account: Pick<Account, "balance">): boolean {
  return account.balance <= BigInt(0);
}

export class AccountRepository implements IAccountRepository {
  constructor(private readonly db: IDbClient) {}

  async findById(id: string): Promise<Account | null> {
    const rows = await this.db.query<Row>(`SELECT * FROM accounts WHERE id = $1`, [id]);
    return rows.length ? mapRow(rows[0]) : null;
  }

  async findForUpdate(id: string): Promise<Account | null> {
    const rows = await this.db.query<Row>(`SELECT * FROM accounts WHERE id = $1 FOR UPDATE`, [id]);
    return rows.length ? mapRow(rows[0]) : null;
  }

  async create(id: string, startingBalance: bigint): Promise<Account> {
    const rows = await this.db.query<Row>(
      `INSERT INTO accounts (id, balance, total_wagered, total_won, total_lost, games_played)
       VALUES ($1, $2, 0, 0, 0, 0)
       RETURNING *`,
      [id, startingBalance.toString()]
    );
    return mapRow(rows[0]);
  }

  async update(account: Account): Promise<Account> {
    const rows = await this.db.query<Row>(
      `UPDATE accounts
       SET balance = $2, total_wagered = $3, total_won = $4, total_lost = $5, games_played = $6, updated_at = NOW()
       WHERE id = $1
       RETURNING *`,
      [
        account.id,
        account.balance.toString(),
        account.totalWagered.toString(),
        account.totalWon.toString(),
        account.totalLost.toString(),
        account.gamesPlayed,
      ]
    );
    if (!rows.length) throw new Error(`Account ${account.id} not found`);
    return mapRow(rows[0]);
  }
}

/** Backed by a plain map; the caller decides what a transaction means. */
export class MemoryAccountRepository implements IAccountRepository {
  constructor(private readonly accounts: Map<string, Account>) {}

  async findById(id: string): Promise<Account | null> {
    const account = this.accounts.get(id);
    return account ? { ...account } : null;
  }

  async findForUpdate(id: string): Promise<Account | null> {
    return this.findById(id);
  }

  async create(id: string, startingBalance: bigint): Promise<Account> {
    if (this.accounts.has(id)) {
      throw new Error(`Account ${id} already exists`);
    }
    const account = newAccount(id, startingBalance);
    this.accounts.set(id, account);
    return { ...account };
  }

  async update(account: Account): Promise<Account> {
    if (!this.accounts.has(account.id)) {
      throw new Error(`Account ${account.id} not found`);
    }
    const next = { ...account, updatedAt: new Date() };
    this.accounts.set(account.id, next);
    return { ...next };
  }
}

interface Row {
  id: string;
  balance: string | number;
  total_wagered: string | number;
  total_won: string | number;
  total_lost: string | number;
  games_played: string | number;
  created_at: string | Date;
  updated_at: string | Date;
}

function mapRow(row: Row): Account {
  return {
    id: row.id,
    balance: BigInt(row.balance),
    totalWagered: BigInt(row.total_wagered),
    totalWon: BigInt(row.total_won),
    totalLost: BigInt(row.total_lost),
    gamesPlayed: Number(row.games_played),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}
