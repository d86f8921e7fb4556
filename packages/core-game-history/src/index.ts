import { randomUUID } from "crypto";
import type { IDbClient } from "@coin-casino/core-db";
import type { GameName, PageOptions, WagerResult } from "@coin-casino/core-types";

export interface HistoryRecord {
  id: string;
  accountId: string;
  game: GameName;
  betAmount: bigint;
  result: WagerResult;
  /** Total returned to the player, stake included. */
  payout: bigint;
  payoutMultiplier: number;
  balanceAfter: bigint;
  detail: Record<string, unknown>;
  createdAt: Date;
}

export type NewHistoryRecord = Omit<HistoryRecord, "id" | "createdAt">;

export interface HistoryQuery extends PageOptions {
  game?: GameName;
}

/** Append-only: records are never updated or deleted. */
export interface IHistoryRepository {
  append(record: NewHistoryRecord): Promise<HistoryRecord>;
  /** Newest first. */
  listForAccount(accountId: string, query?: HistoryQuery): Promise<HistoryRecord[]>;
  countForAccount(accountId: string): Promise<number>;
}

export const DEFAULT_HISTORY_LIMIT = 50;
const MAX_HISTORY_LIMIT = 500;

export function normalizePage(query: PageOptions = {}): { limit: number; offset: number } {
  const limit = Math.trunc(query.limit ?? DEFAULT_HISTORY_LIMIT);
  const offset = Math.trunc(query.offset ?? 0);
  return {
    limit: Number.isFinite(limit) ? Math.min(Math.max(limit, 1), MAX_HISTORY_LIMIT) : DEFAULT_HISTORY_LIMIT,
    offset: Number.isFinite(offset) ? Math.max(offset, 0) : 0,
  };
}

export class HistoryRepository implements IHistoryRepository {
  constructor(private readonly db: IDbClient) {}

  async append(record: NewHistoryRecord): Promise<HistoryRecord> {
    const rows = await this.db.query<Row>(
      `INSERT INTO game_history (id, account_id, game, bet_amount, result, payout, payout_multiplier, balance_after, detail)
       VALUES ($1,$2,$3,$4,$5,$6,$7,$8,$9)
       RETURNING *`,
      [
        randomUUID(),
        record.accountId,
        record.game,
        record.betAmount.toString(),
        record.result,
        record.payout.toString(),
        record.payoutMultiplier,
        record.balanceAfter.toString(),
        JSON.stringify(record.detail),
      ]
    );
    return mapRow(rows[0]);
  }

  async listForAccount(accountId: string, query: HistoryQuery = {}): Promise<HistoryRecord[]> {
    const { limit, offset } = normalizePage(query);
    const params: unknown[] = [accountId];
    let sql = `SELECT * FROM game_history WHERE account_id = $1`;
    if (query.game) {
      params.push(query.game);
      sql += ` AND game = $${params.length}`;
    }
    sql += ` ORDER BY seq DESC LIMIT ${limit} OFFSET ${offset}`;
    const rows = await this.db.query<Row>(sql, params);
    return rows.map(mapRow);
  }

  async countForAccount(accountId: string): Promise<number> {
    const rows = await this.db.query<{ count: string | number }>(
      `SELECT COUNT(*) AS count FROM game_history WHERE account_id = $1`,
      [accountId]
    );
    return rows.length ? Number(rows[0].count) : 0;
  }
}

/** Stored records are deep copies; nothing handed out aliases them. */
export class MemoryHistoryRepository implements IHistoryRepository {
  /** Oldest first, as appended. */
  constructor(private readonly records: HistoryRecord[]) {}

  async append(record: NewHistoryRecord): Promise<HistoryRecord> {
    const stored: HistoryRecord = structuredClone({ ...record, id: randomUUID(), createdAt: new Date() });
    this.records.push(stored);
    return structuredClone(stored);
  }

  async listForAccount(accountId: string, query: HistoryQuery = {}): Promise<HistoryRecord[]> {
    const { limit, offset } = normalizePage(query);
    return this.records
      .filter((record) => record.accountId === accountId && (!query.game || record.game === query.game))
      .reverse()
      .slice(offset, offset + limit)
      .map((record) => structuredClone(record));
  }

  async countForAccount(accountId: string): Promise<number> {
    return this.records.filter((record) => record.accountId === accountId).length;
  }
}

interface Row {
  id: string;
  account_id: string;
  game: GameName;
  bet_amount: string | number;
  result: WagerResult;
  payout: string | number;
  payout_multiplier: string | number;
  balance_after: string | number;
  detail: Record<string, unknown> | string | null;
  created_at: string | Date;
}

function parseDetail(raw: Row["detail"]): Record<string, unknown> {
  if (raw === null) return {};
  if (typeof raw === "string") {
    const parsed: unknown = JSON.parse(raw);
    return parsed && typeof parsed === "object" && !Array.isArray(parsed) ? { ...parsed } : {};
  }
  return raw;
}

function mapRow(row: Row): HistoryRecord {
  return {
    id: row.id,
    accountId: row.account_id,
    game: row.game,
    betAmount: BigInt(row.bet_amount),
    result: row.result,
    payout: BigInt(row.payout),
    payoutMultiplier: Number(row.payout_multiplier),
    balanceAfter: BigInt(row.balance_after),
    detail: parseDetail(row.detail),
    createdAt: new Date(row.created_at),
  };
}
