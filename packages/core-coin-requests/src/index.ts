import { randomUUID } from "crypto";
import type { IDbClient } from "@coin-casino/core-db";
import type { CoinRequestStatus } from "@coin-casino/core-types";

export interface CoinRequest {
  id: string;
  accountId: string;
  amount: bigint;
  reason: string;
  status: CoinRequestStatus;
  reviewedBy: string | null;
  createdAt: Date;
  reviewedAt: Date | null;
}

export interface NewCoinRequest {
  accountId: string;
  amount: bigint;
  reason: string;
}

export interface CoinRequestReview {
  status: Exclude<CoinRequestStatus, "pending">;
  reviewedBy: string | null;
}

export interface ICoinRequestRepository {
  create(input: NewCoinRequest): Promise<CoinRequest>;
  findById(id: string): Promise<CoinRequest | null>;
  findPendingForAccount(accountId: string): Promise<CoinRequest | null>;
  /** Moves a pending request to its final status; null when it was not pending. */
  review(id: string, review: CoinRequestReview): Promise<CoinRequest | null>;
  /** Newest first. */
  listForAccount(accountId: string): Promise<CoinRequest[]>;
  /** Newest first. */
  listPending(): Promise<CoinRequest[]>;
}

export const DEFAULT_COIN_REQUEST_AMOUNT = BigInt(1000);

export class CoinRequestRepository implements ICoinRequestRepository {
  constructor(private readonly db: IDbClient) {}

  async create(input: NewCoinRequest): Promise<CoinRequest> {
    const rows = await this.db.query<Row>(
      `INSERT INTO coin_requests (id, account_id, amount, reason, status)
       VALUES ($1, $2, $3, $4, 'pending')
       RETURNING *`,
      [randomUUID(), input.accountId, input.amount.toString(), input.reason]
    );
    return mapRow(rows[0]);
  }

  async findById(id: string): Promise<CoinRequest | null> {
    const rows = await this.db.query<Row>(`SELECT * FROM coin_requests WHERE id = $1`, [id]);
    return rows.length ? mapRow(rows[0]) : null;
  }

  async findPendingForAccount(accountId: string): Promise<CoinRequest | null> {
    const rows = await this.db.query<Row>(
      `SELECT * FROM coin_requests WHERE account_id = $1 AND status = 'pending' ORDER BY seq DESC LIMIT 1`,
      [accountId]
    );
    return rows.length ? mapRow(rows[0]) : null;
  }

  async review(id: string, review: CoinRequestReview): Promise<CoinRequest | null> {
    const rows = await this.db.query<Row>(
      `UPDATE coin_requests
       SET status = $2, reviewed_by = $3, reviewed_at = NOW()
       WHERE id = $1 AND status = 'pending'
       RETURNING *`,
      [id, review.status, review.reviewedBy]
    );
    return rows.length ? mapRow(rows[0]) : null;
  }

  async listForAccount(accountId: string): Promise<CoinRequest[]> {
    const rows = await this.db.query<Row>(`SELECT * FROM coin_requests WHERE account_id = $1 ORDER BY seq DESC`, [
      accountId,
    ]);
    return rows.map(mapRow);
  }

  async listPending(): Promise<CoinRequest[]> {
    const rows = await this.db.query<Row>(`SELECT * FROM coin_requests WHERE status = 'pending' ORDER BY seq DESC`);
    return rows.map(mapRow);
  }
}

export class MemoryCoinRequestRepository implements ICoinRequestRepository {
  /** Insertion order is creation order. */
  constructor(private readonly requests: Map<string, CoinRequest>) {}

  async create(input: NewCoinRequest): Promise<CoinRequest> {
    const request: CoinRequest = {
      ...input,
      id: randomUUID(),
      status: "pending",
      reviewedBy: null,
      createdAt: new Date(),
      reviewedAt: null,
    };
    this.requests.set(request.id, request);
    return { ...request };
  }

  async findById(id: string): Promise<CoinRequest | null> {
    const request = this.requests.get(id);
    return request ? { ...request } : null;
  }

  async findPendingForAccount(accountId: string): Promise<CoinRequest | null> {
    return this.newestFirst().find((request) => request.accountId === accountId && request.status === "pending") ?? null;
  }

  async review(id: string, review: CoinRequestReview): Promise<CoinRequest | null> {
    const current = this.requests.get(id);
    if (!current || current.status !== "pending") {
      return null;
    }
    const next: CoinRequest = { ...current, ...review, reviewedAt: new Date() };
    this.requests.set(id, next);
    return { ...next };
  }

  async listForAccount(accountId: string): Promise<CoinRequest[]> {
    return this.newestFirst().filter((request) => request.accountId === accountId);
  }

  async listPending(): Promise<CoinRequest[]> {
    return this.newestFirst().filter((request) => request.status === "pending");
  }

  private newestFirst(): CoinRequest[] {
    return [...this.requests.values()].reverse().map((request) => ({ ...request }));
  }
}

interface Row {
  id: string;
  account_id: string;
  amount: string | number;
  reason: string | null;
  status: CoinRequestStatus;
  reviewed_by: string | null;
  created_at: string | Date;
  reviewed_at: string | Date | null;
}

function mapRow(row: Row): CoinRequest {
  return {
    id: row.id,
    accountId: row.account_id,
    amount: BigInt(row.amount),
    reason: row.reason ?? "",
    status: row.status,
    reviewedBy: row.reviewed_by,
    createdAt: new Date(row.created_at),
    reviewedAt: row.reviewed_at ? new Date(row.reviewed_at) : null,
  };
}
