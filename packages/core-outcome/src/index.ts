import type { GameName, WagerResult } from "@coin-casino/core-types";
import type { IRandomSource } from "@coin-casino/core-rng";
import { invalidParameters } from "@coin-casino/core-errors";

export type OutcomeDetail = Record<string, unknown>;

export interface Outcome<TDetail extends OutcomeDetail = OutcomeDetail> {
  won: boolean;
  result: WagerResult;
  /** Total return per coin staked, stake included; 0 on a loss. */
  payoutMultiplier: number;
  detail: TDetail;
}

/**
 * One per game. `resolve` must read randomness only from `source` so that a
 * fixed draw sequence always yields the same outcome.
 */
export interface GameResolver<TGame extends GameName, TParams, TDetail extends OutcomeDetail> {
  readonly game: TGame;
  readonly houseEdge: number;
  /** Throws INVALID_PARAMETERS for malformed or out-of-range input. */
  parseParams(raw: unknown): TParams;
  resolve(params: TParams, source: IRandomSource): Outcome<TDetail>;
  /** Largest multiplier a winning round with these params can pay. */
  maxMultiplier(params: TParams): number;
}

export const MULTIPLIER_SCALE = 10_000n;
const MULTIPLIER_DECIMALS = 4;

export function assertHouseEdge(houseEdge: number, label: string): number {
  if (!Number.isFinite(houseEdge) || houseEdge < 0 || houseEdge >= 100) {
    throw new Error(`${label}: houseEdge must be in [0, 100)`);
  }
  return houseEdge;
}

export function roundMultiplier(multiplier: number): number {
  return Number(multiplier.toFixed(MULTIPLIER_DECIMALS));
}

/** fair * (1 - edge), with the edge given in percent. */
export function applyHouseEdge(fairMultiplier: number, houseEdge: number): number {
  const edgeFactor = 1 - houseEdge / 100;
  const multiplier = fairMultiplier * edgeFactor;
  if (!Number.isFinite(multiplier) || multiplier < 0) {
    throw new Error("Invalid multiplier after house edge");
  }
  return roundMultiplier(multiplier);
}

/** floor(amount * multiplier) in integer coins. */
export function applyMultiplier(amount: bigint, multiplier: number): bigint {
  if (amount < 0n) {
    throw new Error("amount must not be negative");
  }
  if (!Number.isFinite(multiplier) || multiplier < 0) {
    throw new Error("multiplier must be a non-negative finite number");
  }
  const scaled = BigInt(Math.round(multiplier * Number(MULTIPLIER_SCALE)));
  return (amount * scaled) / MULTIPLIER_SCALE;
}

export function winOutcome<TDetail extends OutcomeDetail>(payoutMultiplier: number, detail: TDetail): Outcome<TDetail> {
  return { won: true, result: "win", payoutMultiplier, detail };
}

export function lossOutcome<TDetail extends OutcomeDetail>(detail: TDetail): Outcome<TDetail> {
  return { won: false, result: "loss", payoutMultiplier: 0, detail };
}

export function pushOutcome<TDetail extends OutcomeDetail>(detail: TDetail): Outcome<TDetail> {
  return { won: false, result: "push", payoutMultiplier: 1, detail };
}

// ---------- parameter readers shared by the resolvers ----------

export function readParams(raw: unknown, label: string): Record<string, unknown> {
  if (raw === undefined || raw === null) {
    return {};
  }
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw invalidParameters(`${label}: params must be an object`);
  }
  return { ...raw };
}

export function readInteger(
  params: Record<string, unknown>,
  field: string,
  label: string,
  bounds: { min: number; max: number; fallback?: number }
): number {
  const raw = params[field] ?? bounds.fallback;
  if (raw === undefined) {
    throw invalidParameters(`${label}: ${field} is required`, { field });
  }
  const value = typeof raw === "string" && raw.trim() !== "" ? Number(raw) : raw;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw invalidParameters(`${label}: ${field} must be an integer`, { field });
  }
  if (value < bounds.min || value > bounds.max) {
    throw invalidParameters(`${label}: ${field} must be between ${bounds.min} and ${bounds.max}`, {
      field,
      min: bounds.min,
      max: bounds.max,
    });
  }
  return value;
}

export function readChoice<T extends string>(
  params: Record<string, unknown>,
  field: string,
  choices: readonly T[],
  label: string,
  fallback?: T
): T {
  const raw = params[field] ?? fallback;
  if (typeof raw !== "string") {
    throw invalidParameters(`${label}: ${field} is required`, { field });
  }
  const normalized = raw.trim().toLowerCase();
  const match = choices.find((choice) => choice === normalized);
  if (!match) {
    throw invalidParameters(`${label}: ${field} must be one of ${choices.join(", ")}`, { field, choices: [...choices] });
  }
  return match;
}
