import type { IRandomSource } from "@coin-casino/core-rng";
import {
  GameResolver,
  Outcome,
  applyHouseEdge,
  assertHouseEdge,
  lossOutcome,
  readChoice,
  readInteger,
  readParams,
  winOutcome,
} from "@coin-casino/core-outcome";

export type RouletteBetType = "straight" | "color" | "parity" | "dozen" | "high_low" | "column";
export type PocketColor = "red" | "black" | "green";
export type Third = 1 | 2 | 3;

export type RouletteParams =
  | { betType: "straight"; value: number }
  | { betType: "color"; value: "red" | "black" }
  | { betType: "parity"; value: "odd" | "even" }
  | { betType: "dozen"; value: Third }
  | { betType: "high_low"; value: "low" | "high" }
  | { betType: "column"; value: Third };

export interface RouletteDetail extends Record<string, unknown> {
  number: number;
  color: PocketColor;
  betType: RouletteBetType;
  value: RouletteParams["value"];
}

export interface RouletteConfig {
  houseEdge: number;
}

const POCKETS = 37;
const BET_TYPES: readonly RouletteBetType[] = ["straight", "color", "parity", "dozen", "high_low", "column"];
const THIRDS: readonly Third[] = [1, 2, 3];
const RED_NUMBERS = new Set([1, 3, 5, 7, 9, 12, 14, 16, 18, 19, 21, 23, 25, 27, 30, 32, 34, 36]);
const LABEL = "Roulette";

export function pocketColor(pocket: number): PocketColor {
  if (pocket === 0) return "green";
  return RED_NUMBERS.has(pocket) ? "red" : "black";
}

/** Number of pockets (out of 37) that win the bet. */
export function winningPockets(params: RouletteParams): number {
  switch (params.betType) {
    case "straight":
      return 1;
    case "color":
    case "parity":
    case "high_low":
      return 18;
    case "dozen":
    case "column":
      return 12;
  }
}

export function isWinningPocket(params: RouletteParams, pocket: number): boolean {
  if (params.betType === "straight") {
    return pocket === params.value;
  }
  // zero loses every outside bet
  if (pocket === 0) {
    return false;
  }
  switch (params.betType) {
    case "color":
      return pocketColor(pocket) === params.value;
    case "parity":
      return (pocket % 2 === 0 ? "even" : "odd") === params.value;
    case "dozen":
      return Math.ceil(pocket / 12) === params.value;
    case "high_low":
      return (pocket <= 18 ? "low" : "high") === params.value;
    case "column":
      return ((pocket - 1) % 3) + 1 === params.value;
  }
}

function readThird(params: Record<string, unknown>): Third {
  const raw = readInteger(params, "value", LABEL, { min: 1, max: 3 });
  const third = THIRDS.find((candidate) => candidate === raw);
  return third ?? 1;
}

export class RouletteEngine implements GameResolver<"roulette", RouletteParams, RouletteDetail> {
  readonly game = "roulette" as const;
  readonly houseEdge: number;

  constructor(config: RouletteConfig) {
    this.houseEdge = assertHouseEdge(config.houseEdge, LABEL);
  }

  parseParams(raw: unknown): RouletteParams {
    const params = readParams(raw, LABEL);
    const betType = readChoice(params, "betType", BET_TYPES, LABEL);
    switch (betType) {
      case "straight":
        return { betType, value: readInteger(params, "value", LABEL, { min: 0, max: POCKETS - 1 }) };
      case "color":
        return { betType, value: readChoice(params, "value", ["red", "black"] as const, LABEL) };
      case "parity":
        return { betType, value: readChoice(params, "value", ["odd", "even"] as const, LABEL) };
      case "high_low":
        return { betType, value: readChoice(params, "value", ["low", "high"] as const, LABEL) };
      case "dozen":
      case "column":
        return { betType, value: readThird(params) };
    }
  }

  resolve(params: RouletteParams, source: IRandomSource): Outcome<RouletteDetail> {
    const pocket = source.nextInt(0, POCKETS - 1);
    const detail: RouletteDetail = {
      number: pocket,
      color: pocketColor(pocket),
      betType: params.betType,
      value: params.value,
    };
    return isWinningPocket(params, pocket) ? winOutcome(this.maxMultiplier(params), detail) : lossOutcome(detail);
  }

  maxMultiplier(params: RouletteParams): number {
    return applyHouseEdge(POCKETS / winningPockets(params), this.houseEdge);
  }
}
