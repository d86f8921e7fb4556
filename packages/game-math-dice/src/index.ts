import type { IRandomSource } from "@coin-casino/core-rng";
import { invalidParameters } from "@coin-casino/core-errors";
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

export type DiceCondition = "under" | "over" | "range";

export type RollParams =
  | { condition: "under"; target: number }
  | { condition: "over"; target: number }
  | { condition: "range"; min: number; max: number };

export type PairBet = "exact" | "over" | "under" | "odd_even" | "seven";

/** Bets on the sum of two six-sided dice. */
export type PairParams =
  | { mode: "pair"; bet: "exact"; target: number }
  | { mode: "pair"; bet: "over"; target: number }
  | { mode: "pair"; bet: "under"; target: number }
  | { mode: "pair"; bet: "odd_even"; parity: "odd" | "even" }
  | { mode: "pair"; bet: "seven" };

export type DiceParams = RollParams | PairParams;

export interface DiceDetail extends Record<string, unknown> {
  winChance: number;
  roll?: number;
  condition?: DiceCondition;
  target?: number;
  min?: number;
  max?: number;
  mode?: "pair";
  die1?: number;
  die2?: number;
  total?: number;
  bet?: PairBet;
  parity?: "odd" | "even";
}

export interface DiceMathConfig {
  houseEdge: number; // percent
}

const FACES = 100;
const MAX_RANGE_WIDTH = 98;
const CONDITIONS: readonly DiceCondition[] = ["under", "over", "range"];
const MODES = ["d100", "pair"] as const;
const PAIR_BETS: readonly PairBet[] = ["exact", "over", "under", "odd_even", "seven"];
const PARITIES = ["odd", "even"] as const;
const DIE_FACES = 6;
const PAIR_OUTCOMES = DIE_FACES * DIE_FACES;
const LABEL = "Dice";

export function isPairBet(params: DiceParams): params is PairParams {
  return "mode" in params;
}

function pairWins(params: PairParams, total: number): boolean {
  switch (params.bet) {
    case "exact":
      return total === params.target;
    case "over":
      return total > params.target;
    case "under":
      return total < params.target;
    case "odd_even":
      return (total % 2 === 1) === (params.parity === "odd");
    case "seven":
      return total === 7;
  }
}

/** Winning (die1, die2) combinations out of 36. */
export function pairWinningCombos(params: PairParams): number {
  let count = 0;
  for (let a = 1; a <= DIE_FACES; a++) {
    for (let b = 1; b <= DIE_FACES; b++) {
      if (pairWins(params, a + b)) count++;
    }
  }
  return count;
}

export class DiceMathEngine implements GameResolver<"dice", DiceParams, DiceDetail> {
  readonly game = "dice" as const;
  readonly houseEdge: number;

  constructor(config: DiceMathConfig) {
    this.houseEdge = assertHouseEdge(config.houseEdge, LABEL);
  }

  parseParams(raw: unknown): DiceParams {
    const params = readParams(raw, LABEL);
    if (readChoice(params, "mode", MODES, LABEL, "d100") === "pair") {
      return this.parsePair(params);
    }
    const condition = readChoice(params, "condition", CONDITIONS, LABEL, "under");
    switch (condition) {
      case "under":
        // roll < target must be possible and not certain
        return { condition, target: readInteger(params, "target", LABEL, { min: 2, max: FACES }) };
      case "over":
        return { condition, target: readInteger(params, "target", LABEL, { min: 1, max: FACES - 1 }) };
      case "range": {
        const min = readInteger(params, "min", LABEL, { min: 1, max: FACES });
        const max = readInteger(params, "max", LABEL, { min: 1, max: FACES });
        if (max < min) {
          throw invalidParameters(`${LABEL}: max must not be below min`, { min, max });
        }
        if (max - min + 1 > MAX_RANGE_WIDTH) {
          throw invalidParameters(`${LABEL}: range may cover at most ${MAX_RANGE_WIDTH} faces`, { min, max });
        }
        return { condition, min, max };
      }
    }
  }

  resolve(params: DiceParams, source: IRandomSource): Outcome<DiceDetail> {
    if (isPairBet(params)) {
      const die1 = source.nextInt(1, DIE_FACES);
      const die2 = source.nextInt(1, DIE_FACES);
      const total = die1 + die2;
      const detail: DiceDetail = { die1, die2, total, winChance: this.winChance(params), ...params };
      return pairWins(params, total) ? winOutcome(this.maxMultiplier(params), detail) : lossOutcome(detail);
    }
    const roll = source.nextInt(1, FACES);
    const winChance = this.winChance(params);
    const detail: DiceDetail = { roll, winChance, ...params };
    return this.isWin(params, roll) ? winOutcome(this.maxMultiplier(params), detail) : lossOutcome(detail);
  }

  maxMultiplier(params: DiceParams): number {
    return applyHouseEdge(1 / this.winChance(params), this.houseEdge);
  }

  winChance(params: DiceParams): number {
    if (isPairBet(params)) {
      return pairWinningCombos(params) / PAIR_OUTCOMES;
    }
    switch (params.condition) {
      case "under":
        return (params.target - 1) / FACES;
      case "over":
        return (FACES - params.target) / FACES;
      case "range":
        return (params.max - params.min + 1) / FACES;
    }
  }

  private parsePair(params: Record<string, unknown>): PairParams {
    const bet = readChoice(params, "bet", PAIR_BETS, LABEL);
    switch (bet) {
      case "exact":
        return { mode: "pair", bet, target: readInteger(params, "target", LABEL, { min: 2, max: 12 }) };
      case "over":
        return { mode: "pair", bet, target: readInteger(params, "target", LABEL, { min: 2, max: 11 }) };
      case "under":
        return { mode: "pair", bet, target: readInteger(params, "target", LABEL, { min: 3, max: 12 }) };
      case "odd_even":
        return { mode: "pair", bet, parity: readChoice(params, "parity", PARITIES, LABEL) };
      case "seven":
        return { mode: "pair", bet };
    }
  }

  private isWin(params: RollParams, roll: number): boolean {
    switch (params.condition) {
      case "under":
        return roll < params.target;
      case "over":
        return roll > params.target;
      case "range":
        return roll >= params.min && roll <= params.max;
    }
  }
}
