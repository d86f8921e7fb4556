import type { IRandomSource } from "@coin-casino/core-rng";
import { ACE, Card, JACK, Shoe, cardLabel, shuffledDeck } from "@coin-casino/game-math-cards";
import {
  GameResolver,
  Outcome,
  applyHouseEdge,
  assertHouseEdge,
  lossOutcome,
  readParams,
  winOutcome,
} from "@coin-casino/core-outcome";

export type PokerHand =
  | "royal_flush"
  | "straight_flush"
  | "four_of_a_kind"
  | "full_house"
  | "flush"
  | "straight"
  | "three_of_a_kind"
  | "two_pair"
  | "jacks_or_better"
  | "nothing";

/** Total return per coin before the house edge. */
export const FAIR_PAYTABLE: Record<PokerHand, number> = {
  royal_flush: 251,
  straight_flush: 51,
  four_of_a_kind: 26,
  full_house: 10,
  flush: 7,
  straight: 5,
  three_of_a_kind: 4,
  two_pair: 3,
  jacks_or_better: 2,
  nothing: 0,
};

const MADE_HANDS: ReadonlySet<PokerHand> = new Set<PokerHand>([
  "royal_flush",
  "straight_flush",
  "four_of_a_kind",
  "full_house",
  "flush",
  "straight",
]);

export type PokerParams = Record<string, never>;

export interface PokerDetail extends Record<string, unknown> {
  dealt: string[];
  held: number[];
  final: string[];
  hand: PokerHand;
}

export interface PokerConfig {
  houseEdge: number;
}

export interface DrawRound {
  dealt: Card[];
  held: number[];
  final: Card[];
  hand: PokerHand;
}

const HAND_SIZE = 5;
const LABEL = "Poker";

function rankCounts(cards: readonly Card[]): Map<number, number> {
  const counts = new Map<number, number>();
  for (const card of cards) {
    counts.set(card.rank, (counts.get(card.rank) ?? 0) + 1);
  }
  return counts;
}

function isStraight(cards: readonly Card[]): boolean {
  const ranks = [...new Set(cards.map((card) => card.rank))].sort((a, b) => a - b);
  if (ranks.length !== HAND_SIZE) return false;
  if (ranks[HAND_SIZE - 1] - ranks[0] === HAND_SIZE - 1) return true;
  // A-2-3-4-5
  return ranks[HAND_SIZE - 1] === ACE && ranks[3] === 5 && ranks[0] === 2;
}

export function evaluateHand(cards: readonly Card[]): PokerHand {
  if (cards.length !== HAND_SIZE) {
    throw new Error(`${LABEL}: a hand has exactly ${HAND_SIZE} cards`);
  }
  const flush = cards.every((card) => card.suit === cards[0].suit);
  const straight = isStraight(cards);
  if (flush && straight) {
    const lowest = Math.min(...cards.map((card) => card.rank));
    return lowest === 10 ? "royal_flush" : "straight_flush";
  }

  const counts = rankCounts(cards);
  const groups = [...counts.values()].sort((a, b) => b - a);
  if (groups[0] === 4) return "four_of_a_kind";
  if (groups[0] === 3 && groups[1] === 2) return "full_house";
  if (flush) return "flush";
  if (straight) return "straight";
  if (groups[0] === 3) return "three_of_a_kind";
  if (groups[0] === 2 && groups[1] === 2) return "two_pair";
  const highPair = [...counts.entries()].some(([rank, count]) => count === 2 && rank >= JACK);
  return highPair ? "jacks_or_better" : "nothing";
}

/**
 * Fixed hold policy: keep a made hand, else every repeated rank, else every
 * jack or higher, else nothing. Returns indices into `cards`.
 */
export function chooseHolds(cards: readonly Card[]): number[] {
  const indices = cards.map((_, idx) => idx);
  if (MADE_HANDS.has(evaluateHand(cards))) {
    return indices;
  }
  const counts = rankCounts(cards);
  const paired = indices.filter((idx) => (counts.get(cards[idx].rank) ?? 0) > 1);
  if (paired.length > 0) {
    return paired;
  }
  return indices.filter((idx) => cards[idx].rank >= JACK);
}

export function playDraw(shoe: Shoe): DrawRound {
  const dealt = Array.from({ length: HAND_SIZE }, () => shoe.draw());
  const held = chooseHolds(dealt);
  const final = dealt.map((card, idx) => (held.includes(idx) ? card : shoe.draw()));
  return { dealt, held, final, hand: evaluateHand(final) };
}

export class PokerMathEngine implements GameResolver<"poker", PokerParams, PokerDetail> {
  readonly game = "poker" as const;
  readonly houseEdge: number;

  constructor(config: PokerConfig) {
    this.houseEdge = assertHouseEdge(config.houseEdge, LABEL);
  }

  parseParams(raw: unknown): PokerParams {
    readParams(raw, LABEL);
    return {};
  }

  resolve(_params: PokerParams, source: IRandomSource): Outcome<PokerDetail> {
    return this.settle(playDraw(new Shoe(shuffledDeck(source))));
  }

  settle(round: DrawRound): Outcome<PokerDetail> {
    const detail: PokerDetail = {
      dealt: round.dealt.map(cardLabel),
      held: round.held,
      final: round.final.map(cardLabel),
      hand: round.hand,
    };
    const fair = FAIR_PAYTABLE[round.hand];
    return fair > 0 ? winOutcome(applyHouseEdge(fair, this.houseEdge), detail) : lossOutcome(detail);
  }

  maxMultiplier(_params: PokerParams): number {
    return applyHouseEdge(FAIR_PAYTABLE.royal_flush, this.houseEdge);
  }
}
