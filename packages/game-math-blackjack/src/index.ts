import type { IRandomSource } from "@coin-casino/core-rng";
import { ACE, Card, Shoe, cardLabel, shuffledDeck } from "@coin-casino/game-math-cards";
import {
  GameResolver,
  Outcome,
  applyHouseEdge,
  assertHouseEdge,
  lossOutcome,
  pushOutcome,
  readInteger,
  readParams,
  winOutcome,
} from "@coin-casino/core-outcome";

export interface BlackjackParams {
  /** Player keeps hitting while below this total. */
  playerStandOn: number;
}

export type BlackjackSettlement =
  | "both_blackjack"
  | "player_blackjack"
  | "dealer_blackjack"
  | "player_bust"
  | "dealer_bust"
  | "higher_total"
  | "lower_total"
  | "equal_total";

export interface BlackjackDetail extends Record<string, unknown> {
  playerCards: string[];
  dealerCards: string[];
  playerTotal: number;
  dealerTotal: number;
  settlement: BlackjackSettlement;
}

export interface BlackjackConfig {
  houseEdge: number;
}

export interface HandValue {
  total: number;
  soft: boolean;
}

export interface BlackjackRound {
  player: Card[];
  dealer: Card[];
  settlement: BlackjackSettlement;
}

const BLACKJACK = 21;
const DEALER_STANDS_ON = 17;
const FAIR_WIN = 2;
const FAIR_BLACKJACK = 2.5;
const LABEL = "Blackjack";

export function cardPoints(card: Card): number {
  if (card.rank === ACE) return 11;
  return Math.min(card.rank, 10);
}

/** Aces count 11 until that would bust the hand, then 1. */
export function handValue(cards: readonly Card[]): HandValue {
  let total = 0;
  let softAces = 0;
  for (const card of cards) {
    total += cardPoints(card);
    if (card.rank === ACE) softAces += 1;
  }
  while (total > BLACKJACK && softAces > 0) {
    total -= 10;
    softAces -= 1;
  }
  return { total, soft: softAces > 0 };
}

export function isNatural(cards: readonly Card[]): boolean {
  return cards.length === 2 && handValue(cards).total === BLACKJACK;
}

/**
 * Plays one round from the top of the shoe: player, dealer, player, dealer,
 * then the player's hits, then the dealer's.
 */
export function playRound(shoe: Shoe, playerStandOn: number): BlackjackRound {
  const player = [shoe.draw()];
  const dealer = [shoe.draw()];
  player.push(shoe.draw());
  dealer.push(shoe.draw());

  const playerNatural = isNatural(player);
  const dealerNatural = isNatural(dealer);
  if (playerNatural || dealerNatural) {
    const settlement: BlackjackSettlement =
      playerNatural && dealerNatural ? "both_blackjack" : playerNatural ? "player_blackjack" : "dealer_blackjack";
    return { player, dealer, settlement };
  }

  while (handValue(player).total < playerStandOn) {
    player.push(shoe.draw());
  }
  const playerTotal = handValue(player).total;
  if (playerTotal > BLACKJACK) {
    return { player, dealer, settlement: "player_bust" };
  }

  // stands on every 17, soft ones included
  while (handValue(dealer).total < DEALER_STANDS_ON) {
    dealer.push(shoe.draw());
  }
  const dealerTotal = handValue(dealer).total;
  if (dealerTotal > BLACKJACK) {
    return { player, dealer, settlement: "dealer_bust" };
  }

  const settlement: BlackjackSettlement =
    playerTotal > dealerTotal ? "higher_total" : playerTotal < dealerTotal ? "lower_total" : "equal_total";
  return { player, dealer, settlement };
}

export class BlackjackMathEngine implements GameResolver<"blackjack", BlackjackParams, BlackjackDetail> {
  readonly game = "blackjack" as const;
  readonly houseEdge: number;

  constructor(config: BlackjackConfig) {
    this.houseEdge = assertHouseEdge(config.houseEdge, LABEL);
  }

  parseParams(raw: unknown): BlackjackParams {
    const params = readParams(raw, LABEL);
    return {
      playerStandOn: readInteger(params, "playerStandOn", LABEL, { min: 12, max: BLACKJACK, fallback: DEALER_STANDS_ON }),
    };
  }

  resolve(params: BlackjackParams, source: IRandomSource): Outcome<BlackjackDetail> {
    return this.settle(playRound(new Shoe(shuffledDeck(source)), params.playerStandOn));
  }

  settle(round: BlackjackRound): Outcome<BlackjackDetail> {
    const detail: BlackjackDetail = {
      playerCards: round.player.map(cardLabel),
      dealerCards: round.dealer.map(cardLabel),
      playerTotal: handValue(round.player).total,
      dealerTotal: handValue(round.dealer).total,
      settlement: round.settlement,
    };
    switch (round.settlement) {
      case "player_blackjack":
        return winOutcome(applyHouseEdge(FAIR_BLACKJACK, this.houseEdge), detail);
      case "dealer_bust":
      case "higher_total":
        return winOutcome(applyHouseEdge(FAIR_WIN, this.houseEdge), detail);
      case "both_blackjack":
      case "equal_total":
        return pushOutcome(detail);
      case "dealer_blackjack":
      case "player_bust":
      case "lower_total":
        return lossOutcome(detail);
    }
  }

  maxMultiplier(_params: BlackjackParams): number {
    return applyHouseEdge(FAIR_BLACKJACK, this.houseEdge);
  }
}
