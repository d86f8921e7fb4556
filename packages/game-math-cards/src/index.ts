import { IRandomSource, shuffle } from "@coin-casino/core-rng";

export type Suit = "clubs" | "diamonds" | "hearts" | "spades";

/** 2..10, then J=11, Q=12, K=13, A=14. */
export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14;

export interface Card {
  rank: Rank;
  suit: Suit;
}

export const SUITS: readonly Suit[] = ["clubs", "diamonds", "hearts", "spades"];
export const RANKS: readonly Rank[] = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14];

export const ACE: Rank = 14;
export const JACK: Rank = 11;

const RANK_LABELS: Record<Rank, string> = {
  2: "2",
  3: "3",
  4: "4",
  5: "5",
  6: "6",
  7: "7",
  8: "8",
  9: "9",
  10: "10",
  11: "J",
  12: "Q",
  13: "K",
  14: "A",
};

const SUIT_LABELS: Record<Suit, string> = {
  clubs: "c",
  diamonds: "d",
  hearts: "h",
  spades: "s",
};

/** Ordered 52-card deck, suit-major. */
export function createDeck(): Card[] {
  return SUITS.flatMap((suit) => RANKS.map((rank) => ({ rank, suit })));
}

export function shuffledDeck(source: IRandomSource): Card[] {
  return shuffle(createDeck(), source);
}

/** Short form such as "Ah" or "10s". */
export function cardLabel(card: Card): string {
  return `${RANK_LABELS[card.rank]}${SUIT_LABELS[card.suit]}`;
}

/**
 * Deals from the top of a deck. Running out is a programming error: no game
 * here draws more than 52 cards.
 */
export class Shoe {
  private cursor = 0;

  constructor(private readonly cards: readonly Card[]) {}

  draw(): Card {
    const card = this.cards[this.cursor];
    if (!card) {
      throw new Error("Shoe exhausted");
    }
    this.cursor += 1;
    return card;
  }

  get dealt(): number {
    return this.cursor;
  }
}
