export type GameName =
  | "blackjack"
  | "poker"
  | "roulette"
  | "dice"
  | "minesweeper";

export type WagerResult = "win" | "loss" | "push";

export type CoinRequestStatus = "pending" | "approved" | "rejected";

export interface PageOptions {
  limit?: number;
  offset?: number;
}

export const ALL_GAMES: GameName[] = [
  "blackjack",
  "poker",
  "roulette",
  "dice",
  "minesweeper",
];

export function isGameName(value: unknown): value is GameName {
  return typeof value === "string" && ALL_GAMES.some((game) => game === value);
}
