import { GameName } from "@coin-casino/core-types";
import { invalidParameters } from "@coin-casino/core-errors";
import { DEFAULT_HOUSE_EDGES } from "@coin-casino/core-config";
import { SeededRandomSource } from "@coin-casino/core-rng";
import { applyMultiplier } from "@coin-casino/core-outcome";
import { parseWager, resolveWager } from "@coin-casino/core-games";

export interface SimulationOptions {
  game: GameName;
  rounds: number;
  seed: number;
  bet?: bigint;
  params?: unknown;
  /** Defaults to the game's standard edge. */
  houseEdge?: number;
}

export interface SimulationReport {
  game: GameName;
  rounds: number;
  seed: number;
  houseEdge: number;
  totalBet: string;
  totalPayout: string;
  /** Percent of stakes returned, two decimals. */
  rtp: number;
  winRate: number;
  pushRate: number;
}

export function calculateRTP(totalPayout: bigint, totalBet: bigint): number {
  return Number((totalPayout * BigInt(10000)) / (totalBet === BigInt(0) ? BigInt(1) : totalBet)) / 100;
}

/** Plays `rounds` wagers of one game against a seeded source; no accounts are touched. */
export function simulate(options: SimulationOptions): SimulationReport {
  const { game, rounds, seed } = options;
  if (!Number.isInteger(rounds) || rounds < 1) {
    throw invalidParameters("rounds must be a positive integer", { field: "rounds" });
  }
  const bet = options.bet ?? BigInt(100);
  if (bet <= BigInt(0)) {
    throw invalidParameters("bet must be a positive integer", { field: "bet" });
  }
  const houseEdge = options.houseEdge ?? DEFAULT_HOUSE_EDGES[game];
  const wager = parseWager({ game, betAmount: bet, params: options.params }, houseEdge);
  const source = new SeededRandomSource(seed);

  let totalBet = BigInt(0);
  let totalPayout = BigInt(0);
  let wins = 0;
  let pushes = 0;

  for (let i = 0; i < rounds; i++) {
    const outcome = resolveWager(wager, houseEdge, source);
    totalBet += bet;
    totalPayout += applyMultiplier(bet, outcome.payoutMultiplier);
    if (outcome.won) wins += 1;
    if (outcome.result === "push") pushes += 1;
  }

  return {
    game,
    rounds,
    seed,
    houseEdge,
    totalBet: totalBet.toString(),
    totalPayout: totalPayout.toString(),
    rtp: calculateRTP(totalPayout, totalBet),
    winRate: wins / rounds,
    pushRate: pushes / rounds,
  };
}
