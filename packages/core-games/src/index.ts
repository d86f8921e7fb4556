import type { GameName } from "@coin-casino/core-types";
import type { IRandomSource } from "@coin-casino/core-rng";
import { invalidParameters } from "@coin-casino/core-errors";
import type { GameResolver, Outcome, OutcomeDetail } from "@coin-casino/core-outcome";
import { BlackjackMathEngine, BlackjackParams } from "@coin-casino/game-math-blackjack";
import { DiceMathEngine, DiceParams } from "@coin-casino/game-math-dice";
import { MinesMathEngine, MinesParams } from "@coin-casino/game-math-mines";
import { PokerMathEngine, PokerParams } from "@coin-casino/game-math-poker";
import { RouletteEngine, RouletteParams } from "@coin-casino/game-math-roulette";

/** A wager as submitted: params are whatever the caller sent. */
export interface WagerRequest {
  game: GameName;
  betAmount: bigint;
  params?: unknown;
}

export interface GameParams {
  blackjack: BlackjackParams;
  poker: PokerParams;
  roulette: RouletteParams;
  dice: DiceParams;
  minesweeper: MinesParams;
}

/** A wager whose params have been parsed for its game. */
export type TypedWager = {
  [G in GameName]: { game: G; betAmount: bigint; params: GameParams[G] };
}[GameName];

type ResolverFactory = (houseEdge: number) => GameResolver<GameName, unknown, OutcomeDetail>;

export const RESOLVER_FACTORIES = {
  blackjack: (houseEdge: number) => new BlackjackMathEngine({ houseEdge }),
  poker: (houseEdge: number) => new PokerMathEngine({ houseEdge }),
  roulette: (houseEdge: number) => new RouletteEngine({ houseEdge }),
  dice: (houseEdge: number) => new DiceMathEngine({ houseEdge }),
  minesweeper: (houseEdge: number) => new MinesMathEngine({ houseEdge }),
} satisfies Record<GameName, ResolverFactory>;

function unknownGame(game: never): never {
  throw invalidParameters(`Unknown game: ${String(game)}`, { game: String(game) });
}

/** Throws INVALID_PARAMETERS when the params do not fit the game. */
export function parseWager(request: WagerRequest, houseEdge: number): TypedWager {
  const { betAmount } = request;
  switch (request.game) {
    case "blackjack":
      return { game: "blackjack", betAmount, params: RESOLVER_FACTORIES.blackjack(houseEdge).parseParams(request.params) };
    case "poker":
      return { game: "poker", betAmount, params: RESOLVER_FACTORIES.poker(houseEdge).parseParams(request.params) };
    case "roulette":
      return { game: "roulette", betAmount, params: RESOLVER_FACTORIES.roulette(houseEdge).parseParams(request.params) };
    case "dice":
      return { game: "dice", betAmount, params: RESOLVER_FACTORIES.dice(houseEdge).parseParams(request.params) };
    case "minesweeper":
      return {
        game: "minesweeper",
        betAmount,
        params: RESOLVER_FACTORIES.minesweeper(houseEdge).parseParams(request.params),
      };
    default:
      return unknownGame(request.game);
  }
}

export function resolveWager(wager: TypedWager, houseEdge: number, source: IRandomSource): Outcome {
  switch (wager.game) {
    case "blackjack":
      return RESOLVER_FACTORIES.blackjack(houseEdge).resolve(wager.params, source);
    case "poker":
      return RESOLVER_FACTORIES.poker(houseEdge).resolve(wager.params, source);
    case "roulette":
      return RESOLVER_FACTORIES.roulette(houseEdge).resolve(wager.params, source);
    case "dice":
      return RESOLVER_FACTORIES.dice(houseEdge).resolve(wager.params, source);
    case "minesweeper":
      return RESOLVER_FACTORIES.minesweeper(houseEdge).resolve(wager.params, source);
    default:
      return unknownGame(wager);
  }
}

/** The largest multiplier this wager can be paid, for payout caps. */
export function maxMultiplierFor(wager: TypedWager, houseEdge: number): number {
  switch (wager.game) {
    case "blackjack":
      return RESOLVER_FACTORIES.blackjack(houseEdge).maxMultiplier(wager.params);
    case "poker":
      return RESOLVER_FACTORIES.poker(houseEdge).maxMultiplier(wager.params);
    case "roulette":
      return RESOLVER_FACTORIES.roulette(houseEdge).maxMultiplier(wager.params);
    case "dice":
      return RESOLVER_FACTORIES.dice(houseEdge).maxMultiplier(wager.params);
    case "minesweeper":
      return RESOLVER_FACTORIES.minesweeper(houseEdge).maxMultiplier(wager.params);
    default:
      return unknownGame(wager);
  }
}
