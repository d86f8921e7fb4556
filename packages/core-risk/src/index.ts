import { isGameName } from "@coin-casino/core-types";
import type { GameConfig } from "@coin-casino/core-config";
import { CasinoError, CasinoErrorCode, invalidParameters } from "@coin-casino/core-errors";
import { applyMultiplier } from "@coin-casino/core-outcome";
import { TypedWager, WagerRequest, maxMultiplierFor, parseWager } from "@coin-casino/core-games";

export type AcceptedWager = TypedWager & { houseEdge: number };

export interface FundsView {
  balance: bigint;
}

export interface IWagerValidator {
  validate(account: FundsView, request: WagerRequest, config: GameConfig): AcceptedWager;
}

export const WAGER_VALIDATOR = Symbol("WAGER_VALIDATOR");

export type WagerRejectionReason =
  | "BET_UNDER_MIN_LIMIT"
  | "BET_OVER_MAX_LIMIT"
  | "PAYOUT_OVER_LIMIT"
  | "GAME_DISABLED"
  | "UNKNOWN_GAME";

function rejected(reason: WagerRejectionReason, message: string, details: Record<string, unknown> = {}): CasinoError {
  return invalidParameters(message, { reason, ...details });
}

/** Configured defaults under whatever the caller sent; non-object params are left for the resolver to reject. */
export function withDefaultParams(params: unknown, defaults: Record<string, unknown>): unknown {
  if (params === undefined || params === null) {
    return { ...defaults };
  }
  if (typeof params === "object" && !Array.isArray(params)) {
    return { ...defaults, ...params };
  }
  return params;
}

/**
 * Checks a wager against bet limits, funds, the game's own parameter rules
 * and the payout cap, in that order. Reads nothing and writes nothing.
 */
export class WagerValidator implements IWagerValidator {
  validate(account: FundsView, request: WagerRequest, config: GameConfig): AcceptedWager {
    if (!isGameName(request.game)) {
      throw rejected("UNKNOWN_GAME", `Unknown game: ${String(request.game)}`);
    }
    const { betAmount } = request;
    if (typeof betAmount !== "bigint" || betAmount <= BigInt(0)) {
      throw invalidParameters("betAmount must be a positive integer", { field: "betAmount" });
    }
    if (betAmount < config.minBet) {
      throw rejected("BET_UNDER_MIN_LIMIT", `Bet is below the minimum of ${config.minBet}`, {
        minBet: config.minBet.toString(),
      });
    }
    if (config.maxBet !== null && betAmount > config.maxBet) {
      throw rejected("BET_OVER_MAX_LIMIT", `Bet is above the maximum of ${config.maxBet}`, {
        maxBet: config.maxBet.toString(),
      });
    }
    if (betAmount > account.balance) {
      throw new CasinoError(CasinoErrorCode.INSUFFICIENT_FUNDS, "Insufficient balance for this bet", {
        balance: account.balance.toString(),
        betAmount: betAmount.toString(),
      });
    }

    const params = withDefaultParams(request.params, config.defaultParams);
    const wager = parseWager({ ...request, params }, config.houseEdge);

    if (config.maxPayout !== null) {
      const potentialPayout = applyMultiplier(betAmount, maxMultiplierFor(wager, config.houseEdge));
      if (potentialPayout > config.maxPayout) {
        throw rejected("PAYOUT_OVER_LIMIT", `Potential payout exceeds the maximum of ${config.maxPayout}`, {
          maxPayout: config.maxPayout.toString(),
          potentialPayout: potentialPayout.toString(),
        });
      }
    }

    if (!config.enabled) {
      throw rejected("GAME_DISABLED", `${request.game} is currently disabled`, { game: request.game });
    }
    return { ...wager, houseEdge: config.houseEdge };
  }
}
