import { Inject, Injectable } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { isGameName } from "@coin-casino/core-types";
import { invalidParameters, toCasinoError } from "@coin-casino/core-errors";
import { DEFAULT_STARTING_BALANCE, GAME_CONFIG_SERVICE } from "@coin-casino/core-config";
import type { IGameConfigService } from "@coin-casino/core-config";
import { LOGGER } from "@coin-casino/core-logging";
import type { ILogger } from "@coin-casino/core-logging";
import { RANDOM_SOURCE } from "@coin-casino/core-rng";
import type { IRandomSource } from "@coin-casino/core-rng";
import type { Outcome } from "@coin-casino/core-outcome";
import { WagerRequest, resolveWager } from "@coin-casino/core-games";
import { WAGER_VALIDATOR } from "@coin-casino/core-risk";
import type { AcceptedWager, IWagerValidator } from "@coin-casino/core-risk";
import { isBankrupt } from "@coin-casino/core-wallet";
import type { Account } from "@coin-casino/core-wallet";
import type { HistoryQuery, HistoryRecord } from "@coin-casino/core-game-history";
import type { CoinRequest } from "@coin-casino/core-coin-requests";
import { AccountLedger, CoinRequestLedger, LedgerCallOptions, SettlementLedger } from "@coin-casino/core-ledger";

export interface PlayResult {
  outcome: Outcome;
  /** Balance right after this wager settled. */
  balance: bigint;
  /** True once the balance is zero; more coins only come through a coin request. */
  bankrupt: boolean;
  record: HistoryRecord;
}

export function startingBalanceFrom(config: ConfigService): bigint {
  const raw = config.get<string>("STARTING_BALANCE");
  if (raw === undefined || raw.trim() === "") {
    return DEFAULT_STARTING_BALANCE;
  }
  if (!/^\d+$/.test(raw.trim())) {
    throw new Error(`STARTING_BALANCE must be a non-negative integer, got "${raw}"`);
  }
  return BigInt(raw.trim());
}

@Injectable()
export class CasinoService {
  private readonly startingBalance: bigint;

  constructor(
    @Inject(AccountLedger) private readonly accounts: AccountLedger,
    @Inject(SettlementLedger) private readonly settlement: SettlementLedger,
    @Inject(CoinRequestLedger) private readonly coinRequests: CoinRequestLedger,
    @Inject(GAME_CONFIG_SERVICE) private readonly configService: IGameConfigService,
    @Inject(WAGER_VALIDATOR) private readonly validator: IWagerValidator,
    @Inject(RANDOM_SOURCE) private readonly random: IRandomSource,
    @Inject(LOGGER) private readonly logger: ILogger,
    @Inject(ConfigService) config: ConfigService
  ) {
    this.startingBalance = startingBalanceFrom(config);
  }

  openAccount(accountId: string, startingBalance: bigint = this.startingBalance): Promise<Account> {
    return this.accounts.open(accountId, startingBalance);
  }

  getAccount(accountId: string): Promise<Account> {
    return this.accounts.get(accountId);
  }

  /**
   * Validates the wager, draws its outcome and settles it. The outcome is
   * drawn before the account lock is taken; funds are checked again inside it.
   */
  async playGame(accountId: string, request: WagerRequest, options: LedgerCallOptions = {}): Promise<PlayResult> {
    const wager = await this.accept(accountId, request);
    const outcome = resolveWager(wager, wager.houseEdge, this.random);
    const { account, record } = await this.settlement.settle(
      { accountId, game: wager.game, betAmount: wager.betAmount, outcome },
      options
    );
    return { outcome, balance: account.balance, bankrupt: isBankrupt(account), record };
  }

  requestCoins(accountId: string, amount?: bigint, reason?: string): Promise<CoinRequest> {
    return this.coinRequests.request(accountId, amount, reason);
  }

  approveCoinRequest(coinRequestId: string, reviewer?: string): Promise<Account> {
    return this.coinRequests.approve(coinRequestId, reviewer ?? null);
  }

  rejectCoinRequest(coinRequestId: string, reviewer?: string): Promise<CoinRequest> {
    return this.coinRequests.reject(coinRequestId, reviewer ?? null);
  }

  /** Most recent first. */
  listHistory(accountId: string, query: HistoryQuery = {}): Promise<HistoryRecord[]> {
    return this.accounts.history(accountId, query);
  }

  listCoinRequests(accountId: string): Promise<CoinRequest[]> {
    return this.coinRequests.listForAccount(accountId);
  }

  listPendingCoinRequests(): Promise<CoinRequest[]> {
    return this.coinRequests.listPending();
  }

  private async accept(accountId: string, request: WagerRequest): Promise<AcceptedWager> {
    try {
      if (!isGameName(request.game)) {
        throw invalidParameters(`Unknown game: ${String(request.game)}`, { reason: "UNKNOWN_GAME" });
      }
      const account = await this.accounts.get(accountId);
      const config = await this.configService.getConfig(request.game);
      return this.validator.validate(account, request, config);
    } catch (err) {
      const error = toCasinoError(err);
      this.logger.warn("wager.rejected", {
        accountId,
        game: String(request.game),
        error: error.code,
        message: error.message,
        ...error.details,
      });
      throw error;
    }
  }
}
