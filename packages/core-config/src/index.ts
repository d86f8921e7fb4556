import { ALL_GAMES, GameName } from "@coin-casino/core-types";
import type { IDbClient } from "@coin-casino/core-db";
import type { IKeyValueStore } from "@coin-casino/core-redis";

export interface GameConfig {
  game: GameName;
  minBet: bigint;
  /** null means the account balance is the only ceiling. */
  maxBet: bigint | null;
  /** Percent, e.g. 7 = 7% house edge. */
  houseEdge: number;
  enabled: boolean;
  /** Largest total return one wager may be offered; null means no cap. */
  maxPayout: bigint | null;
  /** Params filled in for any field the wager leaves out. */
  defaultParams: Record<string, unknown>;
}

export interface IGameConfigService {
  getConfig(game: GameName): Promise<GameConfig>;
}

export const GAME_CONFIG_SERVICE = Symbol("GAME_CONFIG_SERVICE");

export const DEFAULT_HOUSE_EDGES: Record<GameName, number> = {
  blackjack: 7,
  poker: 8,
  roulette: 11,
  dice: 7,
  minesweeper: 8,
};

export const DEFAULT_STARTING_BALANCE = BigInt(1000);

export function defaultGameConfig(game: GameName): GameConfig {
  return {
    game,
    minBet: BigInt(1),
    maxBet: null,
    houseEdge: DEFAULT_HOUSE_EDGES[game],
    enabled: true,
    maxPayout: null,
    defaultParams: {},
  };
}

export function validateGameConfig(config: GameConfig): GameConfig {
  if (!Number.isFinite(config.houseEdge) || config.houseEdge < 0 || config.houseEdge >= 100) {
    throw new Error(`Config for ${config.game}: houseEdge must be in [0, 100)`);
  }
  if (config.minBet < BigInt(1)) {
    throw new Error(`Config for ${config.game}: minBet must be at least 1`);
  }
  if (config.maxBet !== null && config.maxBet < config.minBet) {
    throw new Error(`Config for ${config.game}: maxBet must not be below minBet`);
  }
  if (config.maxPayout !== null && config.maxPayout < BigInt(1)) {
    throw new Error(`Config for ${config.game}: maxPayout must be at least 1`);
  }
  return config;
}

export class StaticGameConfigService implements IGameConfigService {
  private readonly configs: Map<GameName, GameConfig>;

  constructor(overrides: Partial<Record<GameName, Partial<Omit<GameConfig, "game">>>> = {}) {
    this.configs = new Map(
      ALL_GAMES.map((game) => [game, validateGameConfig({ ...defaultGameConfig(game), ...overrides[game], game })])
    );
  }

  async getConfig(game: GameName): Promise<GameConfig> {
    return this.configs.get(game) ?? defaultGameConfig(game);
  }
}

const CACHE_KEY = (game: GameName) => `config:${game}`;

export class DbGameConfigService implements IGameConfigService {
  constructor(private readonly db: IDbClient, private readonly cache: IKeyValueStore, private readonly ttlSeconds = 60) {}

  async getConfig(game: GameName): Promise<GameConfig> {
    const key = CACHE_KEY(game);
    const cached = await this.cache.get<GameConfig>(key);
    if (cached) return cached;

    const rows = await this.db.query<ConfigRow>(`SELECT * FROM game_configs WHERE game = $1 LIMIT 1`, [game]);

    const row = rows[0];
    const config = row
      ? validateGameConfig({
          game,
          minBet: BigInt(row.min_bet),
          maxBet: row.max_bet === null ? null : BigInt(row.max_bet),
          houseEdge: Number(row.house_edge),
          enabled: row.enabled,
          maxPayout: row.max_payout === null ? null : BigInt(row.max_payout),
          defaultParams: parseDefaultParams(row.default_params),
        })
      : defaultGameConfig(game);

    await this.cache.set(key, config, this.ttlSeconds);
    return config;
  }
}

interface ConfigRow {
  game: GameName;
  min_bet: string | number;
  max_bet: string | number | null;
  house_edge: string | number;
  enabled: boolean;
  max_payout: string | number | null;
  default_params: Record<string, unknown> | string | null;
}

function parseDefaultParams(raw: ConfigRow["default_params"]): Record<string, unknown> {
  if (raw === null) return {};
  if (typeof raw === "string") {
    const parsed: unknown = JSON.parse(raw);
    return parsed && typeof parsed === "object" && !Array.isArray(parsed) ? { ...parsed } : {};
  }
  return raw;
}
