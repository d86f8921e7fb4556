import { IRandomSource, shuffle } from "@coin-casino/core-rng";
import { invalidParameters } from "@coin-casino/core-errors";
import {
  GameResolver,
  Outcome,
  applyHouseEdge,
  assertHouseEdge,
  lossOutcome,
  readInteger,
  readParams,
  winOutcome,
} from "@coin-casino/core-outcome";

export interface MinesParams {
  gridSize: number;
  mines: number;
  /** Cells opened before cashing out. */
  reveals: number;
  picks: number[];
}

export interface MinesDetail extends Record<string, unknown> {
  gridSize: number;
  mines: number;
  reveals: number;
  picks: number[];
  minePositions: number[];
  /** First pick that hit a mine, or null when every pick was safe. */
  hitMine: number | null;
}

export interface MinesConfig {
  houseEdge: number;
}

const MIN_GRID = 3;
const MAX_GRID = 8;
const DEFAULT_GRID = 5;
const DEFAULT_MINES = 5;
const LABEL = "Minesweeper";

/** Chance that `reveals` distinct cells are all safe. */
export function survivalChance(cells: number, mines: number, reveals: number): number {
  const safe = cells - mines;
  let chance = 1;
  for (let i = 0; i < reveals; i++) {
    chance *= (safe - i) / (cells - i);
  }
  return chance;
}

export function placeMines(cells: number, mines: number, source: IRandomSource): number[] {
  const indices = Array.from({ length: cells }, (_, idx) => idx);
  return shuffle(indices, source, mines).slice(0, mines);
}

function readPicks(raw: unknown, cells: number, reveals: number): number[] {
  if (raw === undefined || raw === null) {
    return Array.from({ length: reveals }, (_, idx) => idx);
  }
  if (!Array.isArray(raw)) {
    throw invalidParameters(`${LABEL}: picks must be an array of cell indices`, { field: "picks" });
  }
  const picks: number[] = [];
  for (const value of raw) {
    if (typeof value !== "number" || !Number.isInteger(value) || value < 0 || value >= cells) {
      throw invalidParameters(`${LABEL}: picks must be integers in [0, ${cells - 1}]`, { field: "picks" });
    }
    if (picks.includes(value)) {
      throw invalidParameters(`${LABEL}: picks must be distinct`, { field: "picks", duplicate: value });
    }
    picks.push(value);
  }
  if (picks.length !== reveals) {
    throw invalidParameters(`${LABEL}: expected ${reveals} picks, got ${picks.length}`, { field: "picks" });
  }
  return picks;
}

export class MinesMathEngine implements GameResolver<"minesweeper", MinesParams, MinesDetail> {
  readonly game = "minesweeper" as const;
  readonly houseEdge: number;

  constructor(config: MinesConfig) {
    this.houseEdge = assertHouseEdge(config.houseEdge, LABEL);
  }

  parseParams(raw: unknown): MinesParams {
    const params = readParams(raw, LABEL);
    const gridSize = readInteger(params, "gridSize", LABEL, { min: MIN_GRID, max: MAX_GRID, fallback: DEFAULT_GRID });
    const cells = gridSize * gridSize;
    const mines = readInteger(params, "mines", LABEL, {
      min: 1,
      max: cells - 1,
      fallback: Math.min(DEFAULT_MINES, cells - 1),
    });
    const rawPicks = params["picks"];
    const reveals = readInteger(params, "reveals", LABEL, {
      min: 1,
      max: cells - mines,
      fallback: Array.isArray(rawPicks) ? rawPicks.length : undefined,
    });
    return { gridSize, mines, reveals, picks: readPicks(rawPicks, cells, reveals) };
  }

  resolve(params: MinesParams, source: IRandomSource): Outcome<MinesDetail> {
    const minePositions = placeMines(params.gridSize * params.gridSize, params.mines, source);
    const hitMine = params.picks.find((pick) => minePositions.includes(pick)) ?? null;
    const detail: MinesDetail = {
      gridSize: params.gridSize,
      mines: params.mines,
      reveals: params.reveals,
      picks: [...params.picks],
      minePositions: [...minePositions].sort((a, b) => a - b),
      hitMine,
    };
    return hitMine === null ? winOutcome(this.maxMultiplier(params), detail) : lossOutcome(detail);
  }

  maxMultiplier(params: MinesParams): number {
    const chance = survivalChance(params.gridSize * params.gridSize, params.mines, params.reveals);
    return applyHouseEdge(1 / chance, this.houseEdge);
  }
}
