// src/engine/serialization.ts
//
// Versioned persisted form of a GameState. The record is decoupled from the
// in-memory types: adjacency is not stored (recomputed from the mine layout),
// and a fixed-layout game rebuilds its layout matrix from the cells.

import type { CellValue, Coord, GameState, GameStatus } from "../types";
import { MAX_BOARD_CELLS } from "./constants";
import { type CellDraft, assignAdjacency, freezeCells, layoutOf } from "./generateBoard";
import { assertStateInvariants } from "./validateState";

export const PERSISTED_GAME_VERSION = 1 as const;

export type PersistedCell = {
  mine: boolean;
  treasure: boolean;
  flagged: boolean;
  revealed: boolean;
};

export type PersistedGameV1 = {
  version: typeof PERSISTED_GAME_VERSION;
  rows: number;
  cols: number;
  mineCount: number;
  treasureCount: number;
  fixedLayout: boolean;
  cells: PersistedCell[][];
  clickedCount: number;
  flagCount: number;
  startedAt: string | null;
  endedAt: string | null;
  status: GameStatus;
};

const STATUSES: readonly GameStatus[] = ["notStarted", "inProgress", "won", "lost"];

export function toPersisted(state: GameState): PersistedGameV1 {
  const { board } = state;
  return {
    version: PERSISTED_GAME_VERSION,
    rows: board.rows,
    cols: board.cols,
    mineCount: state.config.mineCount,
    treasureCount: state.config.treasureCount,
    fixedLayout: board.isFixedLayout,
    cells: board.cells.map((line) =>
      line.map((c) => ({
        mine: c.isMine,
        treasure: c.hasTreasure,
        flagged: c.isFlagged,
        revealed: c.isRevealed,
      }))
    ),
    clickedCount: state.clickedCount,
    flagCount: state.flagCount,
    startedAt: state.startedAt,
    endedAt: state.endedAt,
    status: state.status,
  };
}

function isObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isCount(x: unknown): x is number {
  return typeof x === "number" && Number.isInteger(x) && x >= 0;
}

function isTimestamp(x: unknown): x is string | null {
  return x === null || (typeof x === "string" && Number.isFinite(Date.parse(x)));
}

function isStatus(x: unknown): x is GameStatus {
  return STATUSES.some((s) => s === x);
}

function readCell(raw: unknown, row: number, col: number): CellDraft {
  if (!isObject(raw)) throw new Error(`Persisted cell (${row}, ${col}) is not an object.`);
  const { mine, treasure, flagged, revealed } = raw;
  if (
    typeof mine !== "boolean" ||
    typeof treasure !== "boolean" ||
    typeof flagged !== "boolean" ||
    typeof revealed !== "boolean"
  ) {
    throw new Error(`Persisted cell (${row}, ${col}) has non-boolean flags.`);
  }
  return {
    row,
    col,
    isMine: mine,
    hasTreasure: treasure,
    isFlagged: flagged,
    isRevealed: revealed,
    adjacentMines: 0,
  };
}

/**
 * Rebuild a GameState from the persisted record. Throws on unknown versions,
 * malformed shapes and states that break engine invariants.
 */
export function fromPersisted(data: unknown): GameState {
  if (!isObject(data)) {
    throw new Error("Persisted game is not an object.");
  }
  if (data.version !== PERSISTED_GAME_VERSION) {
    throw new Error(`Unsupported persisted game version: ${String(data.version)}`);
  }

  const { rows, cols, mineCount, treasureCount, fixedLayout, cells, clickedCount, flagCount, startedAt, endedAt, status } =
    data;

  if (!isCount(rows) || rows < 1 || !isCount(cols) || cols < 1 || rows * cols > MAX_BOARD_CELLS) {
    throw new Error("Persisted game has invalid dimensions.");
  }
  if (!isCount(mineCount) || !isCount(treasureCount) || !isCount(clickedCount) || !isCount(flagCount)) {
    throw new Error("Persisted game has invalid counters.");
  }
  if (typeof fixedLayout !== "boolean") {
    throw new Error("Persisted game missing fixedLayout boolean.");
  }
  if (!isTimestamp(startedAt) || !isTimestamp(endedAt)) {
    throw new Error("Persisted game has invalid timestamps.");
  }
  if (!isStatus(status)) {
    throw new Error(`Persisted game has invalid status: ${String(status)}`);
  }
  if (!Array.isArray(cells) || cells.length !== rows) {
    throw new Error("Persisted game cells do not match rows.");
  }

  const grid: CellDraft[][] = cells.map((line: unknown, row) => {
    if (!Array.isArray(line) || line.length !== cols) {
      throw new Error(`Persisted game row ${row} does not match cols.`);
    }
    return line.map((raw: unknown, col) => readCell(raw, row, col));
  });

  assignAdjacency(grid, rows, cols);

  const flat = grid.flat();
  const treasureCells: Coord[] = flat.filter((c) => c.hasTreasure).map((c) => ({ row: c.row, col: c.col }));

  const board = {
    rows,
    cols,
    cells: freezeCells(grid),
    mineCount: flat.filter((c) => c.isMine).length,
    treasureCells,
    isFixedLayout: fixedLayout,
  };

  const layout: CellValue[][] | undefined = fixedLayout ? layoutOf(board) : undefined;

  const state: GameState = {
    config: {
      rows,
      cols,
      mineCount,
      treasureCount,
      ...(layout ? { fixedLayout: layout } : {}),
    },
    board,
    status,
    clickedCount,
    flagCount,
    startedAt,
    endedAt,
  };

  if (board.mineCount !== mineCount || treasureCells.length !== treasureCount) {
    throw new Error("Persisted game counts do not match its cells.");
  }

  assertStateInvariants(state, "deserializeState");
  return state;
}

export function serializeState(state: GameState): string {
  return JSON.stringify(toPersisted(state));
}

export function deserializeState(json: string): GameState {
  return fromPersisted(JSON.parse(json));
}
