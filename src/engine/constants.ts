// src/engine/constants.ts

import type { CellValue } from "../types";

export const CELL_EMPTY: CellValue = 0;
export const CELL_MINE: CellValue = 1;
export const CELL_TREASURE: CellValue = 2;

export function isCellValue(v: unknown): v is CellValue {
  return v === 0 || v === 1 || v === 2;
}

// King-move neighbourhood. No wraparound at the edges.
export const NEIGHBOR_OFFSETS: readonly (readonly [number, number])[] = [
  [-1, -1],
  [-1, 0],
  [-1, 1],
  [0, -1],
  [0, 1],
  [1, -1],
  [1, 0],
  [1, 1],
];

// Default level: 10x10 with ten mines and one treasure.
export const DEFAULT_ROWS = 10;
export const DEFAULT_COLS = 10;
export const DEFAULT_MINES = 10;
export const DEFAULT_TREASURES = 1;

// Upper bound on rows * cols for any board.
export const MAX_BOARD_CELLS = 10_000;

// Test-mode fixed layouts (see validateLayout).
export const TEST_LAYOUT_SIZE = 8;
export const TEST_LAYOUT_MINES = 10;
export const TEST_LAYOUT_MIN_TREASURES = 1;
export const TEST_LAYOUT_MAX_TREASURES = 9;
