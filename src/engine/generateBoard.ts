// src/engine/generateBoard.ts
//
// Board Generator: mine + treasure placement (random or fixed layout) and
// adjacency counts. Pure: every call builds a brand-new Board.

import type { Board, Cell, CellValue, Coord, FixedLayout } from "../types";
import { CELL_EMPTY, CELL_MINE, CELL_TREASURE, MAX_BOARD_CELLS, isCellValue } from "./constants";
import { ConfigurationError } from "./errors";
import { neighborCoords } from "./neighbors";
import { type Rng, sampleWithoutReplacement } from "./rng";

export type GenerateBoardOptions = {
  rows: number;
  cols: number;
  mineCount: number;
  treasureCount: number;

  /** Fixed mode: mine/treasure counts are derived from the matrix. */
  fixedLayout?: FixedLayout;
  rng: Rng;
};

/** Writable cell used only while a board is being assembled. */
export type CellDraft = { -readonly [K in keyof Cell]: Cell[K] };

function isNonNegativeInt(n: unknown): n is number {
  return typeof n === "number" && Number.isInteger(n) && n >= 0;
}

function assertDimensions(rows: number, cols: number): void {
  if (!isNonNegativeInt(rows) || rows < 1) {
    throw new ConfigurationError(`rows must be a positive integer (got ${String(rows)}).`);
  }
  if (!isNonNegativeInt(cols) || cols < 1) {
    throw new ConfigurationError(`cols must be a positive integer (got ${String(cols)}).`);
  }
  if (rows * cols > MAX_BOARD_CELLS) {
    throw new ConfigurationError(
      `Board of ${rows}x${cols} exceeds the limit of ${MAX_BOARD_CELLS} cells.`
    );
  }
}

function assertRoomFor(rows: number, cols: number, mines: number, treasures: number): void {
  const total = rows * cols;
  if (mines + treasures >= total) {
    throw new ConfigurationError(
      `Not enough cells: ${mines} mines + ${treasures} treasures need fewer than ${total} cells.`
    );
  }
}

function emptyCells(rows: number, cols: number): CellDraft[][] {
  return Array.from({ length: rows }, (_, row) =>
    Array.from({ length: cols }, (_, col) => ({
      row,
      col,
      isMine: false,
      hasTreasure: false,
      isFlagged: false,
      isRevealed: false,
      adjacentMines: 0,
    }))
  );
}

/**
 * Number of mines in the clipped 8-neighbourhood of `coord`.
 */
export function countAdjacentMines(
  cells: readonly (readonly Cell[])[],
  rows: number,
  cols: number,
  coord: Coord
): number {
  let count = 0;
  for (const n of neighborCoords(rows, cols, coord)) {
    if (cells[n.row][n.col].isMine) count++;
  }
  return count;
}

/**
 * Fill in adjacentMines for every cell. Called once, after placement.
 */
export function assignAdjacency(cells: CellDraft[][], rows: number, cols: number): void {
  for (const line of cells) {
    for (const cell of line) {
      cell.adjacentMines = countAdjacentMines(cells, rows, cols, cell);
    }
  }
}

function placeRandom(cells: CellDraft[][], mineCount: number, treasureCount: number, rng: Rng): void {
  const all = cells.flat();

  for (const cell of sampleWithoutReplacement(all, mineCount, rng)) {
    cell.isMine = true;
  }

  const free = all.filter((c) => !c.isMine);
  for (const cell of sampleWithoutReplacement(free, treasureCount, rng)) {
    cell.hasTreasure = true;
  }
}

function placeFixed(cells: CellDraft[][], layout: FixedLayout, rows: number, cols: number): void {
  if (!Array.isArray(layout) || layout.length !== rows) {
    throw new ConfigurationError(
      `Fixed layout has ${Array.isArray(layout) ? layout.length : 0} rows; board needs ${rows}.`
    );
  }

  layout.forEach((line, row) => {
    if (!Array.isArray(line) || line.length !== cols) {
      throw new ConfigurationError(`Fixed layout row ${row} must have exactly ${cols} values.`);
    }
    line.forEach((value: unknown, col) => {
      if (!isCellValue(value)) {
        throw new ConfigurationError(
          `Fixed layout value at (${row}, ${col}) must be 0, 1 or 2 (got ${String(value)}).`
        );
      }
      cells[row][col].isMine = value === CELL_MINE;
      cells[row][col].hasTreasure = value === CELL_TREASURE;
    });
  });
}

/**
 * Seal a finished grid. Later states copy rows and replace cells instead.
 */
export function freezeCells(cells: CellDraft[][]): readonly (readonly Cell[])[] {
  return Object.freeze(cells.map((line) => Object.freeze(line.map((cell) => Object.freeze(cell)))));
}

/**
 * Contract: generate(rows, cols, mineCount, treasureCount, fixedLayout?) -> Board
 *
 * - Random mode: mines sampled without replacement from all cells, then
 *   treasures from the remaining non-mine cells.
 * - Fixed mode: counts come from the matrix (requested counts are ignored).
 *
 * Throws ConfigurationError; never returns a partially built board.
 */
export function generateBoard(opts: GenerateBoardOptions): Board {
  const { rows, cols } = opts;
  assertDimensions(rows, cols);

  const cells = emptyCells(rows, cols);

  if (opts.fixedLayout !== undefined) {
    placeFixed(cells, opts.fixedLayout, rows, cols);
  } else {
    const { mineCount, treasureCount } = opts;
    if (!isNonNegativeInt(mineCount)) {
      throw new ConfigurationError(`mineCount must be a non-negative integer (got ${String(mineCount)}).`);
    }
    if (!isNonNegativeInt(treasureCount) || treasureCount < 1) {
      throw new ConfigurationError(`treasureCount must be an integer >= 1 (got ${String(treasureCount)}).`);
    }
    assertRoomFor(rows, cols, mineCount, treasureCount);
    placeRandom(cells, mineCount, treasureCount, opts.rng);
  }

  const flat = cells.flat();
  const mineCount = flat.filter((c) => c.isMine).length;
  const treasureCells: Coord[] = flat
    .filter((c) => c.hasTreasure)
    .map((c) => ({ row: c.row, col: c.col }));

  if (opts.fixedLayout !== undefined) {
    if (treasureCells.length < 1) {
      throw new ConfigurationError("Fixed layout must contain at least one treasure.");
    }
    assertRoomFor(rows, cols, mineCount, treasureCells.length);
  }

  assignAdjacency(cells, rows, cols);

  return {
    rows,
    cols,
    cells: freezeCells(cells),
    mineCount,
    treasureCells,
    isFixedLayout: opts.fixedLayout !== undefined,
  };
}

/**
 * Inverse of fixed-mode placement: the 0/1/2 matrix describing `board`.
 */
export function layoutOf(board: Board): CellValue[][] {
  return board.cells.map((line) =>
    line.map((c): CellValue => (c.isMine ? CELL_MINE : c.hasTreasure ? CELL_TREASURE : CELL_EMPTY))
  );
}
