// src/engine/neighbors.ts

import type { Board, Cell, Coord } from "../types";
import { NEIGHBOR_OFFSETS } from "./constants";

export function inBounds(rows: number, cols: number, row: number, col: number): boolean {
  return row >= 0 && row < rows && col >= 0 && col < cols;
}

/**
 * Up to 8 king-move neighbours of `coord`, clipped at the board edges.
 * Order is row-major (top-left first).
 */
export function neighborCoords(rows: number, cols: number, coord: Coord): Coord[] {
  const out: Coord[] = [];
  for (const [dr, dc] of NEIGHBOR_OFFSETS) {
    const row = coord.row + dr;
    const col = coord.col + dc;
    if (inBounds(rows, cols, row, col)) out.push({ row, col });
  }
  return out;
}

export function neighborCells(board: Board, coord: Coord): Cell[] {
  return neighborCoords(board.rows, board.cols, coord).map((c) => board.cells[c.row][c.col]);
}

export function isAdjacentToTreasure(board: Board, coord: Coord): boolean {
  return neighborCells(board, coord).some((n) => n.hasTreasure);
}
