// src/engine/reveal.ts
//
// Reveal Engine: per-cell reveal + breadth-first flood fill with
// treasure avoidance, and flag toggling. Board-level only; counters and
// status live in applyAction.

import type { Board, Cell, Coord, FlagOutcome, RevealOutcome } from "../types";
import { isAdjacentToTreasure, neighborCoords } from "./neighbors";

export type BoardRevealResult = {
  board: Board;
  outcome: RevealOutcome;

  /** Non-mine, non-treasure cells newly revealed by this call. */
  safeRevealed: number;
};

export type BoardFlagResult = {
  board: Board;
  outcome: FlagOutcome;
};

/**
 * Copy only the rows we are about to touch; untouched rows are shared.
 */
class BoardDraft {
  private readonly rows: (readonly Cell[])[];
  private readonly copies = new Map<number, Cell[]>();

  constructor(private readonly base: Board) {
    this.rows = base.cells.slice();
  }

  get(coord: Coord): Cell {
    return this.rows[coord.row][coord.col];
  }

  update(coord: Coord, patch: Partial<Pick<Cell, "isRevealed" | "isFlagged">>): void {
    let line = this.copies.get(coord.row);
    if (!line) {
      line = this.rows[coord.row].slice();
      this.copies.set(coord.row, line);
      this.rows[coord.row] = line;
    }
    line[coord.col] = Object.freeze({ ...line[coord.col], ...patch });
  }

  finish(): Board {
    for (const line of this.copies.values()) Object.freeze(line);
    return { ...this.base, cells: Object.freeze(this.rows) };
  }
}

/**
 * A flood-fill neighbour is auto-revealed only if ALL hold:
 * not revealed, not a mine, not flagged, no treasure, and no treasure
 * in its own king-move neighbourhood.
 */
function canAutoReveal(board: Board, cell: Cell): boolean {
  if (cell.isRevealed || cell.isMine || cell.isFlagged || cell.hasTreasure) return false;
  return !isAdjacentToTreasure(board, cell);
}

/**
 * Reveal one cell, flooding outward from zero-adjacency cells.
 *
 * Never mutates `board`. On alreadyRevealedOrFlagged the input board is
 * returned as-is.
 */
export function revealOnBoard(board: Board, coord: Coord): BoardRevealResult {
  const start = board.cells[coord.row][coord.col];
  const at: Coord = { row: coord.row, col: coord.col };

  if (start.isRevealed || start.isFlagged) {
    return { board, outcome: { kind: "alreadyRevealedOrFlagged", coord: at }, safeRevealed: 0 };
  }

  const draft = new BoardDraft(board);
  draft.update(at, { isRevealed: true });

  if (start.isMine) {
    return { board: draft.finish(), outcome: { kind: "hitMine", coord: at }, safeRevealed: 0 };
  }

  if (start.hasTreasure) {
    return { board: draft.finish(), outcome: { kind: "foundTreasure", coord: at }, safeRevealed: 0 };
  }

  const revealed: Coord[] = [at];

  // Numbered cells never cascade.
  if (start.adjacentMines === 0) {
    const queue: Coord[] = [at];
    // Index-based queue: each cell is enqueued at most once (revealed first).
    for (let head = 0; head < queue.length; head++) {
      const current = queue[head];
      for (const n of neighborCoords(board.rows, board.cols, current)) {
        const neighbor = draft.get(n);
        if (!canAutoReveal(board, neighbor)) continue;

        draft.update(n, { isRevealed: true });
        revealed.push(n);

        if (neighbor.adjacentMines === 0) queue.push(n);
      }
    }
  }

  return {
    board: draft.finish(),
    outcome: { kind: "revealed", cells: revealed },
    safeRevealed: revealed.length,
  };
}

/**
 * Flip the flag on an unrevealed cell.
 * Revealed cells are left alone (alreadyRevealed).
 */
export function toggleFlagOnBoard(board: Board, coord: Coord): BoardFlagResult {
  const cell = board.cells[coord.row][coord.col];
  const at: Coord = { row: coord.row, col: coord.col };

  if (cell.isRevealed) {
    return { board, outcome: { kind: "alreadyRevealed", coord: at } };
  }

  const draft = new BoardDraft(board);
  draft.update(at, { isFlagged: !cell.isFlagged });

  return {
    board: draft.finish(),
    outcome: { kind: cell.isFlagged ? "unflagged" : "flagged", coord: at },
  };
}
