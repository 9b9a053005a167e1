import type { Cell, CellView, GameSnapshot, GameState } from "../types";

export function cellView(cell: Cell): CellView {
  return {
    row: cell.row,
    col: cell.col,
    revealed: cell.isRevealed,
    flagged: cell.isFlagged,
    isMine: cell.isMine,
    hasTreasure: cell.hasTreasure,
    adjacentMines: cell.adjacentMines,
  };
}

/**
 * Read-only view for presentation adapters. Every object is freshly built,
 * so nothing in the snapshot aliases engine state. Cells are row-major.
 */
export function snapshot(state: GameState): GameSnapshot {
  const { board } = state;
  return {
    rows: board.rows,
    cols: board.cols,
    cells: board.cells.flatMap((line) => line.map(cellView)),
    flagCount: state.flagCount,
    mineCount: board.mineCount,
    treasureCount: board.treasureCells.length,
    clickedCount: state.clickedCount,
    status: state.status,
    startedAt: state.startedAt,
    endedAt: state.endedAt,
  };
}

/**
 * Milliseconds since the first reveal, frozen once the game ends. 0 before start.
 */
export function elapsedMs(state: Pick<GameState, "startedAt" | "endedAt">, now: Date): number {
  if (state.startedAt === null) return 0;
  const end = state.endedAt !== null ? Date.parse(state.endedAt) : now.getTime();
  return Math.max(0, end - Date.parse(state.startedAt));
}
