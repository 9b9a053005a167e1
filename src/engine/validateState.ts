import type { Board, Cell, GameState } from "../types";
import { countAdjacentMines } from "./generateBoard";

const VALIDATE = process.env.MINEHUNT_VALIDATE_STATE !== "0";

/**
 * validateState (checkpoint form)
 *
 * Runs at the end of every engine transition (applyReveal/applyFlagToggle/newGame).
 * Disabled with MINEHUNT_VALIDATE_STATE=0.
 */
export function validateState(state: GameState, where = "unknown"): void {
  if (!VALIDATE) return;
  assertStateInvariants(state, where);
}

/**
 * Unconditional form. Used on every deserialized state, where the input
 * comes from outside the engine.
 */
export function assertStateInvariants(state: GameState, where = "unknown"): void {
  assert(state && typeof state === "object", "state missing", where);

  // ---------------------------
  // Board shape
  // ---------------------------

  const board = state.board;
  assert(board && typeof board === "object", "board missing", where);
  assert(Number.isInteger(board.rows) && board.rows > 0, "board.rows invalid", where);
  assert(Number.isInteger(board.cols) && board.cols > 0, "board.cols invalid", where);
  assert(Array.isArray(board.cells) && board.cells.length === board.rows, "board.cells row count mismatch", where);

  for (let row = 0; row < board.rows; row++) {
    const line = board.cells[row];
    assert(Array.isArray(line) && line.length === board.cols, `board.cells[${row}] column count mismatch`, where);
    for (let col = 0; col < board.cols; col++) {
      assertCell(line[col], row, col, where);
    }
  }

  // ---------------------------
  // Placement invariants
  // ---------------------------

  const flat = board.cells.flat();
  assert(
    flat.every((c) => !(c.isMine && c.hasTreasure)),
    "cell is both mine and treasure",
    where
  );

  const mines = flat.filter((c) => c.isMine).length;
  assert(mines === board.mineCount, `board.mineCount ${board.mineCount} != ${mines} mines`, where);

  const treasures = flat.filter((c) => c.hasTreasure);
  assert(treasures.length >= 1, "board has no treasure", where);
  assert(
    treasures.length === board.treasureCells.length &&
      board.treasureCells.every((t) => board.cells[t.row]?.[t.col]?.hasTreasure === true),
    "board.treasureCells out of sync with cells",
    where
  );

  assertAdjacency(board, where);

  // ---------------------------
  // Counters
  // ---------------------------

  const safeRevealed = flat.filter((c) => c.isRevealed && !c.isMine && !c.hasTreasure).length;
  assert(state.clickedCount === safeRevealed, `clickedCount ${state.clickedCount} != ${safeRevealed}`, where);

  const flagged = flat.filter((c) => c.isFlagged).length;
  assert(state.flagCount === flagged, `flagCount ${state.flagCount} != ${flagged}`, where);

  // ---------------------------
  // Status (structural only)
  // ---------------------------

  const revealedMine = flat.some((c) => c.isRevealed && c.isMine);
  const revealedTreasure = flat.some((c) => c.isRevealed && c.hasTreasure);

  switch (state.status) {
    case "notStarted":
      assert(state.clickedCount === 0 && !revealedMine && !revealedTreasure, "notStarted with revealed cells", where);
      assert(state.startedAt === null && state.endedAt === null, "notStarted with timestamps", where);
      break;
    case "inProgress":
      assert(!revealedMine && !revealedTreasure, "inProgress with a revealed mine/treasure", where);
      assert(typeof state.startedAt === "string", "inProgress requires startedAt", where);
      assert(state.endedAt === null, "inProgress with endedAt", where);
      break;
    case "lost":
      assert(revealedMine, "lost requires a revealed mine", where);
      assert(typeof state.endedAt === "string", "lost requires endedAt", where);
      break;
    case "won":
      assert(!revealedMine, "won with a revealed mine", where);
      assert(typeof state.endedAt === "string", "won requires endedAt", where);
      break;
    default:
      assert(false, `status invalid: ${String(state.status)}`, where);
  }
}

// -------------------------------------
// Helpers
// -------------------------------------

function assert(condition: unknown, message: string, where: string): asserts condition {
  if (!condition) throw new Error(`[validateState @ ${where}] ${message}`);
}

function assertCell(cell: Cell | undefined, row: number, col: number, where: string): void {
  assert(cell && typeof cell === "object", `cell (${row}, ${col}) missing`, where);
  assert(cell.row === row && cell.col === col, `cell (${row}, ${col}) has wrong position`, where);
  for (const key of ["isMine", "hasTreasure", "isFlagged", "isRevealed"] as const) {
    assert(typeof cell[key] === "boolean", `cell (${row}, ${col}).${key} invalid`, where);
  }
  assert(!(cell.isFlagged && cell.isRevealed), `cell (${row}, ${col}) flagged and revealed`, where);
}

function assertAdjacency(board: Board, where: string): void {
  for (const line of board.cells) {
    for (const cell of line) {
      const expected = countAdjacentMines(board.cells, board.rows, board.cols, cell);
      assert(
        cell.adjacentMines === expected,
        `cell (${cell.row}, ${cell.col}).adjacentMines ${cell.adjacentMines} != ${expected}`,
        where
      );
    }
  }
}
