import { describe, it, expect } from "vitest";
import {
  createRng,
  elapsedMs,
  newGame,
  restart,
  reveal,
  safeCellTarget,
  snapshot,
  toggleFlag,
  validateLayoutText,
  type ActionResponse,
  type GameState,
} from "../src/engine";
import { FIXED_NOW, OPEN_BOARD, VALID_LAYOUT_TEXT, fixedGame, layout } from "./helpers";

const now = () => FIXED_NOW;

function expectOk<T>(res: ActionResponse<T>): { outcome: T; state: GameState } {
  if (!res.ok) throw new Error(`expected ok, got ${res.error.code}: ${res.error.message}`);
  return res;
}

/**
 * Reveal every safe cell the flood has not reached yet, row-major.
 * The game must still be running before each reveal.
 */
function clearBoard(start: GameState): GameState {
  let s = start;
  for (const cell of start.board.cells.flat()) {
    if (cell.isMine || cell.hasTreasure) continue;
    if (s.board.cells[cell.row][cell.col].isRevealed) continue;
    expect(["notStarted", "inProgress"]).toContain(s.status);
    s = expectOk(reveal(s, cell.row, cell.col, { now })).state;
  }
  return s;
}

describe("game state machine", () => {
  it("starts notStarted with zeroed counters", () => {
    const s = newGame({ rows: 10, cols: 10, mineCount: 10, treasureCount: 1 }, { rng: createRng(1) });
    expect(s.status).toBe("notStarted");
    expect(s.clickedCount).toBe(0);
    expect(s.flagCount).toBe(0);
    expect(s.startedAt).toBeNull();
    expect(s.endedAt).toBeNull();
    expect(safeCellTarget(s)).toBe(89);
  });

  it("the first reveal moves to inProgress and records startedAt", () => {
    const s0 = fixedGame(OPEN_BOARD);
    const { state, outcome } = expectOk(reveal(s0, 0, 1, { now }));

    expect(outcome).toEqual({ kind: "revealed", cells: [{ row: 0, col: 1 }] });
    expect(state.status).toBe("inProgress");
    expect(state.clickedCount).toBe(1);
    expect(state.startedAt).toBe("2026-01-01T00:00:00.000Z");
    expect(state.endedAt).toBeNull();

    // input state untouched
    expect(s0.status).toBe("notStarted");
    expect(s0.board.cells[0][1].isRevealed).toBe(false);
  });

  it("flagging does not start the game", () => {
    const { state } = expectOk(toggleFlag(fixedGame(OPEN_BOARD), 0, 0));
    expect(state.status).toBe("notStarted");
    expect(state.flagCount).toBe(1);
    expect(state.startedAt).toBeNull();
  });

  it("flagCount follows toggles and may exceed the mine count", () => {
    let s = fixedGame(OPEN_BOARD);
    for (const [row, col] of [
      [0, 0],
      [0, 1],
      [0, 2],
    ]) {
      s = expectOk(toggleFlag(s, row, col)).state;
    }
    expect(s.flagCount).toBe(3);

    s = expectOk(toggleFlag(s, 0, 1)).state;
    expect(s.flagCount).toBe(2);
  });

  it("hitting a mine loses", () => {
    const { state, outcome } = expectOk(reveal(fixedGame(OPEN_BOARD), 0, 0, { now }));
    expect(outcome).toEqual({ kind: "hitMine", coord: { row: 0, col: 0 } });
    expect(state.status).toBe("lost");
    expect(state.clickedCount).toBe(0);
    expect(state.startedAt).toBe("2026-01-01T00:00:00.000Z");
    expect(state.endedAt).toBe("2026-01-01T00:00:00.000Z");
  });

  it("finding the treasure wins immediately", () => {
    const { state } = expectOk(reveal(fixedGame(OPEN_BOARD), 3, 4, { now }));
    expect(state.status).toBe("won");
    expect(state.clickedCount).toBe(0);
  });

  it("revealing every safe cell wins", () => {
    let s = fixedGame(OPEN_BOARD);
    expect(safeCellTarget(s)).toBe(18);

    s = expectOk(reveal(s, 1, 3, { now })).state;
    expect(s.clickedCount).toBe(15);
    s = expectOk(reveal(s, 2, 3, { now })).state;
    s = expectOk(reveal(s, 2, 4, { now })).state;
    expect(s.clickedCount).toBe(17);
    expect(s.status).toBe("inProgress");

    s = expectOk(reveal(s, 3, 3, { now })).state;
    expect(s.clickedCount).toBe(18);
    expect(s.status).toBe("won");
    expect(s.board.cells[3][4].isRevealed).toBe(false);
  });

  it("clears the 8x8 test layout after exactly 53 safe cells", () => {
    const checked = validateLayoutText(VALID_LAYOUT_TEXT);
    if (!checked.ok) throw new Error(checked.message);
    const start = newGame({ rows: 8, cols: 8, mineCount: 10, treasureCount: 1, fixedLayout: checked.layout });
    expect(safeCellTarget(start)).toBe(53);

    const end = clearBoard(start);
    expect(end.status).toBe("won");
    expect(end.clickedCount).toBe(53);
    expect(end.endedAt).toBe("2026-01-01T00:00:00.000Z");
    expect(end.board.cells[7][7].isRevealed).toBe(false);
  });

  it("the clear-win target subtracts every treasure", () => {
    const start = fixedGame(["M......", ".......", "...T...", ".......", "......T"]);
    expect(start.config.treasureCount).toBe(2);
    expect(safeCellTarget(start)).toBe(32);

    const end = clearBoard(start);
    expect(end.status).toBe("won");
    expect(end.clickedCount).toBe(32);
    expect(end.board.cells[2][3].isRevealed).toBe(false);
    expect(end.board.cells[4][6].isRevealed).toBe(false);
  });

  it("no-op outcomes return the same state", () => {
    const s1 = expectOk(reveal(fixedGame(OPEN_BOARD), 0, 1, { now })).state;

    const again = expectOk(reveal(s1, 0, 1, { now }));
    expect(again.outcome.kind).toBe("alreadyRevealedOrFlagged");
    expect(again.state).toBe(s1);

    const flag = expectOk(toggleFlag(s1, 0, 1));
    expect(flag.outcome.kind).toBe("alreadyRevealed");
    expect(flag.state).toBe(s1);
  });

  it("rejects out-of-range and non-integer coordinates", () => {
    const s = fixedGame(OPEN_BOARD);
    expect(reveal(s, 4, 0)).toEqual({
      ok: false,
      error: { code: "INVALID_COORDINATE", message: "Coordinate (4, 0) is outside the 4x5 board." },
    });
    expect(toggleFlag(s, 0, -1).ok).toBe(false);
    const frac = reveal(s, 1.5, 0);
    expect(frac.ok ? null : frac.error.code).toBe("INVALID_COORDINATE");
  });

  it("rejects actions once the game is over", () => {
    const lost = expectOk(reveal(fixedGame(OPEN_BOARD), 0, 0, { now })).state;
    expect(reveal(lost, 1, 1)).toEqual({
      ok: false,
      error: { code: "ILLEGAL_OPERATION", message: "Game is over (lost). Restart to play again." },
    });
    const flag = toggleFlag(lost, 1, 1);
    expect(flag.ok ? null : flag.error.code).toBe("ILLEGAL_OPERATION");
  });

  it("restart of a fixed game rebuilds the same board, fresh", () => {
    const lost = expectOk(reveal(fixedGame(OPEN_BOARD), 0, 0, { now })).state;
    const fresh = restart(lost);

    expect(fresh).not.toBe(lost);
    expect(fresh.status).toBe("notStarted");
    expect(fresh.clickedCount).toBe(0);
    expect(fresh.board.cells[0][0].isMine).toBe(true);
    expect(fresh.board.cells[0][0].isRevealed).toBe(false);
    expect(fresh.board.treasureCells).toEqual([{ row: 3, col: 4 }]);
    expect(lost.status).toBe("lost");
  });

  it("restart ignores later edits to the caller's layout matrix", () => {
    const matrix = layout(OPEN_BOARD);
    const s = newGame({ rows: 4, cols: 5, mineCount: 0, treasureCount: 0, fixedLayout: matrix });
    matrix[2][2] = 1;

    const fresh = restart(s);
    expect(fresh.board.mineCount).toBe(1);
    expect(fresh.board.cells[2][2].isMine).toBe(false);
    expect(s.config.fixedLayout).toEqual(layout(OPEN_BOARD));
  });

  it("restart of a random game keeps its counts", () => {
    const s = newGame({ rows: 6, cols: 6, mineCount: 5, treasureCount: 2 }, { rng: createRng(8) });
    const fresh = restart(s, { rng: createRng(9) });
    expect(fresh.board.mineCount).toBe(5);
    expect(fresh.board.treasureCells).toHaveLength(2);
    expect(fresh.config).toEqual(s.config);
  });
});

describe("snapshot", () => {
  it("exposes every cell row-major with fresh objects", () => {
    const s = expectOk(reveal(fixedGame(OPEN_BOARD), 0, 1, { now })).state;
    const snap = snapshot(s);

    expect(snap.rows).toBe(4);
    expect(snap.cols).toBe(5);
    expect(snap.cells).toHaveLength(20);
    expect(snap.cells[0]).toEqual({
      row: 0,
      col: 0,
      revealed: false,
      flagged: false,
      isMine: true,
      hasTreasure: false,
      adjacentMines: 0,
    });
    expect(snap.cells[1]).toMatchObject({ row: 0, col: 1, revealed: true, adjacentMines: 1 });
    expect(snap.cells[19]).toMatchObject({ row: 3, col: 4, hasTreasure: true });
    expect(snap).toMatchObject({
      flagCount: 0,
      mineCount: 1,
      treasureCount: 1,
      clickedCount: 1,
      status: "inProgress",
      startedAt: "2026-01-01T00:00:00.000Z",
      endedAt: null,
    });
    expect(snapshot(s).cells[0]).not.toBe(snap.cells[0]);
  });

  it("elapsedMs runs from the first reveal and freezes at the end", () => {
    const s0 = fixedGame(OPEN_BOARD);
    expect(elapsedMs(s0, FIXED_NOW)).toBe(0);

    const started = expectOk(reveal(s0, 0, 1, { now })).state;
    expect(elapsedMs(started, new Date(FIXED_NOW.getTime() + 5000))).toBe(5000);

    const later = () => new Date(FIXED_NOW.getTime() + 7000);
    const lost = expectOk(reveal(started, 0, 0, { now: later })).state;
    expect(elapsedMs(lost, new Date(FIXED_NOW.getTime() + 60000))).toBe(7000);
  });
});
