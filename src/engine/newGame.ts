import type { GameConfig, GameState } from "../types";
import { generateBoard, layoutOf } from "./generateBoard";
import { defaultRng, type Rng } from "./rng";
import { validateState } from "./validateState";

export type NewGameOptions = {
  rng?: Rng;
};

/**
 * Fresh game in "notStarted":
 * - board generated from `config` (random, or the fixed layout)
 * - counters at zero, no timestamps
 *
 * The stored config carries the board's actual counts, so a fixed layout's
 * derived mine/treasure counts win over whatever was requested.
 */
export function newGame(config: GameConfig, opts: NewGameOptions = {}): GameState {
  const board = generateBoard({
    rows: config.rows,
    cols: config.cols,
    mineCount: config.mineCount,
    treasureCount: config.treasureCount,
    fixedLayout: config.fixedLayout,
    rng: opts.rng ?? defaultRng,
  });

  const state: GameState = {
    config: {
      rows: board.rows,
      cols: board.cols,
      mineCount: board.mineCount,
      treasureCount: board.treasureCells.length,
      // Own copy: later edits to the caller's matrix must not change restarts.
      ...(config.fixedLayout !== undefined ? { fixedLayout: layoutOf(board) } : {}),
    },
    board,
    status: "notStarted",
    clickedCount: 0,
    flagCount: 0,
    startedAt: null,
    endedAt: null,
  };

  validateState(state, "newGame");
  return state;
}

/**
 * Rebuild from the same construction parameters. Never resets `state` in place.
 * Fixed layout => identical board; random => same counts, fresh placement.
 */
export function restartGame(state: GameState, opts: NewGameOptions = {}): GameState {
  return newGame(state.config, opts);
}

/**
 * Number of safe cells that must be revealed to win by clearing the board.
 */
export function safeCellTarget(state: GameState): number {
  const { rows, cols, mineCount, treasureCells } = state.board;
  return rows * cols - mineCount - treasureCells.length;
}
