import type { Coord, FlagOutcome, GameState, RevealOutcome } from "../types";
import type { ActionErr, ActionResponse } from "./actionEnvelope";
import { applyFlagToggle, applyReveal } from "./applyAction";
import { inBounds } from "./neighbors";

function isTerminal(state: GameState): boolean {
  return state.status === "won" || state.status === "lost";
}

/**
 * Narrow an untrusted coordinate to an in-bounds Coord, or null.
 */
export function toCoord(state: GameState, row: unknown, col: unknown): Coord | null {
  if (typeof row !== "number" || typeof col !== "number") return null;
  if (!Number.isInteger(row) || !Number.isInteger(col)) return null;
  if (!inBounds(state.board.rows, state.board.cols, row, col)) return null;
  return { row, col };
}

function checkAction(state: GameState, row: unknown, col: unknown): Coord | ActionErr {
  const coord = toCoord(state, row, col);
  if (!coord) {
    return {
      ok: false,
      error: {
        code: "INVALID_COORDINATE",
        message: `Coordinate (${String(row)}, ${String(col)}) is outside the ${state.board.rows}x${state.board.cols} board.`,
      },
    };
  }

  if (isTerminal(state)) {
    return {
      ok: false,
      error: {
        code: "ILLEGAL_OPERATION",
        message: `Game is over (${state.status}). Restart to play again.`,
      },
    };
  }

  return coord;
}

/**
 * Validate then reveal. On error the caller keeps its state (nothing is mutated).
 */
export function tryReveal(
  state: GameState,
  row: unknown,
  col: unknown,
  now: Date
): ActionResponse<RevealOutcome> {
  const checked = checkAction(state, row, col);
  if ("ok" in checked) return checked;

  const result = applyReveal(state, checked, now);
  return { ok: true, outcome: result.outcome, state: result.state, status: result.state.status };
}

export function tryToggleFlag(state: GameState, row: unknown, col: unknown): ActionResponse<FlagOutcome> {
  const checked = checkAction(state, row, col);
  if ("ok" in checked) return checked;

  const result = applyFlagToggle(state, checked);
  return { ok: true, outcome: result.outcome, state: result.state, status: result.state.status };
}
