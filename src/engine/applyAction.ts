// src/engine/applyAction.ts
//
// Game State Machine transitions. Pure: returns a new GameState.
//
//   notStarted -> inProgress   first successful reveal (records startedAt)
//   inProgress -> lost         hitMine
//   inProgress -> won          foundTreasure, or every safe cell revealed
//
// Callers (tryApply) reject coordinates and terminal states before we get here.

import type { Coord, FlagOutcome, GameState, RevealOutcome, TerminalStatus } from "../types";
import { safeCellTarget } from "./newGame";
import { revealOnBoard, toggleFlagOnBoard } from "./reveal";
import { validateState } from "./validateState";

export type ApplyRevealResult = {
  state: GameState;
  outcome: RevealOutcome;
};

export type ApplyFlagResult = {
  state: GameState;
  outcome: FlagOutcome;
};

function end(state: GameState, status: TerminalStatus, now: Date): GameState {
  return { ...state, status, endedAt: now.toISOString() };
}

export function applyReveal(state: GameState, coord: Coord, now: Date): ApplyRevealResult {
  const { board, outcome, safeRevealed } = revealOnBoard(state.board, coord);

  if (outcome.kind === "alreadyRevealedOrFlagged") {
    return { state, outcome };
  }

  let next: GameState = {
    ...state,
    board,
    clickedCount: state.clickedCount + safeRevealed,
  };

  if (next.status === "notStarted") {
    next = { ...next, status: "inProgress", startedAt: now.toISOString() };
  }

  const finalize = (tag: string) => {
    validateState(next, `applyReveal:${tag}`);
    return { state: next, outcome };
  };

  if (outcome.kind === "hitMine") {
    next = end(next, "lost", now);
    return finalize("hitMine");
  }

  if (outcome.kind === "foundTreasure") {
    next = end(next, "won", now);
    return finalize("foundTreasure");
  }

  if (next.clickedCount === safeCellTarget(next)) {
    next = end(next, "won", now);
    return finalize("cleared");
  }

  return finalize("revealed");
}

/**
 * Flag count is observational only: it may exceed or undercount real mines.
 * Flagging does not start the game.
 */
export function applyFlagToggle(state: GameState, coord: Coord): ApplyFlagResult {
  const { board, outcome } = toggleFlagOnBoard(state.board, coord);

  if (outcome.kind === "alreadyRevealed") {
    return { state, outcome };
  }

  const next: GameState = {
    ...state,
    board,
    flagCount: state.flagCount + (outcome.kind === "flagged" ? 1 : -1),
  };

  validateState(next, `applyFlagToggle:${outcome.kind}`);
  return { state: next, outcome };
}
