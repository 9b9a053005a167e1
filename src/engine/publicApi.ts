// src/engine/publicApi.ts
//
// Engine surface for presentation adapters: new game, reveal, flag,
// restart, snapshot. Every call is pure; callers keep the returned state.

import type { FlagOutcome, GameConfig, GameState, RevealOutcome } from "../types";
import type { ActionResponse } from "./actionEnvelope";
import { newGame as makeGame, restartGame } from "./newGame";
import type { Rng } from "./rng";
import { tryReveal, tryToggleFlag } from "./tryApply";

export type { GameSnapshot } from "../types";
export { snapshot } from "./snapshot";

/**
 * Throws ConfigurationError.
 */
export function newGame(config: GameConfig, opts: { rng?: Rng } = {}): GameState {
  return makeGame(config, opts);
}

export function reveal(
  state: GameState,
  row: number,
  col: number,
  opts: { now?: () => Date } = {}
): ActionResponse<RevealOutcome> {
  const now = opts.now ?? (() => new Date());
  return tryReveal(state, row, col, now());
}

export function toggleFlag(state: GameState, row: number, col: number): ActionResponse<FlagOutcome> {
  return tryToggleFlag(state, row, col);
}

export function restart(state: GameState, opts: { rng?: Rng } = {}): GameState {
  return restartGame(state, opts);
}
