// src/engine/controller.ts
//
// GameController: the single mutator of one game session.
// Owns a replaceable GameState value; every action computes the next state
// with the pure engine and then swaps it in with a single assignment.

import type {
  Coord,
  FlagOutcome,
  GameConfig,
  GameSnapshot,
  GameState,
  RevealOutcome,
} from "../types";
import type { ActionResponse } from "./actionEnvelope";
import { newGame, restartGame } from "./newGame";
import { type CellObserver, withObserverDefaults } from "./observer";
import { defaultRng, type Rng } from "./rng";
import { cellView, snapshot } from "./snapshot";
import { tryReveal, tryToggleFlag } from "./tryApply";

export type GameControllerOptions = {
  rng?: Rng;
  now?: () => Date;
  observer?: Partial<CellObserver>;
};

export class GameController {
  private state: GameState;
  private readonly rng: Rng;
  private readonly now: () => Date;
  private readonly observer: CellObserver;

  private constructor(state: GameState, opts: GameControllerOptions) {
    this.state = state;
    this.rng = opts.rng ?? defaultRng;
    this.now = opts.now ?? (() => new Date());
    this.observer = withObserverDefaults(opts.observer);
  }

  /** Throws ConfigurationError (no controller is created). */
  static newGame(config: GameConfig, opts: GameControllerOptions = {}): GameController {
    const rng = opts.rng ?? defaultRng;
    return new GameController(newGame(config, { rng }), { ...opts, rng });
  }

  /** Resume a previously built (e.g. deserialized) state. */
  static resume(state: GameState, opts: GameControllerOptions = {}): GameController {
    return new GameController(state, opts);
  }

  get current(): GameState {
    return this.state;
  }

  onReveal(coord: Coord): ActionResponse<RevealOutcome> {
    const res = tryReveal(this.state, coord.row, coord.col, this.now());
    if (!res.ok) return res;

    const prev = this.state;
    this.state = res.state;
    if (res.state === prev) return res;

    for (const c of revealedBy(res.outcome)) {
      this.observer.cellChanged(cellView(this.state.board.cells[c.row][c.col]));
    }
    this.notifyCounters();

    if (this.state.status === "won" || this.state.status === "lost") {
      this.observer.gameOver(this.state.status, snapshot(this.state));
    }
    return res;
  }

  onFlagToggle(coord: Coord): ActionResponse<FlagOutcome> {
    const res = tryToggleFlag(this.state, coord.row, coord.col);
    if (!res.ok) return res;

    const prev = this.state;
    this.state = res.state;
    if (res.state === prev) return res;

    this.observer.cellChanged(cellView(this.state.board.cells[res.outcome.coord.row][res.outcome.coord.col]));
    this.notifyCounters();
    return res;
  }

  /**
   * Build the replacement first, then swap. Throws ConfigurationError
   * (only possible for states restored from outside) with the old game intact.
   */
  restart(): GameState {
    const next = restartGame(this.state, { rng: this.rng });
    this.state = next;
    this.observer.gameRestarted(snapshot(next));
    return next;
  }

  snapshot(): GameSnapshot {
    return snapshot(this.state);
  }

  private notifyCounters(): void {
    this.observer.countersChanged({
      flagCount: this.state.flagCount,
      clickedCount: this.state.clickedCount,
      mineCount: this.state.board.mineCount,
      treasureCount: this.state.board.treasureCells.length,
    });
  }
}

function revealedBy(outcome: RevealOutcome): readonly Coord[] {
  switch (outcome.kind) {
    case "revealed":
      return outcome.cells;
    case "hitMine":
    case "foundTreasure":
      return [outcome.coord];
    case "alreadyRevealedOrFlagged":
      return [];
    default: {
      const _exhaustive: never = outcome;
      throw new Error(`Unsupported reveal outcome: ${JSON.stringify(_exhaustive)}`);
    }
  }
}
