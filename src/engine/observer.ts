import type { CellView, GameSnapshot, TerminalStatus } from "../types";

export type Counters = {
  flagCount: number;
  clickedCount: number;
  mineCount: number;
  treasureCount: number;
};

/**
 * Capability interface every presentation adapter implements.
 * The controller calls each method unconditionally.
 */
export interface CellObserver {
  cellChanged(cell: CellView): void;
  countersChanged(counters: Counters): void;
  gameOver(status: TerminalStatus, snapshot: GameSnapshot): void;
  gameRestarted(snapshot: GameSnapshot): void;
}

/**
 * Fill the methods an adapter does not care about with no-ops.
 * Methods are invoked on `partial`, so class-based adapters keep their `this`.
 */
export function withObserverDefaults(partial: Partial<CellObserver> = {}): CellObserver {
  return {
    cellChanged: (cell) => partial.cellChanged?.(cell),
    countersChanged: (counters) => partial.countersChanged?.(counters),
    gameOver: (status, snap) => partial.gameOver?.(status, snap),
    gameRestarted: (snap) => partial.gameRestarted?.(snap),
  };
}
