// src/types.ts

export interface Coord {
  row: number;
  col: number;
}

/** Fixed-layout matrix value: 0 = empty, 1 = mine, 2 = treasure. */
export type CellValue = 0 | 1 | 2;

export type FixedLayout = readonly (readonly CellValue[])[];

// Cells are immutable once a board is built; the engine replaces a cell
// rather than writing to it, so states may share untouched rows.
export interface Cell {
  readonly row: number;
  readonly col: number;
  readonly isMine: boolean;
  readonly hasTreasure: boolean;
  readonly isFlagged: boolean;
  readonly isRevealed: boolean;

  // Computed once after placement; never recomputed during play.
  readonly adjacentMines: number;
}

export interface Board {
  rows: number;
  cols: number;
  cells: readonly (readonly Cell[])[];
  mineCount: number;
  treasureCells: readonly Coord[];
  isFixedLayout: boolean;
}

export interface GameConfig {
  rows: number;
  cols: number;
  mineCount: number;
  treasureCount: number;

  // When present, restart reproduces exactly this board.
  fixedLayout?: FixedLayout;
}

export type GameStatus = "notStarted" | "inProgress" | "won" | "lost";

export type TerminalStatus = Extract<GameStatus, "won" | "lost">;

export interface GameState {
  config: GameConfig;
  board: Board;
  status: GameStatus;

  // Safe (non-mine, non-treasure) cells revealed so far.
  clickedCount: number;
  flagCount: number;

  // ISO timestamps
  startedAt: string | null;
  endedAt: string | null;
}

export type RevealOutcome =
  | { kind: "alreadyRevealedOrFlagged"; coord: Coord }
  | { kind: "hitMine"; coord: Coord }
  | { kind: "foundTreasure"; coord: Coord }
  | { kind: "revealed"; cells: readonly Coord[] };

export type FlagOutcome =
  | { kind: "flagged"; coord: Coord }
  | { kind: "unflagged"; coord: Coord }
  | { kind: "alreadyRevealed"; coord: Coord };

export interface CellView {
  readonly row: number;
  readonly col: number;
  readonly revealed: boolean;
  readonly flagged: boolean;
  readonly isMine: boolean;
  readonly hasTreasure: boolean;
  readonly adjacentMines: number;
}

export interface GameSnapshot {
  readonly rows: number;
  readonly cols: number;
  readonly cells: readonly CellView[];
  readonly flagCount: number;
  readonly mineCount: number;
  readonly treasureCount: number;
  readonly clickedCount: number;
  readonly status: GameStatus;
  readonly startedAt: string | null;
  readonly endedAt: string | null;
}
