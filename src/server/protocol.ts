// src/server/protocol.ts

import type { FlagOutcome, GameSnapshot, LayoutRule, RevealOutcome } from "../engine";

/* =========================
 * Client → Server messages
 * ========================= */

export type ClientMessage =
  | HelloMessage
  | NewGameMessage
  | LoadLayoutMessage
  | RevealMessage
  | FlagMessage
  | RestartMessage
  | GetSnapshotMessage;

export interface HelloMessage {
  type: "hello";
  clientId?: string;
  reqId?: string;
}

/**
 * Start a random game. Omitted fields fall back to the server defaults.
 * `seed` makes placement (and later restarts) deterministic.
 */
export interface NewGameMessage {
  type: "newGame";
  rows?: number;
  cols?: number;
  mineCount?: number;
  treasureCount?: number;
  seed?: string | number;
  reqId?: string;
}

/**
 * Test mode: an 8x8 text table of comma-separated 0/1/2 values.
 * Validated before any game is built.
 */
export interface LoadLayoutMessage {
  type: "loadLayout";
  layout: string;
  reqId?: string;
}

export interface RevealMessage {
  type: "reveal";
  row: number;
  col: number;
  reqId?: string;
}

export interface FlagMessage {
  type: "flag";
  row: number;
  col: number;
  reqId?: string;
}

export interface RestartMessage {
  type: "restart";
  reqId?: string;
}

export interface GetSnapshotMessage {
  type: "getSnapshot";
  reqId?: string;
}

/* =========================
 * Server → Client messages
 * ========================= */

export type ServerMessage =
  | WelcomeMessage
  | GameSyncMessage
  | RevealResultMessage
  | FlagResultMessage
  | LayoutRejectedMessage
  | ErrorMessage;

export interface WelcomeMessage {
  type: "welcome";
  serverVersion: string;
  clientId: string;

  // True when a persisted session for this clientId was restored.
  resumed: boolean;
  reqId?: string;
}

export interface GameSyncMessage {
  type: "gameSync";
  snapshot: GameSnapshot;
  stateHash: string;
  reqId?: string;
}

export interface RevealResultMessage {
  type: "revealResult";
  outcome: RevealOutcome;
  snapshot: GameSnapshot;
  stateHash: string;
  reqId?: string;
}

export interface FlagResultMessage {
  type: "flagResult";
  outcome: FlagOutcome;
  snapshot: GameSnapshot;
  stateHash: string;
  reqId?: string;
}

export interface LayoutRejectedMessage {
  type: "layoutRejected";
  rule: LayoutRule;
  message: string;
  reqId?: string;
}

export type ServerErrorCode =
  | "BAD_MESSAGE"
  | "NO_GAME"
  | "INVALID_COORDINATE"
  | "ILLEGAL_OPERATION"
  | "CONFIGURATION_ERROR"
  | "INTERNAL_ERROR";

export interface ErrorMessage {
  type: "error";
  code: ServerErrorCode;
  message: string;
  reqId?: string;
}
