import type { GameState, GameStatus } from "../types";

export type EngineErrorCode = "INVALID_COORDINATE" | "ILLEGAL_OPERATION";

export type EngineError = {
  code: EngineErrorCode;
  message: string;
};

export type ActionOk<T> = {
  ok: true;
  outcome: T;

  // Authoritative state after the action (identical to the input on no-op outcomes).
  state: GameState;
  status: GameStatus;
};

export type ActionErr = {
  ok: false;
  error: EngineError;
};

export type ActionResponse<T> = ActionOk<T> | ActionErr;
