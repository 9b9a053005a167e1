import type { GameState } from "../types";
import { hashStringToUint32 } from "./rng";
import { serializeState } from "./serialization";

/**
 * Deterministic hash of GameState (FNV-1a over the persisted form).
 * Used for persistence checks and client/server sync.
 */
export function hashState(state: GameState): string {
  return hashStringToUint32(serializeState(state)).toString(16).padStart(8, "0");
}
