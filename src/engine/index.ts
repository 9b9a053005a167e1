// Public engine surface

export type * from "../types";

// Adapter-facing surface: newGame / reveal / toggleFlag / restart / snapshot
export { newGame, reveal, toggleFlag, restart, snapshot } from "./publicApi";
export type { ActionResponse, ActionOk, ActionErr, EngineError, EngineErrorCode } from "./actionEnvelope";

// Session controller + observer capability
export { GameController, type GameControllerOptions } from "./controller";
export { withObserverDefaults, type CellObserver, type Counters } from "./observer";

// Board generator + reveal engine (board-level)
export { generateBoard, countAdjacentMines, layoutOf, type GenerateBoardOptions } from "./generateBoard";
export { revealOnBoard, toggleFlagOnBoard } from "./reveal";
export { neighborCoords, isAdjacentToTreasure } from "./neighbors";

// State machine (pure transitions)
export { applyReveal, applyFlagToggle } from "./applyAction";
export { tryReveal, tryToggleFlag, toCoord } from "./tryApply";
export { safeCellTarget } from "./newGame";
export { elapsedMs } from "./snapshot";

// Randomness
export { createRng, defaultRng, sampleWithoutReplacement, type Rng } from "./rng";

// Errors
export { ConfigurationError, isConfigurationError } from "./errors";

// Test-mode layout validation
export {
  validateLayout,
  validateLayoutText,
  parseLayoutText,
  type LayoutRule,
  type LayoutValidationResult,
} from "./validateLayout";

// State serialization + hash
export {
  serializeState,
  deserializeState,
  toPersisted,
  fromPersisted,
  PERSISTED_GAME_VERSION,
  type PersistedGameV1,
  type PersistedCell,
} from "./serialization";
export { hashState } from "./stateHash";
