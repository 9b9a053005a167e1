import type { GameConfig } from "../types";
import type { ClientMessage, ServerErrorCode, ServerMessage } from "./protocol";
import {
  GameController,
  hashState,
  isConfigurationError,
  validateLayoutText,
  type CellObserver,
  type Rng,
} from "../engine";
import { CELL_TREASURE, TEST_LAYOUT_MINES, TEST_LAYOUT_SIZE } from "../engine/constants";

export type SessionState = {
  clientId: string;

  // Absent until the client starts a game (newGame / loadLayout).
  controller?: GameController;
};

export type HandleOptions = {
  /** Used for any newGame field the client leaves out. */
  defaults: Omit<GameConfig, "fixedLayout">;

  /** Random source for a new game; `seed` is the client-supplied seed, if any. */
  makeRng: (seed?: string | number) => Rng;
  now?: () => Date;
  observer?: Partial<CellObserver>;
};

export type HandleResult = {
  nextState: SessionState;
  serverMessage: ServerMessage;
};

function withReqId(msg: ServerMessage, reqId?: string): ServerMessage {
  if (!reqId) return msg;
  return { ...msg, reqId };
}

function mkError(code: ServerErrorCode, message: string, reqId?: string): ServerMessage {
  return withReqId({ type: "error", code, message }, reqId);
}

export function mkGameSync(controller: GameController, reqId?: string): ServerMessage {
  return withReqId(
    {
      type: "gameSync",
      snapshot: controller.snapshot(),
      stateHash: hashState(controller.current),
    },
    reqId
  );
}

/**
 * Build a controller, mapping ConfigurationError to an error message.
 * Anything else is a bug and propagates.
 */
function startGame(
  state: SessionState,
  config: GameConfig,
  rng: Rng,
  opts: HandleOptions,
  reqId?: string
): HandleResult {
  try {
    const controller = GameController.newGame(config, { rng, now: opts.now, observer: opts.observer });
    return {
      nextState: { ...state, controller },
      serverMessage: mkGameSync(controller, reqId),
    };
  } catch (err) {
    if (!isConfigurationError(err)) throw err;
    return { nextState: state, serverMessage: mkError("CONFIGURATION_ERROR", err.message, reqId) };
  }
}

function noGame(state: SessionState, reqId?: string): HandleResult {
  return {
    nextState: state,
    serverMessage: mkError("NO_GAME", "No game in progress. Send newGame or loadLayout first.", reqId),
  };
}

/**
 * Pure dispatcher for one session. All game mutation goes through the
 * session's GameController; `hello` is answered by the transport.
 */
export function handleClientMessage(
  state: SessionState,
  msg: ClientMessage,
  opts: HandleOptions
): HandleResult {
  const reqId = msg.reqId;

  switch (msg.type) {
    case "newGame": {
      const config: GameConfig = {
        rows: msg.rows ?? opts.defaults.rows,
        cols: msg.cols ?? opts.defaults.cols,
        mineCount: msg.mineCount ?? opts.defaults.mineCount,
        treasureCount: msg.treasureCount ?? opts.defaults.treasureCount,
      };
      return startGame(state, config, opts.makeRng(msg.seed), opts, reqId);
    }

    case "loadLayout": {
      const result = validateLayoutText(msg.layout);
      if (!result.ok) {
        return {
          nextState: state,
          serverMessage: withReqId(
            { type: "layoutRejected", rule: result.rule, message: result.message },
            reqId
          ),
        };
      }

      const config: GameConfig = {
        rows: TEST_LAYOUT_SIZE,
        cols: TEST_LAYOUT_SIZE,
        mineCount: TEST_LAYOUT_MINES,
        treasureCount: result.layout.flat().filter((v) => v === CELL_TREASURE).length,
        fixedLayout: result.layout,
      };
      return startGame(state, config, opts.makeRng(), opts, reqId);
    }

    case "reveal": {
      const controller = state.controller;
      if (!controller) return noGame(state, reqId);

      const res = controller.onReveal({ row: msg.row, col: msg.col });
      if (!res.ok) {
        return { nextState: state, serverMessage: mkError(res.error.code, res.error.message, reqId) };
      }
      return {
        nextState: state,
        serverMessage: withReqId(
          {
            type: "revealResult",
            outcome: res.outcome,
            snapshot: controller.snapshot(),
            stateHash: hashState(controller.current),
          },
          reqId
        ),
      };
    }

    case "flag": {
      const controller = state.controller;
      if (!controller) return noGame(state, reqId);

      const res = controller.onFlagToggle({ row: msg.row, col: msg.col });
      if (!res.ok) {
        return { nextState: state, serverMessage: mkError(res.error.code, res.error.message, reqId) };
      }
      return {
        nextState: state,
        serverMessage: withReqId(
          {
            type: "flagResult",
            outcome: res.outcome,
            snapshot: controller.snapshot(),
            stateHash: hashState(controller.current),
          },
          reqId
        ),
      };
    }

    case "restart": {
      const controller = state.controller;
      if (!controller) return noGame(state, reqId);

      try {
        controller.restart();
      } catch (err) {
        if (!isConfigurationError(err)) throw err;
        return { nextState: state, serverMessage: mkError("CONFIGURATION_ERROR", err.message, reqId) };
      }
      return { nextState: state, serverMessage: mkGameSync(controller, reqId) };
    }

    case "getSnapshot": {
      const controller = state.controller;
      if (!controller) return noGame(state, reqId);
      return { nextState: state, serverMessage: mkGameSync(controller, reqId) };
    }

    default:
      return {
        nextState: state,
        serverMessage: mkError("BAD_MESSAGE", "Unhandled message type.", reqId),
      };
  }
}
