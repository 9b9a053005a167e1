import type { AddressInfo } from "node:net";
import { WebSocketServer, type RawData, type WebSocket } from "ws";
import type { GameConfig } from "../types";
import type { ClientMessage, ServerMessage } from "./protocol";
import {
  handleClientMessage,
  mkGameSync,
  type HandleOptions,
  type HandleResult,
  type SessionState,
} from "./handleMessage";
import { hasPersistedSession, isValidSessionId, loadSession, saveSession } from "./persistence";
import { GameController, createRng, defaultRng, type CellObserver, type Rng } from "../engine";

export const SERVER_VERSION = "minehunt-ws-0.1.0";

export type WsServerOptions = {
  port: number;
  defaults: Omit<GameConfig, "fixedLayout">;

  // When set, every session with a named clientId is saved here after each change.
  persistenceDir?: string;

  // Server-wide seed; per-session streams are derived from it.
  seed?: string | number;
  log?: (line: string) => void;
  now?: () => Date;
};

export type WsServerHandle = {
  port: number;
  close: () => Promise<void>;
};

const ANON = "anon";

// Messages after which the session may have a different game to persist.
const STATE_CHANGING: ReadonlySet<ClientMessage["type"]> = new Set<ClientMessage["type"]>([
  "newGame",
  "loadLayout",
  "reveal",
  "flag",
  "restart",
]);

function safeParseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

function rawToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

function isPlainObject(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

function getReqId(x: unknown): string | undefined {
  if (!isPlainObject(x)) return undefined;
  const v = x.reqId;
  return typeof v === "string" ? v : undefined;
}

function withReqId(msg: ServerMessage, reqId?: string): ServerMessage {
  if (!reqId) return msg;
  return { ...msg, reqId };
}

function makeError(code: "BAD_MESSAGE" | "INTERNAL_ERROR", message: string, reqId?: string): ServerMessage {
  return withReqId({ type: "error", code, message }, reqId);
}

function optionalNumber(x: Record<string, unknown>, key: string): boolean {
  return !(key in x) || typeof x[key] === "number";
}

function isClientMessage(x: unknown): x is ClientMessage {
  if (!isPlainObject(x)) return false;
  if (typeof x.type !== "string") return false;
  if ("reqId" in x && typeof x.reqId !== "string") return false;

  switch (x.type) {
    case "hello":
      // keep permissive; clientId optional
      return !("clientId" in x) || typeof x.clientId === "string";

    case "newGame":
      return (
        optionalNumber(x, "rows") &&
        optionalNumber(x, "cols") &&
        optionalNumber(x, "mineCount") &&
        optionalNumber(x, "treasureCount") &&
        (!("seed" in x) || typeof x.seed === "string" || typeof x.seed === "number")
      );

    case "loadLayout":
      return typeof x.layout === "string";

    // Range and integrality are the engine's call (INVALID_COORDINATE).
    case "reveal":
    case "flag":
      return typeof x.row === "number" && typeof x.col === "number";

    case "restart":
    case "getSnapshot":
      return true;

    default:
      return false;
  }
}

function send(ws: WebSocket, msg: ServerMessage) {
  ws.send(JSON.stringify(msg));
}

export function startWsServer(opts: WsServerOptions): WsServerHandle {
  const wss = new WebSocketServer({ port: opts.port });
  const log = opts.log ?? ((line: string) => console.log(line));
  const persistenceDir = opts.persistenceDir;

  let sessionCounter = 0;

  wss.on("connection", (ws) => {
    let session: SessionState = { clientId: ANON };

    const makeRng = (seed?: string | number): Rng => {
      if (seed !== undefined) return createRng(seed);
      if (opts.seed !== undefined) return createRng(`${opts.seed}:${session.clientId}:${sessionCounter++}`);
      return defaultRng;
    };

    const observer: Partial<CellObserver> = {
      gameOver: (status, snap) => {
        log(
          `[minehunt] ${session.clientId}: game ${status} (${snap.clickedCount} safe cells revealed, ${snap.flagCount} flags)`
        );
      },
    };

    const handleOpts: HandleOptions = {
      defaults: opts.defaults,
      makeRng,
      now: opts.now,
      observer,
    };

    const canPersist = () =>
      persistenceDir !== undefined && session.clientId !== ANON && isValidSessionId(session.clientId);

    const persist = () => {
      if (!persistenceDir || !canPersist() || !session.controller) return;
      try {
        saveSession(session.clientId, session.controller.current, { dir: persistenceDir });
      } catch (err) {
        log(`[minehunt] failed to persist session ${session.clientId}: ${String(err)}`);
      }
    };

    const tryResume = (): boolean => {
      if (!persistenceDir || !canPersist()) return false;
      if (!hasPersistedSession(session.clientId, { dir: persistenceDir })) return false;
      try {
        const state = loadSession(session.clientId, { dir: persistenceDir });
        session = {
          ...session,
          controller: GameController.resume(state, { rng: makeRng(), now: opts.now, observer }),
        };
        return true;
      } catch (err) {
        log(`[minehunt] failed to resume session ${session.clientId}: ${String(err)}`);
        return false;
      }
    };

    // welcome-on-connect
    send(ws, { type: "welcome", serverVersion: SERVER_VERSION, clientId: ANON, resumed: false });

    ws.on("message", (data) => {
      const parsed = safeParseJson(rawToString(data));

      if (!parsed) {
        send(ws, makeError("BAD_MESSAGE", "Invalid JSON."));
        return;
      }

      const reqId = getReqId(parsed);

      if (!isClientMessage(parsed)) {
        const t = isPlainObject(parsed) ? parsed.type : undefined;
        send(ws, makeError("BAD_MESSAGE", `Invalid client message shape. type=${String(t)}`, reqId));
        return;
      }

      const msg = parsed;

      if (msg.type === "hello") {
        const cid = msg.clientId?.trim() || ANON;
        // A game already running on this socket survives unless a saved one replaces it.
        session = { ...session, clientId: cid };
        const resumed = tryResume();

        send(ws, withReqId({ type: "welcome", serverVersion: SERVER_VERSION, clientId: cid, resumed }, reqId));
        if (resumed && session.controller) {
          send(ws, mkGameSync(session.controller, reqId));
        }
        return;
      }

      let result: HandleResult;
      try {
        result = handleClientMessage(session, msg, handleOpts);
      } catch (err) {
        log(`[minehunt] internal error handling ${msg.type} for ${session.clientId}: ${String(err)}`);
        send(ws, makeError("INTERNAL_ERROR", "Internal server error.", reqId));
        return;
      }
      session = result.nextState;

      if (STATE_CHANGING.has(msg.type)) persist();

      send(ws, result.serverMessage);
    });

    ws.on("error", (err) => {
      log(`[minehunt] socket error for ${session.clientId}: ${err.message}`);
    });
  });

  const address: AddressInfo | string | null = wss.address();

  return {
    port: typeof address === "object" && address !== null ? address.port : opts.port,
    close: async () => {
      for (const ws of wss.clients) {
        ws.terminate();
      }
      await new Promise<void>((resolve, reject) => wss.close((err) => (err ? reject(err) : resolve())));
    },
  };
}
