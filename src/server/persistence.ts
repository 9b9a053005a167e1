import fs from "node:fs";
import path from "node:path";
import type { GameState } from "../types";
import { fromPersisted, hashState, toPersisted, type PersistedGameV1 } from "../engine";

export type PersistedSessionV1 = {
  version: 1;
  savedAt: string; // ISO
  sessionId: string;
  game: PersistedGameV1;
  stateHash: string;
};

export type PersistenceOptions = {
  /** Directory holding one `<sessionId>.json` file per session. */
  dir: string;
};

const SESSION_ID_RE = /^[A-Za-z0-9_-]{1,64}$/;

export function isValidSessionId(sessionId: string): boolean {
  return SESSION_ID_RE.test(sessionId);
}

export function sessionFilePath(sessionId: string, opts: PersistenceOptions): string {
  if (!isValidSessionId(sessionId)) {
    throw new Error(`Invalid session id for persistence: ${JSON.stringify(sessionId)}`);
  }
  return path.join(opts.dir, `${sessionId}.json`);
}

export function saveSession(
  sessionId: string,
  game: GameState,
  opts: PersistenceOptions,
  now: Date = new Date()
): void {
  const payload: PersistedSessionV1 = {
    version: 1,
    savedAt: now.toISOString(),
    sessionId,
    game: toPersisted(game),
    stateHash: hashState(game),
  };

  const filePath = sessionFilePath(sessionId, opts);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(payload, null, 2), "utf8");
}

function isObject(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null;
}

export function loadSession(sessionId: string, opts: PersistenceOptions): GameState {
  const raw = fs.readFileSync(sessionFilePath(sessionId, opts), "utf8");
  const parsed: unknown = JSON.parse(raw);

  if (!isObject(parsed)) {
    throw new Error("Persisted session is not an object.");
  }

  const version = parsed["version"];
  if (version !== 1) {
    throw new Error(`Unsupported persisted session version: ${String(version)}`);
  }

  if (typeof parsed["savedAt"] !== "string") {
    throw new Error("Persisted session missing savedAt string.");
  }

  if (parsed["sessionId"] !== sessionId) {
    throw new Error(`Persisted session id mismatch: expected ${sessionId}.`);
  }

  const stateHash = parsed["stateHash"];
  if (typeof stateHash !== "string") {
    throw new Error("Persisted session missing stateHash string.");
  }

  const game = fromPersisted(parsed["game"]);
  const computedHash = hashState(game);

  if (computedHash !== stateHash) {
    throw new Error(
      `Persisted session hash mismatch. Expected ${stateHash}, computed ${computedHash}.`
    );
  }

  return game;
}

/**
 * Utility: return true if a persisted file exists for this session.
 */
export function hasPersistedSession(sessionId: string, opts: PersistenceOptions): boolean {
  return isValidSessionId(sessionId) && fs.existsSync(sessionFilePath(sessionId, opts));
}
