import type { GameConfig } from "../types";
import { DEFAULT_COLS, DEFAULT_MINES, DEFAULT_ROWS, DEFAULT_TREASURES } from "../engine/constants";

export type Env = Record<string, string | undefined>;

export type ServerConfig = {
  port: number;
  defaults: Omit<GameConfig, "fixedLayout">;
  persistenceDir?: string;
  seed?: string;

  // Suppresses the ws server's game and persistence log lines.
  quiet: boolean;
};

export const DEFAULT_WS_PORT = 8787;

export function envFlag(env: Env, name: string, defaultValue = false): boolean {
  const v = env[name];
  if (v == null) return defaultValue;
  const s = String(v).trim().toLowerCase();
  return s === "1" || s === "true" || s === "yes" || s === "on";
}

export function envInt(env: Env, name: string, defaultValue: number): number {
  const v = env[name];
  if (v == null || v.trim() === "") return defaultValue;
  const n = Number(v);
  return Number.isInteger(n) ? n : defaultValue;
}

function envString(env: Env, name: string): string | undefined {
  const v = env[name]?.trim();
  return v ? v : undefined;
}

/**
 * Server settings from MINEHUNT_* variables. Unparseable numbers fall back
 * to their defaults; board sizes are checked later by the engine.
 */
export function loadServerConfig(env: Env = process.env): ServerConfig {
  const persistenceDir = envString(env, "MINEHUNT_PERSIST_DIR");
  const seed = envString(env, "MINEHUNT_SEED");

  return {
    port: envInt(env, "MINEHUNT_WS_PORT", DEFAULT_WS_PORT),
    defaults: {
      rows: envInt(env, "MINEHUNT_ROWS", DEFAULT_ROWS),
      cols: envInt(env, "MINEHUNT_COLS", DEFAULT_COLS),
      mineCount: envInt(env, "MINEHUNT_MINES", DEFAULT_MINES),
      treasureCount: envInt(env, "MINEHUNT_TREASURES", DEFAULT_TREASURES),
    },
    quiet: envFlag(env, "MINEHUNT_QUIET", false),
    ...(persistenceDir ? { persistenceDir } : {}),
    ...(seed ? { seed } : {}),
  };
}
