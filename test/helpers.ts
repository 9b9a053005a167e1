import type WebSocket from "ws";
import type { CellValue, GameState } from "../src/types";
import { newGame } from "../src/engine";

function glyphValue(ch: string): CellValue {
  switch (ch) {
    case ".":
      return 0;
    case "M":
      return 1;
    case "T":
      return 2;
    default:
      throw new Error(`Unknown layout glyph: ${ch}`);
  }
}

/**
 * Compact layouts for tests: "." empty, "M" mine, "T" treasure.
 */
export function layout(lines: string[]): CellValue[][] {
  return lines.map((line) => Array.from(line, glyphValue));
}

export function fixedGame(lines: string[]): GameState {
  const fixedLayout = layout(lines);
  return newGame({
    rows: fixedLayout.length,
    cols: fixedLayout[0].length,
    mineCount: 0,
    treasureCount: 0,
    fixedLayout,
  });
}

// 4x5: one mine top-left, one treasure bottom-right.
export const OPEN_BOARD = ["M....", ".....", ".....", "....T"];

// A layout that passes every test-mode rule.
export const VALID_LAYOUT_ROWS = [
  "1,0,0,1,0,0,0,0",
  "0,0,0,0,0,1,1,0",
  "0,1,0,0,0,0,0,0",
  "0,0,0,0,1,0,0,0",
  "0,0,0,0,0,0,0,1",
  "0,0,1,0,0,0,0,0",
  "0,0,0,0,0,1,0,0",
  "0,0,0,1,0,0,0,2",
];

export const VALID_LAYOUT_TEXT = VALID_LAYOUT_ROWS.join("\n");

/**
 * Copy of VALID_LAYOUT_ROWS with the given cells overwritten.
 */
export function layoutTextWith(changes: Array<[row: number, col: number, value: string]>): string {
  const rows = VALID_LAYOUT_ROWS.map((line) => line.split(","));
  for (const [row, col, value] of changes) rows[row][col] = value;
  return rows.map((r) => r.join(",")).join("\n");
}

export const FIXED_NOW = new Date("2026-01-01T00:00:00.000Z");

export function makeQueue(ws: WebSocket) {
  const q: string[] = [];
  let resolve: ((s: string) => void) | null = null;

  ws.on("message", (d) => {
    const s = String(d);
    if (resolve) {
      const r = resolve;
      resolve = null;
      r(s);
    } else {
      q.push(s);
    }
  });

  return async () => {
    const queued = q.shift();
    if (queued !== undefined) return queued;
    return await new Promise<string>((r) => (resolve = r));
  };
}

export async function nextWithTimeout(next: () => Promise<string>, label: string, ms = 2000) {
  return await Promise.race([
    next(),
    new Promise<string>((_, reject) =>
      setTimeout(() => reject(new Error(`Timeout waiting for message (${label}) after ${ms}ms`)), ms)
    ),
  ]);
}

export function waitOpen(ws: WebSocket): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    ws.on("open", () => resolve());
    ws.on("error", (e) => reject(e));
  });
}
