// src/engine/validateLayout.ts
//
// Test-mode board validator. Pure; never throws. Rules are checked in order
// and the first failure is reported.

import type { CellValue, FixedLayout } from "../types";
import {
  isCellValue,
  CELL_MINE,
  CELL_TREASURE,
  TEST_LAYOUT_MAX_TREASURES,
  TEST_LAYOUT_MIN_TREASURES,
  TEST_LAYOUT_MINES,
  TEST_LAYOUT_SIZE,
} from "./constants";

export type LayoutRule =
  | "dimensions"
  | "values"
  | "mineCount"
  | "rowCoverage"
  | "columnCoverage"
  | "diagonal"
  | "adjacentPair"
  | "treasureCount";

export type LayoutValidationResult =
  | { ok: true; message: string; layout: FixedLayout }
  | { ok: false; rule: LayoutRule; message: string };

const N = TEST_LAYOUT_SIZE;

function fail(rule: LayoutRule, message: string): LayoutValidationResult {
  return { ok: false, rule, message };
}

const CELL_TOKEN = /^[012]$/;

/**
 * Accepts 0, 1, 2 and the same single digits as trimmed strings ("1", " 2 ").
 */
function coerceCellValue(v: unknown): CellValue | null {
  if (typeof v === "string") {
    const token = v.trim();
    if (!CELL_TOKEN.test(token)) return null;
    const n = Number(token);
    return isCellValue(n) ? n : null;
  }
  return isCellValue(v) ? v : null;
}

/**
 * Split a text table into rows of comma-separated tokens. Blank lines are skipped.
 */
export function parseLayoutText(text: string): string[][] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => line.split(",").map((token) => token.trim()));
}

export function validateLayout(matrix: unknown): LayoutValidationResult {
  // 1. Exactly 8 rows of exactly 8 values.
  if (!Array.isArray(matrix) || matrix.length !== N) {
    return fail("dimensions", `The board must have exactly ${N} rows of ${N} values.`);
  }
  const rowsIn: unknown[][] = [];
  for (const line of matrix) {
    if (!Array.isArray(line) || line.length !== N) {
      return fail("dimensions", `The board must have exactly ${N} rows of ${N} values.`);
    }
    rowsIn.push(line);
  }

  // 2. Every value in {0, 1, 2}.
  const layout: CellValue[][] = [];
  for (const line of rowsIn) {
    const parsed: CellValue[] = [];
    for (const raw of line) {
      const v = coerceCellValue(raw);
      if (v === null) return fail("values", "Every value must be 0, 1 or 2.");
      parsed.push(v);
    }
    layout.push(parsed);
  }

  const isMine = (r: number, c: number) => layout[r][c] === CELL_MINE;

  // 3. Exactly 10 mines.
  const mines = layout.flat().filter((v) => v === CELL_MINE).length;
  if (mines !== TEST_LAYOUT_MINES) {
    return fail("mineCount", `The board must contain exactly ${TEST_LAYOUT_MINES} mines (found ${mines}).`);
  }

  // 4. Every row and every column has a mine.
  for (let r = 0; r < N; r++) {
    if (!layout[r].includes(CELL_MINE)) {
      return fail("rowCoverage", `Every row must contain at least one mine (row ${r + 1} has none).`);
    }
  }
  for (let c = 0; c < N; c++) {
    if (!layout.some((line) => line[c] === CELL_MINE)) {
      return fail("columnCoverage", `Every column must contain at least one mine (column ${c + 1} has none).`);
    }
  }

  // 5. Exactly one mine on the main diagonal.
  let diagonal = 0;
  for (let i = 0; i < N; i++) if (isMine(i, i)) diagonal++;
  if (diagonal !== 1) {
    return fail("diagonal", `Exactly one mine must lie on the main diagonal (found ${diagonal}).`);
  }

  // 6. Exactly one orthogonally adjacent mine pair, counted globally.
  // Each pair is counted once, from its left/top member.
  let pairs = 0;
  for (let r = 0; r < N; r++) {
    for (let c = 0; c < N; c++) {
      if (!isMine(r, c)) continue;
      if (c + 1 < N && isMine(r, c + 1)) pairs++;
      if (r + 1 < N && isMine(r + 1, c)) pairs++;
    }
  }
  if (pairs !== 1) {
    return fail("adjacentPair", `Exactly one pair of mines must be orthogonally adjacent (found ${pairs}).`);
  }

  // 7. Between 1 and 9 treasures.
  const treasures = layout.flat().filter((v) => v === CELL_TREASURE).length;
  if (treasures < TEST_LAYOUT_MIN_TREASURES || treasures > TEST_LAYOUT_MAX_TREASURES) {
    return fail(
      "treasureCount",
      `The board must contain between ${TEST_LAYOUT_MIN_TREASURES} and ${TEST_LAYOUT_MAX_TREASURES} treasures (found ${treasures}).`
    );
  }

  return { ok: true, message: "Board is valid.", layout };
}

export function validateLayoutText(text: string): LayoutValidationResult {
  return validateLayout(parseLayoutText(text));
}
