// src/ui/commands.ts
//
// Text-client command parser. Coordinates are typed 1-based and
// converted to the engine's 0-based rows/cols here.

export type Command =
  | { kind: "help" }
  | { kind: "quit" }
  | { kind: "show" }
  | { kind: "restart" }
  | {
      kind: "new";
      rows?: number;
      cols?: number;
      mineCount?: number;
      treasureCount?: number;
      seed?: string;
    }
  | { kind: "reveal"; row: number; col: number }
  | { kind: "flag"; row: number; col: number }
  | { kind: "layout"; file: string }
  | { kind: "invalid"; message: string };

export const USAGE = [
  "Commands:",
  "  help",
  "  new [rows cols mines treasures] [seed]",
  "  r <row> <col>      reveal (1-based)",
  "  f <row> <col>      toggle flag (1-based)",
  "  restart",
  "  show",
  "  layout <file>      load an 8x8 test layout (comma-separated 0/1/2)",
  "  q",
].join("\n");

function invalid(message: string): Command {
  return { kind: "invalid", message };
}

function parseCount(s: string): number | null {
  if (!/^\d+$/.test(s)) return null;
  return Number(s);
}

function parseNew(args: string[]): Command {
  const usage = invalid("Usage: new [rows cols mines treasures] [seed]");

  if (args.length === 0) return { kind: "new" };
  if (args.length === 1) return { kind: "new", seed: args[0] };
  if (args.length !== 4 && args.length !== 5) return usage;

  const counts = args.slice(0, 4).map(parseCount);
  const [rows, cols, mineCount, treasureCount] = counts;
  if (rows === null || cols === null || mineCount === null || treasureCount === null) return usage;

  return {
    kind: "new",
    rows,
    cols,
    mineCount,
    treasureCount,
    ...(args.length === 5 ? { seed: args[4] } : {}),
  };
}

function parseCoordCommand(kind: "reveal" | "flag", args: string[]): Command {
  const usage = invalid(`Usage: ${kind === "reveal" ? "r" : "f"} <row> <col> (coordinates start at 1)`);
  if (args.length !== 2) return usage;

  const row = parseCount(args[0]);
  const col = parseCount(args[1]);
  if (row === null || col === null || row < 1 || col < 1) return usage;

  return { kind, row: row - 1, col: col - 1 };
}

/**
 * null for a blank line.
 */
export function parseCommand(line: string): Command | null {
  const input = line.trim();
  if (!input) return null;

  const [head, ...args] = input.split(/\s+/);
  const cmd = head.toLowerCase();

  switch (cmd) {
    case "help":
      return { kind: "help" };
    case "q":
    case "quit":
      return { kind: "quit" };
    case "show":
      return { kind: "show" };
    case "restart":
      return { kind: "restart" };
    case "new":
      return parseNew(args);
    case "r":
      return parseCoordCommand("reveal", args);
    case "f":
      return parseCoordCommand("flag", args);
    case "layout": {
      // File names may contain spaces.
      const file = input.slice(head.length).trim();
      return file ? { kind: "layout", file } : invalid("Usage: layout <file>");
    }
    default:
      return invalid("Unknown command. Type: help");
  }
}
