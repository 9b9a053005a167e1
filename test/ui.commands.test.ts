import { describe, it, expect } from "vitest";
import { parseCommand } from "../src/ui/commands";

describe("parseCommand", () => {
  it("ignores blank lines", () => {
    expect(parseCommand("   ")).toBeNull();
  });

  it("parses the simple commands", () => {
    expect(parseCommand("help")).toEqual({ kind: "help" });
    expect(parseCommand("q")).toEqual({ kind: "quit" });
    expect(parseCommand("SHOW")).toEqual({ kind: "show" });
    expect(parseCommand(" restart ")).toEqual({ kind: "restart" });
  });

  it("converts 1-based coordinates to 0-based", () => {
    expect(parseCommand("r 1 1")).toEqual({ kind: "reveal", row: 0, col: 0 });
    expect(parseCommand("f 10 3")).toEqual({ kind: "flag", row: 9, col: 2 });
  });

  it("rejects malformed coordinates", () => {
    expect(parseCommand("r 0 1")).toEqual({ kind: "invalid", message: "Usage: r <row> <col> (coordinates start at 1)" });
    expect(parseCommand("f 1")).toEqual({ kind: "invalid", message: "Usage: f <row> <col> (coordinates start at 1)" });
    expect(parseCommand("r a b")).toMatchObject({ kind: "invalid" });
    expect(parseCommand("r 1.5 2")).toMatchObject({ kind: "invalid" });
  });

  it("parses new with optional counts and seed", () => {
    expect(parseCommand("new")).toEqual({ kind: "new" });
    expect(parseCommand("new lucky")).toEqual({ kind: "new", seed: "lucky" });
    expect(parseCommand("new 8 9 10 2")).toEqual({ kind: "new", rows: 8, cols: 9, mineCount: 10, treasureCount: 2 });
    expect(parseCommand("new 8 9 10 2 s")).toEqual({
      kind: "new",
      rows: 8,
      cols: 9,
      mineCount: 10,
      treasureCount: 2,
      seed: "s",
    });
    expect(parseCommand("new 8 9")).toEqual({ kind: "invalid", message: "Usage: new [rows cols mines treasures] [seed]" });
    expect(parseCommand("new 8 x 10 2")).toMatchObject({ kind: "invalid" });
  });

  it("keeps spaces in layout file names", () => {
    expect(parseCommand("layout  boards/my board.txt")).toEqual({ kind: "layout", file: "boards/my board.txt" });
    expect(parseCommand("layout")).toEqual({ kind: "invalid", message: "Usage: layout <file>" });
  });

  it("flags unknown commands", () => {
    expect(parseCommand("dance")).toEqual({ kind: "invalid", message: "Unknown command. Type: help" });
  });
});
