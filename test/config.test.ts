import { describe, it, expect } from "vitest";
import { envFlag, envInt, loadServerConfig } from "../src/server/config";

describe("server config", () => {
  it("uses the defaults for an empty environment", () => {
    expect(loadServerConfig({})).toEqual({
      port: 8787,
      defaults: { rows: 10, cols: 10, mineCount: 10, treasureCount: 1 },
      quiet: false,
    });
  });

  it("reads MINEHUNT_* variables", () => {
    const config = loadServerConfig({
      MINEHUNT_WS_PORT: "9000",
      MINEHUNT_ROWS: "8",
      MINEHUNT_COLS: "12",
      MINEHUNT_MINES: "15",
      MINEHUNT_TREASURES: "2",
      MINEHUNT_PERSIST_DIR: " /tmp/minehunt ",
      MINEHUNT_SEED: "s1",
      MINEHUNT_QUIET: "yes",
    });
    expect(config).toEqual({
      port: 9000,
      defaults: { rows: 8, cols: 12, mineCount: 15, treasureCount: 2 },
      persistenceDir: "/tmp/minehunt",
      seed: "s1",
      quiet: true,
    });
  });

  it("falls back to defaults for unparseable numbers", () => {
    const config = loadServerConfig({ MINEHUNT_ROWS: "abc", MINEHUNT_COLS: "7.5", MINEHUNT_WS_PORT: "" });
    expect(config.defaults.rows).toBe(10);
    expect(config.defaults.cols).toBe(10);
    expect(config.port).toBe(8787);
  });

  it("envFlag and envInt", () => {
    expect(envFlag({ A: "on" }, "A")).toBe(true);
    expect(envFlag({ A: "0" }, "A", true)).toBe(false);
    expect(envFlag({}, "A", true)).toBe(true);
    expect(envInt({ N: " 42 " }, "N", 1)).toBe(42);
    expect(envInt({}, "N", 1)).toBe(1);
  });
});
