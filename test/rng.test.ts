import { describe, it, expect } from "vitest";
import { createRng, sampleWithoutReplacement } from "../src/engine";
import { hashStringToUint32 } from "../src/engine/rng";

describe("rng", () => {
  it("hashStringToUint32 is FNV-1a 32-bit", () => {
    expect(hashStringToUint32("")).toBe(0x811c9dc5);
    expect(hashStringToUint32("a")).toBe(0xe40c292c);
  });

  it("createRng(1) yields the first xorshift32 step", () => {
    const rng = createRng(1);
    expect(rng()).toBe(270369 / 0x100000000);
  });

  it("seed 0 is replaced with a non-zero seed", () => {
    const a = createRng(0);
    const b = createRng(0x6d2b79f5);
    expect([a(), a(), a()]).toEqual([b(), b(), b()]);
  });

  it("same seed gives the same stream and values stay in [0, 1)", () => {
    const a = createRng("level-1");
    const b = createRng("level-1");
    for (let i = 0; i < 100; i++) {
      const v = a();
      expect(v).toBe(b());
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});

describe("sampleWithoutReplacement", () => {
  it("returns distinct items and does not mutate the input", () => {
    const items = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];
    const picked = sampleWithoutReplacement(items, 4, createRng(3));

    expect(picked).toHaveLength(4);
    expect(new Set(picked).size).toBe(4);
    for (const p of picked) expect(items).toContain(p);
    expect(items).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it("sampling everything is a permutation", () => {
    const picked = sampleWithoutReplacement(["a", "b", "c"], 3, createRng(9));
    expect([...picked].sort()).toEqual(["a", "b", "c"]);
  });

  it("count 0 gives an empty sample", () => {
    expect(sampleWithoutReplacement([1, 2], 0, createRng(1))).toEqual([]);
  });

  it("throws when asked for more than the pool holds", () => {
    expect(() => sampleWithoutReplacement([1, 2], 3, createRng(1))).toThrow(
      "Cannot sample 3 items from a pool of 2."
    );
  });
});
