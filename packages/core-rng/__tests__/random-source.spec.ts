import { describe, expect, it } from "vitest";
import { CryptoRandomSource, FixedRandomSource, SeededRandomSource, draws, shuffle } from "../src";

describe("SeededRandomSource", () => {
  it("replays the same sequence for the same seed", () => {
    const a = new SeededRandomSource(12345);
    const b = new SeededRandomSource(12345);
    const seqA = Array.from({ length: 10 }, () => a.nextFloat());
    const seqB = Array.from({ length: 10 }, () => b.nextFloat());
    expect(seqA).toEqual(seqB);
    expect(seqA.every((v) => v >= 0 && v < 1)).toBe(true);
  });

  it("differs across seeds and survives a zero seed", () => {
    expect(new SeededRandomSource(1).nextFloat()).not.toBe(new SeededRandomSource(2).nextFloat());
    expect(new SeededRandomSource(0).nextFloat()).toBe(new SeededRandomSource(1).nextFloat());
  });

  it("keeps integer draws inside the inclusive range", () => {
    const source = new SeededRandomSource(99);
    const seen = new Set<number>();
    for (let i = 0; i < 2000; i++) {
      const value = source.nextInt(1, 6);
      expect(value).toBeGreaterThanOrEqual(1);
      expect(value).toBeLessThanOrEqual(6);
      seen.add(value);
    }
    expect(seen.size).toBe(6);
  });
});

describe("FixedRandomSource", () => {
  it("cycles its values and counts draws", () => {
    const source = new FixedRandomSource([0.1, 0.9]);
    expect([source.nextFloat(), source.nextFloat(), source.nextFloat()]).toEqual([0.1, 0.9, 0.1]);
    expect(source.consumed).toBe(3);
  });

  it("maps floats onto integer buckets", () => {
    const source = new FixedRandomSource([0, 0.999999]);
    expect(source.nextInt(0, 36)).toBe(0);
    expect(source.nextInt(0, 36)).toBe(36);
  });

  it("rejects values outside [0, 1)", () => {
    expect(() => new FixedRandomSource([])).toThrow("at least one value");
    expect(() => new FixedRandomSource([0.5, 1])).toThrow("index 1");
  });
});

describe("CryptoRandomSource", () => {
  it("draws within bounds", () => {
    const source = new CryptoRandomSource();
    for (let i = 0; i < 200; i++) {
      const f = source.nextFloat();
      expect(f >= 0 && f < 1).toBe(true);
      const n = source.nextInt(-3, 3);
      expect(n >= -3 && n <= 3).toBe(true);
    }
  });

  it("rejects an inverted range", () => {
    expect(() => new CryptoRandomSource().nextInt(5, 4)).toThrow("invalid integer range");
  });
});

describe("draws", () => {
  it("yields from the source lazily", () => {
    const iterator = draws(new FixedRandomSource([0.25, 0.5]));
    expect([iterator.next().value, iterator.next().value, iterator.next().value]).toEqual([0.25, 0.5, 0.25]);
  });
});

describe("shuffle", () => {
  it("permutes a copy without losing items", () => {
    const items = Array.from({ length: 20 }, (_, i) => i);
    const shuffled = shuffle(items, new SeededRandomSource(5));
    expect([...shuffled].sort((a, b) => a - b)).toEqual(items);
    expect(items[0]).toBe(0);
  });

  it("stops after the requested prefix", () => {
    const source = new FixedRandomSource([0]);
    const result = shuffle(["a", "b", "c", "d"], source, 2);
    expect(result).toEqual(["a", "b", "c", "d"]);
    expect(source.consumed).toBe(2);
  });
});
