import { describe, it, expect } from "vitest";
import { chunk, mapWithConcurrency, sleep } from "../../src/pool";

function delay(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

describe("mapWithConcurrency", () => {
  it("returns results in input order regardless of completion order", async () => {
    // Arrange
    const items = [30, 5, 20, 1, 10];

    // Act
    const results = await mapWithConcurrency(items, 3, async (ms, i) => {
      await delay(ms);
      return `${i}:${ms}`;
    });

    // Assert
    expect(results).toEqual(["0:30", "1:5", "2:20", "3:1", "4:10"]);
  });

  it("never exceeds the concurrency limit", async () => {
    // Arrange
    let active = 0;
    let peak = 0;
    const items = Array.from({ length: 12 }, (_, i) => i);

    // Act
    await mapWithConcurrency(items, 4, async (i) => {
      active++;
      peak = Math.max(peak, active);
      await delay(i % 3);
      active--;
    });

    // Assert
    expect(peak).toBe(4);
  });

  it("stops scheduling new items after a failure and rejects with it", async () => {
    // Arrange
    const started: number[] = [];
    const items = [0, 1, 2, 3, 4, 5];

    // Act
    const run = mapWithConcurrency(items, 1, async (i) => {
      started.push(i);
      if (i === 2) throw new Error("item 2 failed");
      return i;
    });

    // Assert
    await expect(run).rejects.toThrow("item 2 failed");
    expect(started).toEqual([0, 1, 2]);
  });

  it("rejects immediately when the signal is already aborted", async () => {
    // Arrange
    const controller = new AbortController();
    controller.abort(new Error("stop"));

    // Act & Assert
    await expect(mapWithConcurrency([1, 2], 2, async (i) => i, { signal: controller.signal })).rejects.toThrow("stop");
  });

  it("returns an empty array for no items", async () => {
    // Act & Assert
    expect(await mapWithConcurrency([], 5, async (i: number) => i)).toEqual([]);
  });

  it("rejects a non-positive limit", async () => {
    // Act & Assert
    await expect(mapWithConcurrency([1], 0, async (i) => i)).rejects.toThrow(RangeError);
  });
});

describe("chunk", () => {
  it("splits into groups of at most the given size", () => {
    // Act & Assert
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it("returns no chunks for an empty list", () => {
    // Act & Assert
    expect(chunk([], 100)).toEqual([]);
  });
});

describe("sleep", () => {
  it("resolves after the delay", async () => {
    // Act & Assert
    await expect(sleep(1)).resolves.toBeUndefined();
  });

  it("rejects with the abort reason without waiting out the delay", async () => {
    // Arrange
    const controller = new AbortController();
    const started = Date.now();
    setTimeout(() => controller.abort(new Error("interrupted")), 5);

    // Act
    const run = sleep(60_000, controller.signal);

    // Assert
    await expect(run).rejects.toThrow("interrupted");
    expect(Date.now() - started).toBeLessThan(5_000);
  });

  it("rejects immediately for an already aborted signal", async () => {
    // Arrange
    const controller = new AbortController();
    controller.abort(new Error("stop"));

    // Act & Assert
    await expect(sleep(60_000, controller.signal)).rejects.toThrow("stop");
  });
});
