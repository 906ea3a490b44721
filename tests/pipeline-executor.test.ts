import { describe, expect, it, vi } from "vitest";
import { runBounded, Semaphore } from "../src/pipeline/executor";

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("Semaphore", () => {
  it("clamps invalid limits to one", () => {
    expect(new Semaphore(0).snapshot().limit).toBe(1);
    expect(new Semaphore(Number.NaN).snapshot().limit).toBe(1);
    expect(new Semaphore(3.7).snapshot().limit).toBe(3);
  });

  it("queues work beyond the limit", async () => {
    const semaphore = new Semaphore(1);
    let release = () => {};
    const first = semaphore.use(() => new Promise<void>((resolve) => { release = resolve; }));
    const second = semaphore.use(async () => "done");

    await delay(0);
    expect(semaphore.snapshot()).toEqual({ limit: 1, active: 1, queued: 1 });

    release();
    await first;
    await expect(second).resolves.toBe("done");
    expect(semaphore.snapshot()).toEqual({ limit: 1, active: 0, queued: 0 });
  });
});

describe("runBounded", () => {
  it("never exceeds the concurrency limit", async () => {
    let active = 0;
    let peak = 0;
    const items = Array.from({ length: 10 }, (_, index) => index);

    const run = await runBounded<number, number>({
      items,
      concurrency: 2,
      operation: async (item) => {
        active += 1;
        peak = Math.max(peak, active);
        await delay(5);
        active -= 1;
        return [item];
      }
    });

    expect(peak).toBe(2);
    expect(run.completed).toBe(10);
    expect(run.results).toEqual(items);
  });

  it("flattens results in item order regardless of completion order", async () => {
    const run = await runBounded<number, string>({
      items: [30, 1, 15],
      concurrency: 3,
      operation: async (ms, index) => {
        await delay(ms);
        return [`${index}a`, `${index}b`];
      }
    });

    expect(run.results).toEqual(["0a", "0b", "1a", "1b", "2a", "2b"]);
  });

  it("isolates failures and reports them", async () => {
    const onFailure = vi.fn();
    const run = await runBounded<string, string>({
      items: ["ok-1", "bad", "ok-2"],
      concurrency: 2,
      operation: async (item) => {
        if (item === "bad") throw new Error("boom");
        return [item];
      },
      onFailure
    });

    expect(run).toEqual({ results: ["ok-1", "ok-2"], completed: 2, failed: 1 });
    expect(onFailure).toHaveBeenCalledTimes(1);
    expect(onFailure.mock.calls[0]?.[0]).toBe("bad");
  });

  it("resolves immediately for an empty batch", async () => {
    const operation = vi.fn(async () => [1]);
    const run = await runBounded<number, number>({ items: [], concurrency: 4, operation });

    expect(run).toEqual({ results: [], completed: 0, failed: 0 });
    expect(operation).not.toHaveBeenCalled();
  });
});
