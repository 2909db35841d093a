import { describe, expect, it, vi } from "vitest";

import { runUntilQuota } from "./quotaPool.js";

const range = (n: number) => Array.from({ length: n }, (_, i) => i);

describe("runUntilQuota", () => {
  it("stops dispatching once the quota is met", async () => {
    const failing = new Set([2, 5, 8, 11, 14]);
    const task = vi.fn(async (i: number) => (failing.has(i) ? null : i));

    const outcome = await runUntilQuota(range(20), { quota: 10, workers: 1, task });

    expect(outcome).toEqual({
      successes: [0, 1, 3, 4, 6, 7, 9, 10, 12, 13],
      attempted: 14,
      failed: 4,
      abandoned: 0
    });
    expect(task).toHaveBeenCalledTimes(14);
  });

  it("returns a short list when the items run out", async () => {
    const outcome = await runUntilQuota(range(5), { quota: 3, workers: 2, task: async () => null });

    expect(outcome).toEqual({ successes: [], attempted: 5, failed: 5, abandoned: 0 });
  });

  it("counts a rejected task as a failure", async () => {
    const onFailure = vi.fn();

    const outcome = await runUntilQuota(["a", "b"], {
      quota: 2,
      workers: 1,
      task: async (item) => {
        if (item === "a") throw new Error("refused");
        return item;
      },
      onFailure
    });

    expect(outcome.successes).toEqual(["b"]);
    expect(onFailure).toHaveBeenCalledWith("a", new Error("refused"));
  });

  it("aborts and discards tasks still in flight", async () => {
    const aborted: string[] = [];
    const onSuccess = vi.fn();

    const outcome = await runUntilQuota(["fast", "slow1", "slow2"], {
      quota: 1,
      workers: 3,
      task: (item, signal) =>
        item === "fast"
          ? Promise.resolve(item)
          : new Promise<string | null>((resolve) => {
              signal.addEventListener("abort", () => {
                aborted.push(item);
                resolve(item);
              });
            }),
      onSuccess
    });

    expect(outcome).toEqual({ successes: ["fast"], attempted: 3, failed: 0, abandoned: 2 });
    expect(aborted).toEqual(["slow1", "slow2"]);
    expect(onSuccess).toHaveBeenCalledTimes(1);
    expect(onSuccess).toHaveBeenCalledWith("fast", 1);
  });

  it("never runs more than the worker count at once", async () => {
    let running = 0;
    let peak = 0;

    await runUntilQuota(range(12), {
      quota: 12,
      workers: 3,
      task: async (i) => {
        running += 1;
        peak = Math.max(peak, running);
        await new Promise((resolve) => setTimeout(resolve, 1 + (i % 3)));
        running -= 1;
        return i;
      }
    });

    expect(peak).toBe(3);
  });
});
