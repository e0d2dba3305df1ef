import { afterEach, describe, expect, it, vi } from "vitest";
import {
  RefreshCancelledError,
  RefreshTimeoutError,
} from "../src/dataset/errors";
import { untilAborted, withDeadline } from "../src/utility/deadline";

describe("withDeadline", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves with the work result", async () => {
    await expect(
      withDeadline(async () => "done", { timeoutMs: 100 })
    ).resolves.toBe("done");
  });

  it("passes work failures through", async () => {
    await expect(
      withDeadline(async () => {
        throw new Error("controller said no");
      }, { timeoutMs: 100 })
    ).rejects.toThrow("controller said no");
  });

  it("aborts the work signal on timeout", async () => {
    vi.useFakeTimers();
    let workSignal: AbortSignal | undefined;
    const result = withDeadline(
      (signal) => {
        workSignal = signal;
        return new Promise<string>(() => undefined);
      },
      { timeoutMs: 250 }
    );

    vi.advanceTimersByTime(250);

    await expect(result).rejects.toThrow("Refresh did not complete within 250 ms");
    expect(workSignal?.aborted).toBe(true);
    expect(workSignal?.reason).toBeInstanceOf(RefreshTimeoutError);
  });

  it("rejects at once when the caller signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    let started = false;

    await expect(
      withDeadline(
        async () => {
          started = true;
          return "late";
        },
        { timeoutMs: 100, signal: controller.signal }
      )
    ).rejects.toBeInstanceOf(RefreshCancelledError);
    expect(started).toBe(false);
  });

  it("clears its timer once the work settles", async () => {
    vi.useFakeTimers();
    await withDeadline(async () => 1, { timeoutMs: 1000 });
    expect(vi.getTimerCount()).toBe(0);
  });
});

describe("untilAborted", () => {
  it("returns the shared promise when no signal is given", async () => {
    const shared = Promise.resolve(7);
    expect(untilAborted(shared)).toBe(shared);
  });

  it("rejects for this caller only and leaves the shared promise running", async () => {
    let finish: (value: string) => void = () => undefined;
    const shared = new Promise<string>((resolve) => {
      finish = resolve;
    });
    const controller = new AbortController();

    const cancelled = untilAborted(shared, controller.signal);
    const other = untilAborted(shared, new AbortController().signal);
    controller.abort();

    await expect(cancelled).rejects.toBeInstanceOf(RefreshCancelledError);
    finish("done");
    await expect(other).resolves.toBe("done");
  });

  it("rejects at once for an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      untilAborted(Promise.resolve(1), controller.signal)
    ).rejects.toBeInstanceOf(RefreshCancelledError);
  });
});
