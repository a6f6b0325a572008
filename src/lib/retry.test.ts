import { afterEach, describe, expect, it, vi } from "vitest";
import { FetchError } from "../errors.js";
import { withRetry, withTimeout } from "./retry.js";

describe("withRetry", () => {
  it("retries transient failures with exponential backoff", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new FetchError("503", { transient: true }))
      .mockRejectedValueOnce(new FetchError("503", { transient: true }))
      .mockResolvedValueOnce("ok");

    await expect(withRetry(fn, { attempts: 3, baseDelayMs: 100, sleep })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[100], [200]]);
  });

  it("does not retry permanent errors", async () => {
    const error = new FetchError("404", { transient: false });
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(error);

    await expect(withRetry(fn, { attempts: 3, baseDelayMs: 0 })).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("rethrows the last error once attempts run out", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new FetchError("503", { transient: true }));

    await expect(withRetry(fn, { attempts: 2, baseDelayMs: 50, sleep })).rejects.toThrow("503");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[50]]);
  });

  it("stops retrying once the signal is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new FetchError("503", { transient: true }));

    await expect(withRetry(fn, { attempts: 3, baseDelayMs: 0, signal: controller.signal })).rejects.toThrow("503");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("uses a custom retry predicate", async () => {
    const fn = vi
      .fn<() => Promise<number>>()
      .mockRejectedValueOnce(new Error("flaky"))
      .mockResolvedValueOnce(7);

    await expect(withRetry(fn, { attempts: 2, baseDelayMs: 0, shouldRetry: () => true })).resolves.toBe(7);
  });
});

describe("withTimeout", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves with the value when the promise settles first", async () => {
    await expect(withTimeout(Promise.resolve(5), 1000, "fast call")).resolves.toBe(5);
  });

  it("rejects with a TimeoutError when the timer fires first", async () => {
    vi.useFakeTimers();
    const pending = withTimeout(new Promise<never>(() => {}), 1000, "slow call");
    const assertion = expect(pending).rejects.toMatchObject({
      name: "TimeoutError",
      message: "slow call timed out after 1000ms",
    });

    await vi.advanceTimersByTimeAsync(1000);
    await assertion;
  });
});
