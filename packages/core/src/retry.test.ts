import { describe, it, expect, vi } from "vitest";
import { ProviderError, ProviderErrorKind } from "@gpufleet/adapters-common";
import { ConfigurationError } from "./errors";
import { DEFAULT_RETRY_POLICY, RetryExecutor, backoffDelay, parseRetryPolicy } from "./retry";
import { createFakeClock } from "./__tests__/fixtures";

function failing(kind: ProviderErrorKind) {
  return new ProviderError(`simulated ${kind}`, kind);
}

/** Operation that fails with the given kinds in order, then resolves "done" */
function scripted(...kinds: ProviderErrorKind[]) {
  let call = 0;
  return vi.fn(async (): Promise<string> => {
    const kind = kinds[call++];
    if (kind !== undefined) throw failing(kind);
    return "done";
  });
}

describe("backoffDelay", () => {
  const policy = parseRetryPolicy({ baseDelayMs: 100, multiplier: 2, maxDelayMs: 30_000, jitter: 0 });

  it("grows exponentially without jitter", () => {
    expect([1, 2, 3, 4].map((attempt) => backoffDelay(attempt, policy))).toEqual([100, 200, 400, 800]);
  });

  it("adds at most the jitter fraction", () => {
    const jittered = { ...policy, jitter: 0.2 };
    const delays = [1, 2, 3, 4].map((attempt) => backoffDelay(attempt, jittered, () => 0.5));
    [110, 220, 440, 880].forEach((expected, index) => {
      expect(delays[index]).toBeCloseTo(expected);
    });
  });

  it("caps the delay", () => {
    const capped = { ...policy, maxDelayMs: 250 };
    expect(backoffDelay(3, capped)).toBe(250);
  });
});

describe("parseRetryPolicy", () => {
  it("fills defaults", () => {
    expect(DEFAULT_RETRY_POLICY).toEqual({
      maxAttempts: 5,
      baseDelayMs: 1000,
      multiplier: 2,
      maxDelayMs: 30000,
      jitter: 0.2,
    });
  });

  it("rejects an invalid policy", () => {
    expect(() => parseRetryPolicy({ maxAttempts: 0 })).toThrow(ConfigurationError);
    expect(() => parseRetryPolicy({ jitter: 1.5 })).toThrow(ConfigurationError);
  });
});

describe("RetryExecutor", () => {
  function createExecutor(policy = {}) {
    const clock = createFakeClock();
    const log = vi.fn();
    const executor = new RetryExecutor({
      policy: { baseDelayMs: 100, jitter: 0, ...policy },
      sleep: clock.sleep,
      random: () => 0,
      log,
    });
    return { executor, clock, log };
  }

  it("returns the value of a successful first attempt", async () => {
    const { executor, clock } = createExecutor();

    await expect(executor.execute(async () => 42)).resolves.toEqual({ ok: true, value: 42, attempts: 1 });
    expect(clock.delays).toEqual([]);
  });

  it("tries exactly maxAttempts times before giving up", async () => {
    const { executor, clock } = createExecutor();
    const operation = scripted(...Array<ProviderErrorKind>(10).fill(ProviderErrorKind.UNAVAILABLE));

    const result = await executor.execute(operation);

    expect(operation).toHaveBeenCalledTimes(5);
    expect(result).toMatchObject({ ok: false, attempts: 5 });
    expect(result.ok ? undefined : result.error.kind).toBe(ProviderErrorKind.UNAVAILABLE);
    expect(clock.delays).toEqual([100, 200, 400, 800]);
  });

  it("succeeds on the third attempt after two rate limits", async () => {
    const { executor, clock, log } = createExecutor();
    const operation = scripted(ProviderErrorKind.RATE_LIMITED, ProviderErrorKind.RATE_LIMITED);

    const result = await executor.execute(operation, undefined, "[gpu-a] create");

    expect(result).toEqual({ ok: true, value: "done", attempts: 3 });
    expect(clock.delays).toEqual([100, 200]);
    expect(log).toHaveBeenCalledTimes(2);
    expect(log).toHaveBeenNthCalledWith(
      1,
      "[gpu-a] create failed (RateLimited: simulated RateLimited), attempt 1/5; retrying in 100ms",
      "stderr"
    );
  });

  it.each([
    ProviderErrorKind.UNAUTHORIZED,
    ProviderErrorKind.INVALID_ARGUMENT,
    ProviderErrorKind.UNKNOWN,
  ])("does not retry %s", async (kind) => {
    const { executor, clock } = createExecutor();
    const operation = scripted(kind);

    const result = await executor.execute(operation);

    expect(operation).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({ ok: false, attempts: 1 });
    expect(clock.delays).toEqual([]);
  });

  it("retries a conflict once", async () => {
    const { executor } = createExecutor();
    const operation = scripted(ProviderErrorKind.CONFLICT, ProviderErrorKind.CONFLICT);

    const result = await executor.execute(operation);

    expect(operation).toHaveBeenCalledTimes(2);
    expect(result.ok ? undefined : result.error.kind).toBe(ProviderErrorKind.CONFLICT);
  });

  it("recovers from a single conflict", async () => {
    const { executor } = createExecutor();

    await expect(executor.execute(scripted(ProviderErrorKind.CONFLICT))).resolves.toEqual({
      ok: true,
      value: "done",
      attempts: 2,
    });
  });

  it("classifies errors that are not ProviderErrors", async () => {
    const { executor } = createExecutor();
    const networkError = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
    const operation = vi.fn().mockRejectedValueOnce(networkError).mockResolvedValueOnce("ok");

    await expect(executor.execute(operation)).resolves.toEqual({ ok: true, value: "ok", attempts: 2 });
  });

  it("applies per-call policy overrides", async () => {
    const { executor, clock } = createExecutor();
    const operation = scripted(ProviderErrorKind.UNAVAILABLE, ProviderErrorKind.UNAVAILABLE);

    const result = await executor.execute(operation, { maxAttempts: 2 });

    expect(result).toMatchObject({ ok: false, attempts: 2 });
    expect(clock.delays).toEqual([100]);
  });

  it("passes the attempt number to the operation", async () => {
    const { executor } = createExecutor();
    const seen: number[] = [];

    await executor.execute(async (attempt) => {
      seen.push(attempt);
      if (attempt < 3) throw failing(ProviderErrorKind.UNAVAILABLE);
      return attempt;
    });

    expect(seen).toEqual([1, 2, 3]);
  });
});
