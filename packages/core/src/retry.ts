import { z } from "zod";
import { ProviderError, ProviderErrorKind, classifyProviderError } from "@gpufleet/adapters-common";
import type { LogCallback } from "@gpufleet/adapters-common";
import { ConfigurationError } from "./errors";
import {
  DEFAULT_BACKOFF_MULTIPLIER,
  DEFAULT_BASE_DELAY_MS,
  DEFAULT_JITTER,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_MAX_DELAY_MS,
} from "./constants/fleet-defaults";

export const RetryPolicySchema = z.object({
  maxAttempts: z.number().int().min(1).default(DEFAULT_MAX_ATTEMPTS),
  baseDelayMs: z.number().min(0).default(DEFAULT_BASE_DELAY_MS),
  multiplier: z.number().min(1).default(DEFAULT_BACKOFF_MULTIPLIER),
  maxDelayMs: z.number().min(0).default(DEFAULT_MAX_DELAY_MS),
  jitter: z.number().min(0).max(1).default(DEFAULT_JITTER),
});

export type RetryPolicy = z.infer<typeof RetryPolicySchema>;
export type RetryPolicyInput = z.input<typeof RetryPolicySchema>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze(RetryPolicySchema.parse({}));

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: ProviderError; attempts: number };

export interface RetryExecutorOptions {
  policy?: RetryPolicyInput;
  sleep?: (ms: number) => Promise<void>;
  /** Source of r in [0, 1) for jitter */
  random?: () => number;
  log?: LogCallback;
}

// Conflicts are retried this many times before being surfaced
const CONFLICT_RETRIES = 1;

export function parseRetryPolicy(input: RetryPolicyInput = {}): RetryPolicy {
  const result = RetryPolicySchema.safeParse(input);
  if (!result.success) {
    throw ConfigurationError.fromIssues("Invalid retry policy", result.error.issues);
  }
  return Object.freeze(result.data);
}

/**
 * Delay before the attempt following failed attempt `attempt` (1-based).
 */
export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number = Math.random): number {
  const base = policy.baseDelayMs * Math.pow(policy.multiplier, attempt - 1);
  return Math.min(base * (1 + policy.jitter * random()), policy.maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Runs provider calls with exponential backoff.
 *
 * RateLimited and Unavailable failures are retried up to `maxAttempts` tries,
 * a Conflict is retried once, and every other kind is final on first failure.
 * `execute` never throws for operation failures; they come back as
 * `{ ok: false }` results carrying the classified error.
 */
export class RetryExecutor {
  readonly policy: RetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly log: LogCallback;

  constructor(options: RetryExecutorOptions = {}) {
    this.policy = parseRetryPolicy(options.policy);
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.log = options.log ?? (() => {});
  }

  /**
   * @param operation - Called once per attempt with the 1-based attempt number
   * @param policy - Per-call overrides of the executor's policy
   * @param description - Label used in retry log lines
   */
  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    policy?: Partial<RetryPolicy>,
    description = "operation"
  ): Promise<RetryResult<T>> {
    const effective = policy ? parseRetryPolicy({ ...this.policy, ...policy }) : this.policy;
    let attempt = 0;
    let conflicts = 0;

    while (true) {
      attempt++;
      try {
        const value = await operation(attempt);
        return { ok: true, value, attempts: attempt };
      } catch (caught) {
        const error = classifyProviderError(caught);

        if (error.kind === ProviderErrorKind.CONFLICT) {
          conflicts++;
        }
        const retryable = error.retryable
          || (error.kind === ProviderErrorKind.CONFLICT && conflicts <= CONFLICT_RETRIES);

        if (!retryable || attempt >= effective.maxAttempts) {
          return { ok: false, error, attempts: attempt };
        }

        const delay = backoffDelay(attempt, effective, this.random);
        this.log(
          `${description} failed (${error.kind}: ${error.message}), attempt ${attempt}/${effective.maxAttempts}; retrying in ${Math.round(delay)}ms`,
          "stderr"
        );
        await this.sleep(delay);
      }
    }
  }
}
