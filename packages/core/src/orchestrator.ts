import os from "os";
import { z } from "zod";
import { ProviderError, ProviderErrorKind } from "@gpufleet/adapters-common";
import type {
  Accepted,
  DesiredPhase,
  InstancePhase,
  InstanceSpec,
  LogCallback,
  ObservedState,
  ProviderClient,
} from "@gpufleet/adapters-common";
import { ConfigurationError } from "./errors";
import { actionSteps, expectedPhase, reconcile } from "./reconciler";
import type { Action, StepAction } from "./reconciler";
import { RetryExecutor } from "./retry";
import type { RetryPolicyInput } from "./retry";
import type { FailureKind, FleetReport, OperationResult } from "./report";
import {
  CONVERGENCE_POLL_INTERVAL_MS,
  CONVERGENCE_TIMEOUT_MS,
  MAX_CONCURRENCY,
} from "./constants/fleet-defaults";

const ConvergenceSchema = z.object({
  timeoutMs: z.number().min(0).default(CONVERGENCE_TIMEOUT_MS),
  pollIntervalMs: z.number().min(0).default(CONVERGENCE_POLL_INTERVAL_MS),
});

export type ConvergenceOptions = z.infer<typeof ConvergenceSchema>;

export interface FleetOrchestratorOptions {
  /** Maximum instance tasks in flight, clamped to [1, MAX_CONCURRENCY] */
  concurrency?: number;
  retryPolicy?: RetryPolicyInput;
  /** Poll until each instance reaches its target phase; false returns after submission */
  waitForConvergence?: false | Partial<ConvergenceOptions>;
  log?: LogCallback;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

export interface ApplyOptions {
  signal?: AbortSignal;
  /** When false, instances that do not exist are skipped instead of created */
  createIfAbsent?: boolean;
}

export type InstanceStatus =
  | { kind: "observed"; state: ObservedState }
  | { kind: "failed"; error: ProviderError }
  | { kind: "skipped"; reason: string };

/** Per-instance status in request order */
export type FleetStatus = Map<string, InstanceStatus>;

type PhaseWait =
  | { ok: true; phase: InstancePhase }
  | { ok: false; errorKind: FailureKind; reason: string };

function clampConcurrency(value: number): number {
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`Invalid concurrency: ${value}`);
  }
  return Math.min(Math.max(Math.floor(value), 1), MAX_CONCURRENCY);
}

export function defaultConcurrency(): number {
  return clampConcurrency(os.availableParallelism());
}

function assertUniqueNames(names: readonly string[]): void {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) duplicates.add(name);
    seen.add(name);
  }
  if (duplicates.size > 0) {
    throw new ConfigurationError(
      "Duplicate instance names",
      [...duplicates].map((name) => `${name} appears more than once`)
    );
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function describeAction(action: Action): string {
  switch (action.kind) {
    case "noop":
      return `no action: ${action.reason}`;
    case "recreate":
      return "recreate (instance in ERROR)";
    default:
      return action.kind;
  }
}

/**
 * Converges a fleet of instances on a desired phase.
 *
 * Each instance is handled by one task: describe, reconcile, submit the
 * action's provider calls through the retry executor, then optionally poll
 * until the instance reaches the expected phase. Tasks run through a bounded
 * pool; one instance's failure never affects another's.
 */
export class FleetOrchestrator {
  readonly concurrency: number;
  readonly convergence: Readonly<ConvergenceOptions> | false;
  private readonly retry: RetryExecutor;
  private readonly log: LogCallback;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(
    private readonly provider: ProviderClient,
    options: FleetOrchestratorOptions = {}
  ) {
    this.concurrency = options.concurrency === undefined
      ? defaultConcurrency()
      : clampConcurrency(options.concurrency);
    this.convergence = options.waitForConvergence === false
      ? false
      : Object.freeze(parseConvergence(options.waitForConvergence ?? {}));
    this.log = options.log ?? (() => {});
    this.sleep = options.sleep ?? sleep;
    this.now = options.now ?? Date.now;
    this.retry = new RetryExecutor({
      policy: options.retryPolicy,
      sleep: this.sleep,
      random: options.random,
      log: this.log,
    });
  }

  /**
   * Converge every spec on the desired phase.
   *
   * @throws ConfigurationError on duplicate names, before any provider call
   */
  async apply(
    specs: readonly InstanceSpec[],
    desired: DesiredPhase,
    options: ApplyOptions = {}
  ): Promise<FleetReport> {
    assertUniqueNames(specs.map((spec) => spec.name));
    const createIfAbsent = options.createIfAbsent ?? true;
    const startedAt = new Date(this.now());
    const completed = new Map<string, OperationResult>();

    this.log(`Applying ${desired} to ${specs.length} instance(s), concurrency ${this.concurrency}`, "stdout");

    const undispatched = await this.runPool(specs, options.signal, async (spec) => {
      completed.set(spec.name, await this.applyToInstance(spec, desired, createIfAbsent));
    });

    const results = new Map<string, OperationResult>();
    for (const spec of specs) {
      results.set(spec.name, completed.get(spec.name) ?? { outcome: "skipped", reason: "cancelled" });
    }

    return {
      desiredPhase: desired,
      results,
      cancelled: undispatched.length > 0,
      startedAt,
      finishedAt: new Date(this.now()),
    };
  }

  /**
   * Describe every named instance without mutating anything.
   * Not-found instances are reported as ABSENT.
   */
  async describeFleet(names: readonly string[], options: { signal?: AbortSignal } = {}): Promise<FleetStatus> {
    assertUniqueNames(names);
    const completed = new Map<string, InstanceStatus>();

    await this.runPool(names, options.signal, async (name) => {
      const result = await this.retry.execute(() => this.provider.describe(name), undefined, `[${name}] describe`);
      completed.set(
        name,
        result.ok
          ? { kind: "observed", state: result.value ?? this.absentState(name) }
          : { kind: "failed", error: result.error }
      );
    });

    const status: FleetStatus = new Map();
    for (const name of names) {
      status.set(name, completed.get(name) ?? { kind: "skipped", reason: "cancelled" });
    }
    return status;
  }

  /**
   * Run the worker over items with at most `concurrency` in flight.
   * Stops dispatching once the signal aborts; returns the undispatched items.
   */
  private async runPool<T>(
    items: readonly T[],
    signal: AbortSignal | undefined,
    worker: (item: T) => Promise<void>
  ): Promise<T[]> {
    const executing = new Set<Promise<void>>();
    let next = 0;

    while (next < items.length || executing.size > 0) {
      while (next < items.length && executing.size < this.concurrency && !signal?.aborted) {
        const item = items[next++];
        const task: Promise<void> = worker(item).finally(() => executing.delete(task));
        executing.add(task);
      }
      if (executing.size === 0) break;
      await Promise.race(executing);
    }

    if (next < items.length) {
      this.log(`Cancelled: ${items.length - next} instance(s) not dispatched`, "stderr");
    }
    return items.slice(next);
  }

  private async applyToInstance(
    spec: InstanceSpec,
    desired: DesiredPhase,
    createIfAbsent: boolean
  ): Promise<OperationResult> {
    try {
      return await this.converge(spec, desired, createIfAbsent);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.log(`[${spec.name}] unexpected error: ${reason}`, "stderr");
      return { outcome: "failed", reason, errorKind: ProviderErrorKind.UNKNOWN, attempts: 0 };
    }
  }

  private async converge(
    spec: InstanceSpec,
    desired: DesiredPhase,
    createIfAbsent: boolean
  ): Promise<OperationResult> {
    const name = spec.name;

    const observed = await this.retry.execute(() => this.provider.describe(name), undefined, `[${name}] describe`);
    if (!observed.ok) {
      this.log(`[${name}] describe failed: ${observed.error.message}`, "stderr");
      return {
        outcome: "failed",
        reason: `describe failed: ${observed.error.message}`,
        errorKind: observed.error.kind,
        attempts: observed.attempts,
      };
    }

    const currentPhase = observed.value?.phase ?? "ABSENT";
    const action = reconcile(spec, observed.value, desired);

    if (action.kind === "noop") {
      this.log(`[${name}] ${describeAction(action)}`, "stdout");
      return { outcome: "succeeded", action, attempts: 0, phase: currentPhase };
    }
    if (action.kind === "create" && !createIfAbsent) {
      this.log(`[${name}] skipped: instance does not exist`, "stdout");
      return { outcome: "skipped", reason: "instance does not exist" };
    }

    this.log(`[${name}] ${currentPhase} -> ${describeAction(action)}`, "stdout");

    const steps = actionSteps(action);
    let attempts = 0;
    for (const [index, step] of steps.entries()) {
      const submitted = await this.retry.execute(() => this.submit(step), undefined, `[${name}] ${step.kind}`);
      attempts += submitted.attempts;
      if (!submitted.ok) {
        this.log(`[${name}] ${step.kind} failed: ${submitted.error.message}`, "stderr");
        return {
          outcome: "failed",
          action,
          reason: `${step.kind} failed: ${submitted.error.message}`,
          errorKind: submitted.error.kind,
          attempts,
        };
      }

      // The create of a recreate must not race the delete
      if (index < steps.length - 1) {
        const deleted = await this.waitForPhase(name, "ABSENT", this.convergence || parseConvergence({}));
        if (!deleted.ok) {
          return { outcome: "failed", action, reason: deleted.reason, errorKind: deleted.errorKind, attempts };
        }
      }
    }

    const target = expectedPhase(action);
    if (!this.convergence || target === null) {
      return { outcome: "succeeded", action, attempts };
    }

    const converged = await this.waitForPhase(name, target, this.convergence);
    if (!converged.ok) {
      return { outcome: "failed", action, reason: converged.reason, errorKind: converged.errorKind, attempts };
    }
    this.log(`[${name}] reached ${converged.phase}`, "stdout");
    return { outcome: "succeeded", action, attempts, phase: converged.phase };
  }

  private submit(step: StepAction): Promise<Accepted> {
    switch (step.kind) {
      case "create":
        return this.provider.create(step.spec);
      case "start":
        return this.provider.start(step.name);
      case "stop":
        return this.provider.stop(step.name);
      case "delete":
        return this.provider.delete(step.name);
    }
  }

  /**
   * Poll until the instance reports `target`, enters ERROR, or the timeout
   * elapses. ERROR is tolerated while waiting for ABSENT.
   */
  private async waitForPhase(
    name: string,
    target: InstancePhase,
    convergence: Readonly<ConvergenceOptions>
  ): Promise<PhaseWait> {
    const deadline = this.now() + convergence.timeoutMs;

    while (true) {
      const result = await this.retry.execute(() => this.provider.describe(name), undefined, `[${name}] describe`);
      if (!result.ok) {
        return {
          ok: false,
          errorKind: result.error.kind,
          reason: `describe failed while waiting for ${target}: ${result.error.message}`,
        };
      }

      const phase = result.value?.phase ?? "ABSENT";
      if (phase === target) {
        return { ok: true, phase };
      }
      if (phase === "ERROR" && target !== "ABSENT") {
        return { ok: false, errorKind: "InstanceError", reason: `instance entered ERROR while waiting for ${target}` };
      }
      if (this.now() >= deadline) {
        return {
          ok: false,
          errorKind: "Timeout",
          reason: `timed out after ${convergence.timeoutMs}ms waiting for ${target} (last phase ${phase})`,
        };
      }

      this.log(`[${name}] ${phase}, waiting for ${target}`, "stdout");
      await this.sleep(convergence.pollIntervalMs);
    }
  }

  private absentState(name: string): ObservedState {
    return { name, phase: "ABSENT", observedAt: new Date(this.now()) };
  }
}

function parseConvergence(input: Partial<ConvergenceOptions>): ConvergenceOptions {
  const result = ConvergenceSchema.safeParse(input);
  if (!result.success) {
    throw ConfigurationError.fromIssues("Invalid convergence options", result.error.issues);
  }
  return result.data;
}
