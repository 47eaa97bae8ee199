import { ProviderError, ProviderErrorKind } from "@gpufleet/adapters-common";
import type {
  Accepted,
  InstancePhase,
  InstanceSpec,
  LogCallback,
  ObservedState,
  ProviderClient,
} from "@gpufleet/adapters-common";

export type SimulatedOperation = "describe" | "create" | "start" | "stop" | "delete";

export interface SimulatedProviderOptions {
  /** Number of describe calls that still report a transitional phase before it settles */
  settleAfter?: number;
  /** Artificial latency per call */
  latencyMs?: number;
  log?: LogCallback;
}

export interface SimulatedCall {
  operation: SimulatedOperation;
  name: string;
}

interface SimulatedInstance {
  spec?: InstanceSpec;
  phase: InstancePhase;
  /** Phase reached once the current transition settles */
  settlesTo?: InstancePhase;
  remainingDescribes: number;
}

interface ScriptedFailure {
  kind: ProviderErrorKind;
  times: number;
}

const TRANSITIONAL: ReadonlySet<InstancePhase> = new Set(["PROVISIONING", "STOPPING", "DELETING"]);

/**
 * Simulated Provider for Testing
 *
 * Keeps instances in memory and walks them through the same phases Compute
 * Engine reports. No API calls are made; failures can be scripted per
 * instance and operation.
 */
export class SimulatedProviderClient implements ProviderClient {
  readonly calls: SimulatedCall[] = [];
  /** Highest number of calls observed in flight at once */
  maxInFlight = 0;

  private readonly instances = new Map<string, SimulatedInstance>();
  private readonly failures = new Map<string, ScriptedFailure>();
  private readonly settleAfter: number;
  private readonly latencyMs: number;
  private readonly log: LogCallback;
  private inFlight = 0;
  private operationCounter = 0;

  constructor(options: SimulatedProviderOptions = {}) {
    this.settleAfter = options.settleAfter ?? 1;
    this.latencyMs = options.latencyMs ?? 0;
    this.log = options.log ?? (() => {});
  }

  /**
   * Place an instance directly in a settled phase. ABSENT removes it.
   */
  seed(name: string, phase: InstancePhase, spec?: InstanceSpec): this {
    if (phase === "ABSENT") {
      this.instances.delete(name);
    } else {
      this.instances.set(name, { spec, phase, remainingDescribes: 0 });
    }
    return this;
  }

  /**
   * Make the next `times` calls of `operation` on `name` fail with `kind`.
   */
  failNext(operation: SimulatedOperation, name: string, kind: ProviderErrorKind, times = 1): this {
    this.failures.set(`${operation}:${name}`, { kind, times });
    return this;
  }

  /** Current phase without advancing any transition */
  phaseOf(name: string): InstancePhase {
    return this.instances.get(name)?.phase ?? "ABSENT";
  }

  callsFor(operation: SimulatedOperation, name?: string): SimulatedCall[] {
    return this.calls.filter((call) => call.operation === operation && (name === undefined || call.name === name));
  }

  async describe(name: string): Promise<ObservedState | null> {
    return this.invoke("describe", name, () => {
      const instance = this.instances.get(name);
      if (!instance) return null;

      if (instance.settlesTo !== undefined) {
        if (instance.remainingDescribes > 0) {
          instance.remainingDescribes--;
        } else if (instance.settlesTo === "ABSENT") {
          this.instances.delete(name);
          return null;
        } else {
          instance.phase = instance.settlesTo;
          instance.settlesTo = undefined;
        }
      }

      return {
        name,
        phase: instance.phase,
        observedAt: new Date(),
        providerStatus: instance.phase,
        machineType: instance.spec?.machineType,
        externalIp: instance.spec?.networkAddress,
      };
    });
  }

  async create(spec: InstanceSpec): Promise<Accepted> {
    return this.invoke("create", spec.name, () => {
      if (this.instances.has(spec.name)) {
        throw new ProviderError(`The resource '${spec.name}' already exists`, ProviderErrorKind.CONFLICT);
      }
      this.instances.set(spec.name, this.transition({ spec, phase: "ABSENT", remainingDescribes: 0 }, "PROVISIONING", "RUNNING"));
      return this.accepted();
    });
  }

  async start(name: string): Promise<Accepted> {
    return this.invoke("start", name, () => {
      const instance = this.existing(name);
      if (instance.phase !== "RUNNING") {
        this.transition(instance, "PROVISIONING", "RUNNING");
      }
      return this.accepted();
    });
  }

  async stop(name: string): Promise<Accepted> {
    return this.invoke("stop", name, () => {
      const instance = this.existing(name);
      if (instance.phase !== "STOPPED") {
        this.transition(instance, "STOPPING", "STOPPED");
      }
      return this.accepted();
    });
  }

  async delete(name: string): Promise<Accepted> {
    return this.invoke("delete", name, () => {
      const instance = this.instances.get(name);
      if (instance && instance.phase !== "DELETING") {
        this.transition(instance, "DELETING", "ABSENT");
      }
      return this.accepted();
    });
  }

  private async invoke<T>(operation: SimulatedOperation, name: string, run: () => T): Promise<T> {
    this.calls.push({ operation, name });
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.latencyMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.latencyMs));
      }
      this.throwScriptedFailure(operation, name);
      if (operation !== "describe") {
        this.log(`[sim] ${operation} ${name}`, "stdout");
      }
      return run();
    } finally {
      this.inFlight--;
    }
  }

  private throwScriptedFailure(operation: SimulatedOperation, name: string): void {
    const key = `${operation}:${name}`;
    const failure = this.failures.get(key);
    if (!failure) return;

    failure.times--;
    if (failure.times <= 0) this.failures.delete(key);
    throw new ProviderError(`Simulated ${failure.kind} on ${operation} ${name}`, failure.kind);
  }

  private existing(name: string): SimulatedInstance {
    const instance = this.instances.get(name);
    if (!instance) {
      throw new ProviderError(`The resource '${name}' was not found`, ProviderErrorKind.INVALID_ARGUMENT);
    }
    return instance;
  }

  private transition(instance: SimulatedInstance, phase: InstancePhase, settlesTo: InstancePhase): SimulatedInstance {
    if (TRANSITIONAL.has(instance.phase)) {
      throw new ProviderError(`The resource is not ready (${instance.phase})`, ProviderErrorKind.CONFLICT);
    }
    instance.phase = phase;
    instance.settlesTo = settlesTo;
    instance.remainingDescribes = this.settleAfter;
    return instance;
  }

  private accepted(): Accepted {
    this.operationCounter++;
    return { operation: `operation-sim-${this.operationCounter}`, submittedAt: new Date() };
  }
}
