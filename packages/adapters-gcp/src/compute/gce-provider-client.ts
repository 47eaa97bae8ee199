import { InstancesClient } from "@google-cloud/compute";
import type { protos } from "@google-cloud/compute";
import {
  ProviderError,
  ProviderErrorKind,
  classifyProviderError,
  isNotFoundError,
  sanitizeLabels,
} from "@gpufleet/adapters-common";
import type {
  Accepted,
  InstancePhase,
  InstanceSpec,
  LogCallback,
  ObservedState,
  ProviderClient,
} from "@gpufleet/adapters-common";

type IInstance = protos.google.cloud.compute.v1.IInstance;

/** The InstancesClient calls the provider makes. */
export type ComputeInstancesApi = Pick<InstancesClient, "get" | "insert" | "start" | "stop" | "delete">;

export interface GceProviderClientConfig {
  projectId: string;
  zone: string;
  keyFilename?: string;
}

const PHASES_BY_STATUS: Record<string, InstancePhase> = {
  PROVISIONING: "PROVISIONING",
  STAGING: "PROVISIONING",
  REPAIRING: "PROVISIONING",
  RUNNING: "RUNNING",
  STOPPING: "STOPPING",
  SUSPENDING: "STOPPING",
  STOPPED: "STOPPED",
  SUSPENDED: "STOPPED",
  TERMINATED: "STOPPED",
  DELETING: "DELETING",
};

/**
 * Map a Compute Engine instance status onto a lifecycle phase.
 * Unrecognised statuses are reported as ERROR.
 */
export function toInstancePhase(status: string | null | undefined): InstancePhase {
  if (!status) return "ERROR";
  return PHASES_BY_STATUS[status] ?? "ERROR";
}

/**
 * Build the Compute Engine instance resource for a spec.
 *
 * GPU instances cannot live-migrate, so host maintenance always terminates
 * them; standard instances restart automatically afterwards, preemptible
 * ones never do.
 */
export function buildInstanceResource(spec: InstanceSpec): IInstance {
  const metadataItems: protos.google.cloud.compute.v1.IItems[] = [];
  if (spec.metadata.sshKeys) {
    metadataItems.push({ key: "ssh-keys", value: spec.metadata.sshKeys });
  }
  if (spec.metadata.startupScript) {
    metadataItems.push({ key: "startup-script", value: spec.metadata.startupScript });
  }

  return {
    name: spec.name,
    machineType: `zones/${spec.zone}/machineTypes/${spec.machineType}`,
    description: "gpufleet managed GPU instance",
    disks: [
      {
        boot: true,
        autoDelete: true,
        initializeParams: {
          sourceImage: `projects/${spec.image.project}/global/images/family/${spec.image.family}`,
          diskSizeGb: String(spec.bootDiskSizeGb),
          diskType: `zones/${spec.zone}/diskTypes/pd-standard`,
        },
      },
    ],
    networkInterfaces: [
      {
        network: "global/networks/default",
        accessConfigs: [
          {
            name: "External NAT",
            type: "ONE_TO_ONE_NAT",
            natIP: spec.networkAddress,
          },
        ],
      },
    ],
    guestAccelerators:
      spec.accelerator.count > 0
        ? [
            {
              acceleratorType: `zones/${spec.zone}/acceleratorTypes/${spec.accelerator.type}`,
              acceleratorCount: spec.accelerator.count,
            },
          ]
        : undefined,
    scheduling: spec.preemptible
      ? { preemptible: true, automaticRestart: false, onHostMaintenance: "TERMINATE" }
      : { preemptible: false, automaticRestart: true, onHostMaintenance: "TERMINATE" },
    metadata: metadataItems.length > 0 ? { items: metadataItems } : undefined,
    labels: sanitizeLabels({ ...spec.labels, "managed-by": "gpufleet" }),
  };
}

/**
 * Name of the zone operation returned by a mutating call, if any.
 */
function operationName(operation: unknown): string | undefined {
  if (typeof operation !== "object" || operation === null) return undefined;
  if (!("latestResponse" in operation)) return undefined;
  const latest = operation.latestResponse;
  if (typeof latest !== "object" || latest === null || !("name" in latest)) return undefined;
  return typeof latest.name === "string" ? latest.name : undefined;
}

/**
 * ProviderClient for Compute Engine instances in a single zone.
 * Wraps the @google-cloud/compute InstancesClient; mutating calls return as
 * soon as the zone operation is submitted.
 */
export class GceProviderClient implements ProviderClient {
  constructor(
    private readonly instancesClient: ComputeInstancesApi,
    private readonly project: string,
    private readonly zone: string,
    private readonly log: LogCallback = () => {}
  ) {}

  async describe(name: string): Promise<ObservedState | null> {
    this.log(`[gce] describe ${name}`, "stdout");
    try {
      const [instance] = await this.instancesClient.get({
        project: this.project,
        zone: this.zone,
        instance: name,
      });

      const networkInterface = instance.networkInterfaces?.[0];
      const status = instance.status ?? undefined;

      return {
        name,
        phase: toInstancePhase(status),
        observedAt: new Date(),
        providerStatus: status,
        machineType: instance.machineType?.split("/").pop(),
        internalIp: networkInterface?.networkIP ?? undefined,
        externalIp: networkInterface?.accessConfigs?.[0]?.natIP ?? undefined,
      };
    } catch (error) {
      if (isNotFoundError(error)) {
        return null;
      }
      throw classifyProviderError(error);
    }
  }

  async create(spec: InstanceSpec): Promise<Accepted> {
    if (spec.zone !== this.zone) {
      throw new ProviderError(
        `Instance ${spec.name} targets zone ${spec.zone} but this client manages ${this.zone}`,
        ProviderErrorKind.INVALID_ARGUMENT
      );
    }

    this.log(
      `[gce] insert ${spec.name} (${spec.machineType}, ${spec.accelerator.count}x ${spec.accelerator.type}${spec.preemptible ? ", preemptible" : ""})`,
      "stdout"
    );

    try {
      const [operation] = await this.instancesClient.insert({
        project: this.project,
        zone: this.zone,
        instanceResource: buildInstanceResource(spec),
      });
      return { operation: operationName(operation), submittedAt: new Date() };
    } catch (error) {
      throw classifyProviderError(error);
    }
  }

  async start(name: string): Promise<Accepted> {
    this.log(`[gce] start ${name}`, "stdout");
    try {
      const [operation] = await this.instancesClient.start({
        project: this.project,
        zone: this.zone,
        instance: name,
      });
      return { operation: operationName(operation), submittedAt: new Date() };
    } catch (error) {
      throw classifyProviderError(error);
    }
  }

  async stop(name: string): Promise<Accepted> {
    this.log(`[gce] stop ${name}`, "stdout");
    try {
      const [operation] = await this.instancesClient.stop({
        project: this.project,
        zone: this.zone,
        instance: name,
      });
      return { operation: operationName(operation), submittedAt: new Date() };
    } catch (error) {
      throw classifyProviderError(error);
    }
  }

  async delete(name: string): Promise<Accepted> {
    this.log(`[gce] delete ${name}`, "stdout");
    try {
      const [operation] = await this.instancesClient.delete({
        project: this.project,
        zone: this.zone,
        instance: name,
      });
      return { operation: operationName(operation), submittedAt: new Date() };
    } catch (error) {
      // Already gone: the deletion goal is met
      if (isNotFoundError(error)) {
        this.log(`[gce] ${name} already deleted`, "stdout");
        return { submittedAt: new Date() };
      }
      throw classifyProviderError(error);
    }
  }
}

/**
 * Create a GCE provider client, building the InstancesClient from a
 * service-account key file. Without one, Application Default Credentials are used.
 */
export function createGceProviderClient(config: GceProviderClientConfig, log?: LogCallback): GceProviderClient {
  const instancesClient = new InstancesClient(
    config.keyFilename
      ? { projectId: config.projectId, keyFilename: config.keyFilename }
      : { projectId: config.projectId }
  );
  return new GceProviderClient(instancesClient, config.projectId, config.zone, log);
}
