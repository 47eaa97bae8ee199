import { describe, it, expect, beforeEach, afterEach } from "vitest";
import os from "os";
import path from "path";
import fs from "fs-extra";
import { ConfigurationError } from "@gpufleet/core";
import { loadFleetConfig, selectInstanceNames } from "./config";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "gpufleet-config-"));
});

afterEach(async () => {
  await fs.remove(dir);
});

async function writeEnv(file: string, lines: string[]): Promise<string> {
  const envPath = path.join(dir, file);
  await fs.outputFile(envPath, lines.join("\n"));
  return envPath;
}

describe("loadFleetConfig", () => {
  it("reads the default .env file in the working directory", async () => {
    await writeEnv(".env", ["GCP_PROJECT=test-project", "INSTANCE_NAMES=gpu-a", "ZONE=us-central1-a"]);

    const loaded = await loadFleetConfig({ env: {}, cwd: dir });

    expect(loaded.config.projectId).toBe("test-project");
    expect(loaded.config.zone).toBe("us-central1-a");
    expect(loaded.envFile).toBe(path.join(dir, ".env"));
    expect(Object.isFrozen(loaded.config)).toBe(true);
  });

  it("lets the process environment override file values", async () => {
    await writeEnv(".env", ["GCP_PROJECT=test-project", "INSTANCE_NAMES=gpu-a", "MACHINE_TYPE=n1-standard-8"]);

    const loaded = await loadFleetConfig({
      env: { MACHINE_TYPE: "n1-highmem-8", INSTANCE_NAMES: "" },
      cwd: dir,
    });

    expect(loaded.config.machineType).toBe("n1-highmem-8");
    expect(loaded.config.instanceNames).toEqual(["gpu-a"]);
  });

  it("works from the environment alone when no .env exists", async () => {
    const loaded = await loadFleetConfig({
      env: { GCP_PROJECT: "test-project", INSTANCE_NAMES: "gpu-a" },
      cwd: dir,
    });

    expect(loaded.envFile).toBeUndefined();
    expect(loaded.config.instanceNames).toEqual(["gpu-a"]);
  });

  it("fails when an explicit env file is missing", async () => {
    await expect(loadFleetConfig({ envFile: "fleet.env", env: {}, cwd: dir })).rejects.toThrow(
      `Environment file not found: ${path.join(dir, "fleet.env")}`
    );
  });

  it("reads metadata files relative to the env file", async () => {
    const envPath = await writeEnv("config/fleet.env", [
      "GCP_PROJECT=test-project",
      "INSTANCE_NAMES=gpu-a",
      "SSH_KEY_PATH=keys/ssh-keys.txt",
      "STARTUP_SCRIPT=startup.sh",
    ]);
    await fs.outputFile(path.join(dir, "config/keys/ssh-keys.txt"), "ubuntu:ssh-ed25519 AAAA test\n");
    await fs.outputFile(path.join(dir, "config/startup.sh"), "#!/bin/bash\nnvidia-smi\n");

    const loaded = await loadFleetConfig({ envFile: envPath, env: {}, cwd: "/" });

    expect(loaded.metadata).toEqual({
      sshKeys: "ubuntu:ssh-ed25519 AAAA test\n",
      startupScript: "#!/bin/bash\nnvidia-smi\n",
    });
    expect(loaded.config.startupScriptPath).toBe(path.join(dir, "config/startup.sh"));
  });

  it("lists every referenced file that is missing", async () => {
    await writeEnv(".env", [
      "GCP_PROJECT=test-project",
      "INSTANCE_NAMES=gpu-a",
      "STARTUP_SCRIPT=startup.sh",
      "GOOGLE_APPLICATION_CREDENTIALS=key.json",
    ]);

    const error = await loadFleetConfig({ env: {}, cwd: dir }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      issues: [
        `STARTUP_SCRIPT: file not found: ${path.join(dir, "startup.sh")}`,
        `GOOGLE_APPLICATION_CREDENTIALS: file not found: ${path.join(dir, "key.json")}`,
      ],
    });
  });
});

describe("selectInstanceNames", () => {
  it("selects every instance by default and deduplicates names", async () => {
    const loaded = await loadFleetConfig({
      env: { GCP_PROJECT: "test-project", INSTANCE_NAMES: "gpu-a gpu-b" },
      cwd: dir,
    });

    expect(selectInstanceNames(loaded.config, [])).toEqual(["gpu-a", "gpu-b"]);
    expect(selectInstanceNames(loaded.config, ["gpu-b", "gpu-b"])).toEqual(["gpu-b"]);
    expect(() => selectInstanceNames(loaded.config, ["gpu-c"])).toThrow(ConfigurationError);
  });
});
