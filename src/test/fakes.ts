/**
 * In-process stand-ins for the container runtime, the host and external
 * commands. Nothing here touches Docker, the network or the VPN client.
 */

import { defaultConfig, mergeConfig, type ConfigFile, type EngineConfig } from "../config/config";
import type { CommandOptions, CommandResult, CommandRunner } from "../execution/executor";
import type { HostProbe, PortOwner, VpnProbe } from "../host/hostProbe";
import { parseHealthFromStatus } from "../runtime/parse";
import type {
  ComposeOptions,
  ContainerRuntime,
  ContainerState,
  ContainerSummary,
} from "../runtime/types";
import { RuntimeCommandError } from "../utils/errors";
import { Logger, MemorySink } from "../utils/logger";

export const TEST_ROOT = "/tmp/devstack-test";

export function testConfig(
  overrides: ConfigFile = {},
  projectRoot = TEST_ROOT,
): EngineConfig {
  return mergeConfig(defaultConfig(projectRoot), {
    ...overrides,
    timeouts: {
      healthMs: 50,
      healthIntervalMs: 5,
      restartDelayMs: 0,
      ...overrides.timeouts,
    },
  });
}

export function testLogger(): { logger: Logger; user: MemorySink; file: MemorySink } {
  const user = new MemorySink();
  const file = new MemorySink();
  const logger = new Logger({
    userSink: user,
    fileSink: file,
    now: () => new Date("2024-05-01T10:20:30Z"),
  });
  return { logger, user, file };
}

export type FakeContainer = {
  id: string;
  name: string;
  image: string;
  labels: Record<string, string>;
  port: number;
  status: string; // running, exited, created...
  health?: string; // healthy, unhealthy, starting
};

export type ComposeCall = { args: string[]; env?: Record<string, string> };

export class FakeRuntime implements ContainerRuntime {
  readonly containers = new Map<string, FakeContainer>();
  readonly calls: string[] = [];
  readonly composeCalls: ComposeCall[] = [];
  readonly execOutput = new Map<string, string>();
  /** "operation:target" -> error message, e.g. "stop:web" or "compose:pull" */
  readonly failures = new Map<string, string>();

  add(container: Partial<FakeContainer> & { name: string }): this {
    this.containers.set(container.name, {
      id: `id-${container.name}`,
      image: "example/image:latest",
      labels: {},
      port: 0,
      status: "running",
      ...container,
    });
    return this;
  }

  fail(operation: string, target: string, message = "boom"): this {
    this.failures.set(`${operation}:${target}`, message);
    return this;
  }

  async ping(): Promise<void> {
    this.check("ping", "daemon");
  }

  async listContainers(): Promise<ContainerSummary[]> {
    this.check("list", "containers");
    return [...this.containers.values()].map((container) => {
      const status =
        container.status === "running"
          ? `Up 1 minute${container.health ? ` (${container.health === "starting" ? "health: starting" : container.health})` : ""}`
          : "Exited (0) 1 minute ago";
      return {
        id: container.id,
        name: container.name,
        image: container.image,
        state: container.status,
        status,
        health: parseHealthFromStatus(status),
        labels: container.labels,
        firstPort: container.port,
      };
    });
  }

  async inspectState(name: string): Promise<ContainerState | null> {
    this.check("inspect", name);
    const container = this.containers.get(name);
    if (!container) return null;
    return {
      status: container.status,
      running: container.status === "running",
      health: container.health,
    };
  }

  async stop(name: string, graceSeconds: number): Promise<void> {
    this.check("stop", name, `stop ${name} -t ${graceSeconds}`);
    this.setStatus(name, "exited");
  }

  async start(name: string): Promise<void> {
    this.check("start", name);
    this.setStatus(name, "running");
  }

  async kill(name: string): Promise<void> {
    this.check("kill", name);
    this.setStatus(name, "exited");
  }

  async remove(name: string): Promise<void> {
    this.check("remove", name);
    this.containers.delete(name);
  }

  async exec(name: string, command: readonly string[]): Promise<string> {
    this.check("exec", name, `exec ${name} ${command.join(" ")}`);
    const output = this.execOutput.get(name);
    if (output === undefined) {
      throw new RuntimeCommandError("exec", name, "container is not running");
    }
    return output;
  }

  async backupVolume(volume: string, hostDir: string): Promise<void> {
    this.check("backup", volume, `backup ${volume} -> ${hostDir}`);
  }

  async copyInto(source: string, container: string, destDir: string): Promise<void> {
    this.check("copy", container, `copy ${source} -> ${container}:${destDir}`);
  }

  async compose(
    args: readonly string[],
    options: ComposeOptions,
  ): Promise<CommandResult> {
    this.calls.push(`compose ${args.join(" ")}`);
    this.composeCalls.push({ args: [...args], env: options.env });

    const failure = this.failures.get(`compose:${args[0]}`);
    if (failure !== undefined) {
      return { success: false, exitCode: 1, stdout: "", stderr: failure };
    }

    if (args[0] === "down") {
      for (const container of this.containers.values()) container.status = "exited";
    } else if (args[0] === "up") {
      for (const container of this.containers.values()) container.status = "running";
    }
    return { success: true, exitCode: 0, stdout: "", stderr: "" };
  }

  private check(operation: string, target: string, call = `${operation} ${target}`): void {
    this.calls.push(call);
    const failure = this.failures.get(`${operation}:${target}`);
    if (failure !== undefined) {
      throw new RuntimeCommandError(operation, target, failure);
    }
  }

  private setStatus(name: string, status: string): void {
    const container = this.containers.get(name);
    if (container) container.status = status;
  }
}

export class FakeHostProbe implements HostProbe {
  readonly busyPorts = new Set<number>();
  readonly owners = new Map<number, PortOwner>();
  vpn: VpnProbe = { kind: "absent" };
  vpnIp: string | null = null;
  primary: string | null = null;

  async isPortFree(port: number): Promise<boolean> {
    return !this.busyPorts.has(port);
  }

  async findPortOwner(port: number): Promise<PortOwner> {
    return this.owners.get(port) ?? {};
  }

  async vpnStatus(): Promise<VpnProbe> {
    return this.vpn;
  }

  async vpnAddress(): Promise<string | null> {
    return this.vpnIp;
  }

  primaryAddress(): string | null {
    return this.primary;
  }
}

/**
 * CommandRunner answering from a table keyed by "file arg1 arg2...".
 * Unknown commands fail with exit code 1.
 */
export function recordingRunner(
  responses: Record<string, Partial<CommandResult>> = {},
): { run: CommandRunner; calls: Array<{ command: string; options?: CommandOptions }> } {
  const calls: Array<{ command: string; options?: CommandOptions }> = [];

  const run: CommandRunner = async (file, args, options) => {
    const command = [file, ...args].join(" ");
    calls.push({ command, options });
    const response = responses[command];
    return {
      success: response?.success ?? response !== undefined,
      exitCode: response?.exitCode ?? (response ? 0 : 1),
      stdout: response?.stdout ?? "",
      stderr: response?.stderr ?? "",
      spawnError: response?.spawnError,
    };
  };

  return { run, calls };
}
