/**
 * Detection of what is already installed, and port-conflict analysis.
 *
 * Every call re-queries live state; nothing is cached between calls.
 */

import { findRole, type EngineConfig } from "../config/config";
import type { HostProbe } from "../host/hostProbe";
import { classifyContainerState } from "../runtime/parse";
import type { ContainerRuntime } from "../runtime/types";
import type {
  Detection,
  LifecycleState,
  PortConflict,
  PortMap,
  ServiceRecord,
} from "../types";
import { getErrorMessage } from "../utils/helpers";
import type { Logger } from "../utils/logger";

const SOURCE = "detector";

const ACTIVE_STATES: ReadonlySet<LifecycleState> = new Set([
  "starting",
  "running",
  "healthy",
  "unhealthy",
]);

/** True for every state in which a service holds its port */
export function isActiveState(state: LifecycleState): boolean {
  return ACTIVE_STATES.has(state);
}

/**
 * Drop repeated records; the first one seen wins.
 * Key: role + container name + port, or role + port + pid without a container.
 */
export function deduplicateServices(
  services: readonly ServiceRecord[],
): ServiceRecord[] {
  const seen = new Set<string>();
  const result: ServiceRecord[] = [];

  for (const service of services) {
    const key = service.containerName
      ? `${service.role}|${service.containerName}|${service.port ?? 0}`
      : `${service.role}|${service.port ?? 0}|${service.pid ?? 0}`;
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(service);
  }

  return result;
}

export type ManagerDeps = {
  config: EngineConfig;
  runtime: ContainerRuntime;
  host: HostProbe;
  logger: Logger;
};

export class Manager {
  private readonly config: EngineConfig;
  private readonly runtime: ContainerRuntime;
  private readonly host: HostProbe;
  private readonly logger: Logger;

  constructor(deps: ManagerDeps) {
    this.config = deps.config;
    this.runtime = deps.runtime;
    this.host = deps.host;
    this.logger = deps.logger;
  }

  /** Canonical container names, one per role */
  get managedContainers(): string[] {
    return this.config.roles.map((role) => role.container);
  }

  async detectExistingServices(signal?: AbortSignal): Promise<Detection> {
    const services: ServiceRecord[] = [];
    const warnings: string[] = [];

    const probes: Array<[string, () => Promise<ServiceRecord[]>]> = [
      ["container detection", () => this.detectContainers(signal)],
      ["port detection", () => this.detectPortOwners(signal, warnings)],
      ["VPN detection", () => this.detectHostVpn(signal, warnings)],
    ];

    for (const [label, probe] of probes) {
      try {
        services.push(...(await probe()));
      } catch (err) {
        const warning = `${label} failed: ${getErrorMessage(err)}`;
        this.logger.warning(SOURCE, warning);
        warnings.push(warning);
      }
    }

    const unique = deduplicateServices(services);
    this.logger.debug(
      SOURCE,
      `Detected ${unique.length} service(s): ${unique.map((s) => s.name).join(", ") || "none"}`,
    );
    return { services: unique, warnings };
  }

  async checkPortConflicts(
    targetPorts: Readonly<PortMap>,
    signal?: AbortSignal,
  ): Promise<PortConflict[]> {
    const { services } = await this.detectExistingServices(signal);

    const occupied = new Map<number, ServiceRecord>();
    for (const service of services) {
      if (service.port && service.port > 0 && isActiveState(service.state)) {
        if (!occupied.has(service.port)) occupied.set(service.port, service);
      }
    }

    const conflicts: PortConflict[] = [];
    for (const [requestedBy, port] of Object.entries(targetPorts)) {
      const occupier = occupied.get(port);
      if (!occupier) continue;

      if (occupier.isManaged) {
        conflicts.push({
          port,
          protocol: "tcp",
          requestedBy,
          occupiedBy: occupier,
          canResolve: true,
          resolutionHint:
            "Previous devstack installation detected. Will upgrade in place.",
        });
        continue;
      }

      const suggestedPort = await this.findFreePort(port);
      const sameKind = occupier.role === "external-same-kind";
      conflicts.push({
        port,
        protocol: "tcp",
        requestedBy,
        occupiedBy: occupier,
        canResolve: sameKind,
        resolutionHint: sameKind
          ? `Existing ${this.config.sameKindSignature} found. Relocate to port ${suggestedPort} or migrate its data.`
          : `Port ${port} in use by ${occupier.name}. Use port ${suggestedPort} or stop the conflicting service.`,
        suggestedPort,
      });
    }

    return conflicts;
  }

  isPortFree(port: number): Promise<boolean> {
    return this.host.isPortFree(port);
  }

  /**
   * The preferred port when it is free, else the first free port in the
   * configured range, else 0 (let the OS choose). Ports in `reserved` are
   * never returned. Free at the moment of return only.
   */
  async findFreePort(
    preferred: number,
    reserved: ReadonlySet<number> = new Set(),
  ): Promise<number> {
    const usable = async (port: number) =>
      !reserved.has(port) && (await this.host.isPortFree(port));

    if (preferred > 0 && (await usable(preferred))) return preferred;

    const { start, end } = this.config.portRange;
    for (let port = start; port <= end; port++) {
      if (await usable(port)) return port;
    }
    return 0;
  }

  /** One distinct free port per role with a port; 0 for the rest */
  async findAvailablePorts(): Promise<PortMap> {
    const ports: PortMap = {};
    const assigned = new Set<number>();
    for (const role of this.config.roles) {
      const port = role.port > 0 ? await this.findFreePort(role.port, assigned) : 0;
      if (port > 0) assigned.add(port);
      ports[role.key] = port;
    }
    return ports;
  }

  /**
   * Stop every canonical container that exists, escalating to a kill when
   * the graceful stop fails. Returns the errors that remain.
   */
  async stopManagedServices(
    graceSeconds: number,
    signal?: AbortSignal,
  ): Promise<string[]> {
    const errors: string[] = [];

    for (const name of this.managedContainers) {
      try {
        if (!(await this.runtime.inspectState(name, signal))) continue;
      } catch (err) {
        errors.push(getErrorMessage(err));
        continue;
      }

      try {
        await this.runtime.stop(name, graceSeconds, signal);
        this.logger.info(SOURCE, `Stopped: ${name}`);
      } catch (err) {
        this.logger.warning(
          SOURCE,
          `Graceful stop of ${name} failed, killing: ${getErrorMessage(err)}`,
        );
        try {
          await this.runtime.kill(name, signal);
        } catch (killErr) {
          errors.push(getErrorMessage(killErr));
        }
      }
    }

    return errors;
  }

  async removeManagedContainers(signal?: AbortSignal): Promise<string[]> {
    const errors: string[] = [];

    for (const name of this.managedContainers) {
      try {
        if (!(await this.runtime.inspectState(name, signal))) continue;
        await this.runtime.remove(name, signal);
        this.logger.info(SOURCE, `Removed: ${name}`);
      } catch (err) {
        errors.push(getErrorMessage(err));
      }
    }

    return errors;
  }

  private async detectContainers(signal?: AbortSignal): Promise<ServiceRecord[]> {
    const { managedLabelPrefix, sameKindSignature, vpnSignature } = this.config;
    const canonical = this.managedContainers;
    const records: ServiceRecord[] = [];

    for (const container of await this.runtime.listContainers(signal)) {
      const managed =
        canonical.some((name) => container.name.includes(name)) ||
        Object.keys(container.labels).some((key) =>
          key.startsWith(managedLabelPrefix),
        );
      const sameKind =
        container.image.includes(sameKindSignature) ||
        container.name.includes(sameKindSignature);

      if (!managed && !sameKind) continue;

      records.push({
        name: container.name,
        role: container.name.includes(vpnSignature)
          ? "vpn-daemon"
          : managed
            ? "managed"
            : "external-same-kind",
        state: classifyContainerState(container.state, container.health),
        containerId: container.id,
        containerName: container.name,
        ...(container.firstPort > 0
          ? { port: container.firstPort, protocol: "tcp" as const }
          : {}),
        version: "",
        isManaged: managed,
        labels: container.labels,
      });
    }

    return records;
  }

  private async detectPortOwners(
    signal: AbortSignal | undefined,
    warnings: string[],
  ): Promise<ServiceRecord[]> {
    const records: ServiceRecord[] = [];

    for (const port of this.config.probePorts) {
      if (await this.host.isPortFree(port)) continue;

      let name = `Unknown service on port ${port}`;
      let pid: number | undefined;
      let processName: string | undefined;

      try {
        const owner = await this.host.findPortOwner(port, signal);
        pid = owner.pid;
        processName = owner.processName;
        if (processName) {
          name = processName;
        } else if (owner.socketTable !== undefined) {
          name = owner.socketTable.includes(this.config.sameKindSignature)
            ? `${this.config.sameKindSignature} (external)`
            : `Process on port ${port}`;
        }
      } catch (err) {
        warnings.push(`owner lookup for port ${port} failed: ${getErrorMessage(err)}`);
      }

      records.push({
        name,
        role: "external-generic-service",
        state: "running",
        port,
        protocol: "tcp",
        pid,
        processName,
        version: "",
        isManaged: false,
        labels: {},
      });
    }

    return records;
  }

  private async detectHostVpn(
    signal: AbortSignal | undefined,
    warnings: string[],
  ): Promise<ServiceRecord[]> {
    const probe = await this.host.vpnStatus(signal);
    if (probe.kind === "absent") return [];

    const displayName = findRole(this.config, this.config.vpnRole)?.name ?? "VPN";
    const base = {
      name: `Host ${displayName}`,
      role: "vpn-daemon" as const,
      isManaged: false,
      labels: {},
    };

    if (probe.kind === "failed") {
      warnings.push(`host VPN status unavailable: ${probe.reason}`);
      return [{ ...base, state: "stopped", version: "" }];
    }

    return [
      {
        ...base,
        state: probe.status.running ? "running" : "stopped",
        version: probe.status.version,
      },
    ];
  }
}
