/**
 * Stack lifecycle: pre-flight checks, start, stop, restart and status.
 *
 * Environment problems (runtime unreachable, compose file missing) throw
 * EnvironmentError. Everything else ends up in the result's warnings or
 * errors.
 */

import { existsSync } from "fs";
import {
  composePath,
  findRole,
  portEnvironment,
  targetPorts,
  type EngineConfig,
  type RoleConfig,
} from "../config/config";
import { Manager } from "../detection/manager";
import { failureReason, type CommandResult } from "../execution/executor";
import type { HostProbe } from "../host/hostProbe";
import { loadCompose } from "../infrastructure/compose";
import { Migrator } from "../migration/migrator";
import { classifyContainerState, firstToken } from "../runtime/parse";
import type { ContainerRuntime } from "../runtime/types";
import type {
  MigrationPlan,
  PortMap,
  ServiceStatus,
  ShutdownResult,
  StartupResult,
} from "../types";
import { EnvironmentError } from "../utils/errors";
import {
  elapsedMs,
  getErrorMessage,
  sleep,
  withDeadline,
} from "../utils/helpers";
import type { Logger } from "../utils/logger";
import { filteredOutput } from "../utils/streamFilter";
import { pollHealth } from "./health";

const VPN_CLIENT = "tailscale";

export type LifecycleDeps = {
  config: EngineConfig;
  runtime: ContainerRuntime;
  host: HostProbe;
  logger: Logger;
  now?: () => Date;
};

export class LifecycleManager {
  readonly manager: Manager;
  readonly migrator: Migrator;

  private readonly config: EngineConfig;
  private readonly runtime: ContainerRuntime;
  private readonly host: HostProbe;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: LifecycleDeps) {
    this.config = deps.config;
    this.runtime = deps.runtime;
    this.host = deps.host;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());

    this.manager = new Manager(deps);
    this.migrator = new Migrator({ ...deps, manager: this.manager });
  }

  async preStartCheck(signal?: AbortSignal): Promise<MigrationPlan> {
    this.logger.info("startup", "Running pre-start checks...");

    try {
      await this.runtime.ping(signal);
    } catch (err) {
      throw new EnvironmentError(
        "runtime",
        `Container runtime is not running or not accessible: ${getErrorMessage(err)}`,
      );
    }
    this.logger.debug("startup", "Container runtime is available");

    const file = composePath(this.config);
    if (!existsSync(file)) {
      throw new EnvironmentError("compose-file", `Compose file not found: ${file}`);
    }

    let containers: string[];
    try {
      containers = loadCompose(file).containers;
    } catch (err) {
      throw new EnvironmentError(
        "compose-file",
        `Compose file is not valid: ${getErrorMessage(err)}`,
      );
    }
    this.logger.debug("startup", `Using compose file: ${this.config.composeFile}`);

    const composeWarnings = this.config.roles
      .filter((role) => !containers.includes(role.container))
      .map(
        (role) =>
          `Compose file defines no container named ${role.container} (${role.name})`,
      );

    const plan = await this.migrator.analyzeExisting(
      targetPorts(this.config),
      signal,
    );

    if (plan.existingServices.length > 0) {
      this.logger.info(
        "startup",
        `Detected ${plan.existingServices.length} existing service(s)`,
      );
      for (const service of plan.existingServices) {
        this.logger.debug(
          "startup",
          `  - ${service.name} (${service.role}) [${service.state}]`,
        );
      }
    }

    return { ...plan, warnings: [...plan.warnings, ...composeWarnings] };
  }

  /**
   * Bring the stack up. Without a plan, one is computed first; a computed
   * plan that needs confirmation is not executed.
   */
  async start(
    plan?: MigrationPlan | null,
    signal?: AbortSignal,
  ): Promise<StartupResult> {
    const startedAt = this.now().toISOString();
    const t0 = performance.now();
    const deadline = withDeadline(this.config.timeouts.operationMs, signal);
    const warnings: string[] = [];
    const errors: string[] = [];

    let activePlan = plan ?? null;
    let runMigration = true;
    if (!activePlan) {
      activePlan = await this.preStartCheck(deadline);
      runMigration = !activePlan.requiresConfirmation;
      if (!runMigration) {
        warnings.push(
          "Migration plan requires confirmation and was not executed. Review it with `devstack plan`.",
        );
      }
    }

    const ports: PortMap = { ...targetPorts(this.config), ...activePlan.portMappings };
    const finish = (services: ServiceStatus[], accessUrls: Record<string, string>): StartupResult => ({
      success: errors.length === 0,
      startedAt,
      durationMs: elapsedMs(t0),
      services,
      accessUrls,
      warnings,
      errors,
      plan: activePlan,
    });

    if (runMigration && activePlan.actions.length > 0) {
      this.logger.info("startup", "Executing migration plan...");
      const migration = await this.migrator.execute(activePlan, deadline);
      if (!migration.success) {
        warnings.push(`Migration failed: ${migration.error ?? "unknown error"}`);
      }
    }

    this.logger.info("startup", "Pulling container images...");
    const pull = await this.compose(["pull"], ports, deadline, "docker-pull");
    if (!pull.success) warnings.push(`Pull warning: ${failureReason(pull)}`);

    this.logger.info("startup", "Starting services...");
    const up = await this.compose(["up", "-d"], ports, deadline, "docker-up");
    if (!up.success) {
      errors.push(`Start failed: ${failureReason(up)}`);
      return finish([], {});
    }

    let services: ServiceStatus[];
    if (this.config.healthChecks) {
      this.logger.info("startup", "Waiting for services to be healthy...");
      services = await this.waitForHealth(ports, deadline);

      const lagging = services.filter(
        (s) => s.state !== "healthy" && s.state !== "running",
      );
      for (const service of lagging) {
        if (service.error) warnings.push(`${service.name}: ${service.error}`);
      }
      if (lagging.length > 0) {
        warnings.push("Some services are not yet healthy. They may still be starting.");
      }
    } else {
      services = await this.status(deadline, ports);
    }

    const accessUrls = await this.resolveAccessUrls(ports, deadline);
    return finish(services, accessUrls);
  }

  /** compose down, then make sure every canonical container is stopped */
  async stop(signal?: AbortSignal): Promise<ShutdownResult> {
    const stoppedAt = this.now().toISOString();
    const t0 = performance.now();
    const deadline = withDeadline(this.config.timeouts.operationMs, signal);
    const errors: string[] = [];
    const services: ServiceStatus[] = [];

    this.logger.info("shutdown", "Stopping services...");
    const down = await this.compose(
      ["down"],
      targetPorts(this.config),
      deadline,
      "docker-down",
    );
    if (!down.success) errors.push(`Stop failed: ${failureReason(down)}`);

    for (const role of this.config.roles) {
      const status = { ...this.baseStatus(role, role.port), state: "stopped" as const };

      try {
        const state = await this.runtime.inspectState(role.container, deadline);
        if (state?.running) {
          this.logger.warning("shutdown", `${role.container} still running, forcing stop`);
          await this.runtime.stop(
            role.container,
            this.config.timeouts.forceStopGraceSeconds,
            deadline,
          );
        }
        services.push(status);
      } catch (err) {
        const message = getErrorMessage(err);
        errors.push(message);
        services.push({ ...status, state: "unknown", error: message });
      }
    }

    if (errors.length === 0) this.logger.info("shutdown", "All services stopped");

    return {
      success: errors.length === 0,
      stoppedAt,
      durationMs: elapsedMs(t0),
      services,
      errors,
    };
  }

  /**
   * Stop, then take the canonical containers away: a failed stop escalates
   * to a kill and every container is force-removed.
   */
  async purge(signal?: AbortSignal): Promise<ShutdownResult> {
    const t0 = performance.now();
    const stopped = await this.stop(signal);
    const deadline = withDeadline(this.config.timeouts.operationMs, signal);

    this.logger.info("shutdown", "Removing containers...");
    const errors = [
      ...stopped.errors,
      ...(await this.manager.stopManagedServices(
        this.config.timeouts.forceStopGraceSeconds,
        deadline,
      )),
      ...(await this.manager.removeManagedContainers(deadline)),
    ];

    return {
      ...stopped,
      success: errors.length === 0,
      durationMs: elapsedMs(t0),
      errors,
    };
  }

  async restart(signal?: AbortSignal): Promise<StartupResult> {
    const stopped = await this.stop(signal);
    for (const error of stopped.errors) {
      this.logger.warning("restart", `Stop had issues: ${error}`);
    }

    await sleep(this.config.timeouts.restartDelayMs, signal);

    const started = await this.start(null, signal);
    return {
      ...started,
      warnings: [
        ...stopped.errors.map((error) => `Stop had issues: ${error}`),
        ...started.warnings,
      ],
    };
  }

  /** Read-only snapshot of every role */
  async status(
    signal?: AbortSignal,
    ports: Readonly<PortMap> = targetPorts(this.config),
  ): Promise<ServiceStatus[]> {
    const statuses: ServiceStatus[] = [];

    for (const role of this.config.roles) {
      const base = this.baseStatus(role, ports[role.key] ?? role.port);
      try {
        const state = await this.runtime.inspectState(role.container, signal);
        statuses.push({
          ...base,
          state: state ? classifyContainerState(state.status, state.health) : "stopped",
        });
      } catch (err) {
        statuses.push({ ...base, state: "unknown", error: getErrorMessage(err) });
      }
    }

    return statuses;
  }

  /** Roles in sequence, each under its own deadline nested in `signal` */
  private async waitForHealth(
    ports: Readonly<PortMap>,
    signal: AbortSignal,
  ): Promise<ServiceStatus[]> {
    const statuses: ServiceStatus[] = [];
    const { healthMs, healthIntervalMs } = this.config.timeouts;

    for (const role of this.config.roles) {
      const base = this.baseStatus(role, ports[role.key] ?? role.port);
      const outcome = await pollHealth(
        this.runtime,
        role.container,
        healthIntervalMs,
        withDeadline(healthMs, signal),
      );

      if (outcome.state === "healthy") {
        this.logger.info("health", `${role.name} is healthy`);
      } else if (outcome.state === "running") {
        this.logger.debug("health", `${role.name} is running (no healthcheck)`);
      } else {
        this.logger.warning("health", `${role.name} is ${outcome.state}`);
      }

      statuses.push({ ...base, ...outcome });
    }

    return statuses;
  }

  /**
   * Host VPN address, then the sidecar's VPN address, then the first
   * interface address, then localhost.
   */
  private async resolveAccessUrls(
    ports: Readonly<PortMap>,
    signal: AbortSignal,
  ): Promise<Record<string, string>> {
    const address =
      (await this.host.vpnAddress(signal)) ??
      (await this.sidecarVpnAddress(signal)) ??
      this.host.primaryAddress() ??
      "localhost";

    const urls: Record<string, string> = {};
    for (const role of this.config.roles) {
      const port = ports[role.key] ?? role.port;
      if (role.scheme && port > 0) {
        urls[role.key] = `${role.scheme}://${address}:${port}`;
      }
    }
    return urls;
  }

  private async sidecarVpnAddress(signal: AbortSignal): Promise<string | null> {
    const vpn = findRole(this.config, this.config.vpnRole);
    if (!vpn) return null;
    try {
      const output = await this.runtime.exec(
        vpn.container,
        [VPN_CLIENT, "ip", "-4"],
        signal,
      );
      return firstToken(output) || null;
    } catch (err) {
      this.logger.debug("startup", `VPN sidecar address unavailable: ${getErrorMessage(err)}`);
      return null;
    }
  }

  private compose(
    args: string[],
    ports: Readonly<PortMap>,
    signal: AbortSignal,
    source: string,
  ): Promise<CommandResult> {
    return this.runtime.compose(args, {
      composeFile: composePath(this.config),
      cwd: this.config.projectRoot,
      env: portEnvironment(this.config, ports),
      signal,
      output: filteredOutput(this.logger, source),
    });
  }

  private baseStatus(role: RoleConfig, port: number) {
    return {
      name: role.name,
      container: role.container,
      port,
      ...(role.scheme && port > 0
        ? { healthUrl: `${role.scheme}://localhost:${port}` }
        : {}),
    };
  }
}
