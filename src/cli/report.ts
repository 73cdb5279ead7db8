/**
 * Human-readable rendering of lifecycle results for the terminal.
 */

import { formatPlanSummary } from "../migration/plan";
import type {
  LifecycleState,
  MigrationPlan,
  MigrationResult,
  PortConflict,
  PortMap,
  ServiceStatus,
  ShutdownResult,
  StartupResult,
} from "../types";
import type { LogSink } from "../utils/logger";
import {
  ICONS,
  getTimestamp,
  indentedDetails,
  painter,
  visibleLength,
  type ColorName,
} from "../utils/terminal";

type Details = Record<string, string | number | boolean>;

export type ReporterOptions = {
  out: LogSink;
  color?: boolean;
  now?: () => Date;
};

const STATE_COLORS: Record<LifecycleState, ColorName> = {
  healthy: "green",
  running: "green",
  starting: "yellow",
  stopping: "yellow",
  unhealthy: "red",
  stopped: "dim",
  unknown: "dim",
};

export function createReporter(options: ReporterOptions) {
  const paint = painter(options.color ?? false);
  const { c } = paint;
  const now = options.now ?? (() => new Date());

  const ts = () => c("dim", `[${getTimestamp(now())}]`);
  const indent = () => " ".repeat(visibleLength(ts()) + 1);
  const print = (line = "") => {
    options.out.write(`${line}\n`);
  };
  const details = (values: Details) => {
    for (const line of indentedDetails(values, indent(), paint)) print(line);
  };

  const serviceLine = (service: ServiceStatus) => {
    const port = service.port > 0 ? `:${service.port}` : "";
    const error = service.error ? c("dim", ` (${service.error})`) : "";
    return `${indent()}${c(STATE_COLORS[service.state], ICONS.pending)} ${c("white", service.name)} ${c("gray", `${service.container}${port}`)} ${c(STATE_COLORS[service.state], service.state)}${error}`;
  };

  const list = (title: string, items: readonly string[], icon: string, color: ColorName) => {
    if (items.length === 0) return;
    print(`${indent()}${c("gray", title)}`);
    for (const item of items) print(`${indent()}  ${c(color, icon)} ${item}`);
  };

  return {
    result(success: boolean, message: string, values?: Details): void {
      const icon = success ? ICONS.success : ICONS.failure;
      const color: ColorName = success ? "green" : "red";
      print(`${ts()} ${c(color, icon)} ${c("white", message)}`);
      if (values) details(values);
    },

    warn(message: string, values?: Details): void {
      print(`${ts()} ${c("yellow", ICONS.warning)} ${c("white", message)}`);
      if (values) details(values);
    },

    plan(plan: MigrationPlan): void {
      for (const line of formatPlanSummary(plan).trimEnd().split("\n")) {
        print(`${indent()}${line}`);
      }
      print();
    },

    migration(result: MigrationResult): void {
      this.result(result.success, "Migration", {
        Actions: result.actions.length,
        ...(result.backupPath ? { Backup: result.backupPath } : {}),
        ...(result.error ? { Error: result.error } : {}),
      });
      for (const { action, output, error } of result.actions) {
        print(`${indent()}  ${c("white", `${action.order}.`)} ${action.description} ${c("dim", error ?? output)}`);
      }
    },

    startup(result: StartupResult): void {
      this.result(
        result.success,
        result.success ? "Stack started" : "Stack failed to start",
        { Duration: `${(result.durationMs / 1000).toFixed(1)}s` },
      );
      for (const service of result.services) print(serviceLine(service));

      const urls = Object.entries(result.accessUrls);
      if (urls.length > 0) {
        print(`${indent()}${c("gray", "Access:")}`);
        for (const [key, url] of urls) print(`${indent()}  ${c("white", key)}: ${c("cyan", url)}`);
      }
      list("Warnings:", result.warnings, ICONS.warning, "yellow");
      list("Errors:", result.errors, ICONS.failure, "red");
    },

    shutdown(result: ShutdownResult): void {
      this.result(
        result.success,
        result.success ? "All services stopped" : "Shutdown finished with errors",
        { Duration: `${(result.durationMs / 1000).toFixed(1)}s` },
      );
      for (const service of result.services) print(serviceLine(service));
      list("Errors:", result.errors, ICONS.failure, "red");
    },

    status(services: readonly ServiceStatus[]): void {
      print(`${ts()} ${c("white", "Service status")}`);
      for (const service of services) print(serviceLine(service));
    },

    ports(available: Readonly<PortMap>, conflicts: readonly PortConflict[]): void {
      this.result(conflicts.length === 0, conflicts.length === 0 ? "No port conflicts" : `${conflicts.length} port conflict(s)`);
      for (const conflict of conflicts) {
        this.warn(`Port ${conflict.port} requested by ${conflict.requestedBy}`, {
          "Occupied by": conflict.occupiedBy?.name ?? "unknown",
          Resolvable: conflict.canResolve,
          Hint: conflict.resolutionHint,
        });
      }
      const entries = Object.entries(available);
      if (entries.length > 0) {
        print(`${indent()}${c("gray", "Available ports:")}`);
        for (const [key, port] of entries) {
          print(`${indent()}  ${c("white", key)}: ${port > 0 ? port : c("dim", "none")}`);
        }
      }
    },
  };
}
