/**
 * devstack CLI entry point
 */

import "dotenv/config";
import path from "path";
import { parseArgs } from "util";
import { createReporter } from "./cli/report";
import { loadConfig, targetPorts, type EngineConfig } from "./config/config";
import { NodeHostProbe } from "./host/hostProbe";
import { LifecycleManager } from "./lifecycle/lifecycle";
import { createRuntime } from "./runtime";
import { EnvironmentError } from "./utils/errors";
import { getErrorMessage } from "./utils/helpers";
import { Logger, createLogFile } from "./utils/logger";
import { confirm } from "./utils/prompts";

const COMMANDS = ["plan", "start", "stop", "restart", "status", "ports"] as const;
type Command = (typeof COMMANDS)[number];

const USAGE = `Usage: devstack <${COMMANDS.join("|")}> [--verbose] [--dry-run] [--yes] [--force] [--json]`;

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

function defaultLogFile(config: EngineConfig): string {
  return config.logging.file ?? path.join(config.projectRoot, ".devstack", "devstack.log");
}

async function main(argv: string[], signal: AbortSignal): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      verbose: { type: "boolean", short: "v", default: false },
      "dry-run": { type: "boolean", default: false },
      yes: { type: "boolean", short: "y", default: false },
      force: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
    },
  });

  const command = positionals[0];
  if (!isCommand(command)) {
    process.stderr.write(`${USAGE}\n`);
    return 2;
  }

  const config = loadConfig();
  const json = values.json ?? false;
  // Human output goes to stderr when stdout carries JSON
  const humanOut = json ? process.stderr : process.stdout;
  const color = humanOut.isTTY ?? false;

  const logger = new Logger({
    fileSink: createLogFile(defaultLogFile(config)),
    userSink: humanOut,
    color,
    verbose: (values.verbose ?? false) || config.logging.verbose,
  });
  const report = createReporter({ out: humanOut, color });
  const lifecycle = new LifecycleManager({
    config,
    runtime: createRuntime(config),
    host: new NodeHostProbe(),
    logger,
  });

  const emit = (value: unknown) => {
    process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
  };

  switch (command) {
    case "plan": {
      const plan = await lifecycle.preStartCheck(signal);
      if (!values["dry-run"]) {
        if (json) emit(plan);
        else report.plan(plan);
        return 0;
      }
      lifecycle.migrator.setDryRun(true);
      const result = await lifecycle.migrator.execute(plan, signal);
      if (json) emit({ plan, result });
      else {
        report.plan(plan);
        report.migration(result);
      }
      return 0;
    }

    case "start": {
      const plan = await lifecycle.preStartCheck(signal);
      if (!json) report.plan(plan);

      if (values["dry-run"]) {
        lifecycle.migrator.setDryRun(true);
        const result = await lifecycle.migrator.execute(plan, signal);
        if (json) emit({ plan, result });
        else report.migration(result);
        return 0;
      }

      if (plan.requiresConfirmation && !values.yes) {
        const approved = await confirm("Proceed with this plan?", process.stdin, humanOut);
        if (!approved) {
          report.warn("Aborted, nothing was changed");
          return 1;
        }
      }

      const result = await lifecycle.start(plan, signal);
      if (json) emit(result);
      else report.startup(result);
      return result.success ? 0 : 1;
    }

    case "stop": {
      const result = values.force
        ? await lifecycle.purge(signal)
        : await lifecycle.stop(signal);
      if (json) emit(result);
      else report.shutdown(result);
      return result.success ? 0 : 1;
    }

    case "restart": {
      const result = await lifecycle.restart(signal);
      if (json) emit(result);
      else report.startup(result);
      return result.success ? 0 : 1;
    }

    case "status": {
      const services = await lifecycle.status(signal);
      if (json) emit(services);
      else report.status(services);
      return 0;
    }

    case "ports": {
      const conflicts = await lifecycle.manager.checkPortConflicts(targetPorts(config), signal);
      const available = await lifecycle.manager.findAvailablePorts();
      if (json) emit({ conflicts, available });
      else report.ports(available, conflicts);
      return conflicts.every((conflict) => conflict.canResolve) ? 0 : 1;
    }
  }
}

// First Ctrl-C aborts the running operation, the second exits at once
const interrupt = new AbortController();
process.on("SIGINT", () => {
  if (interrupt.signal.aborted) process.exit(130);
  process.stderr.write("\nInterrupted, winding down (Ctrl-C again to exit now)\n");
  interrupt.abort();
});

main(process.argv.slice(2), interrupt.signal).then(
  (code) => {
    process.exitCode = interrupt.signal.aborted ? 130 : code;
  },
  (err: unknown) => {
    const prefix = err instanceof EnvironmentError ? "Environment check failed" : "devstack failed";
    createReporter({ out: process.stderr, color: process.stderr.isTTY ?? false }).result(false, prefix, {
      Error: getErrorMessage(err),
    });
    process.exitCode = interrupt.signal.aborted ? 130 : 1;
  },
);
