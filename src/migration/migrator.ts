/**
 * Executes migration plans against the container runtime and the host
 * filesystem.
 */

import { existsSync } from "fs";
import { copyFile, cp, mkdir } from "fs/promises";
import path from "path";
import {
  composePath,
  findRole,
  portEnvironment,
  type EngineConfig,
} from "../config/config";
import type { Manager } from "../detection/manager";
import { failureReason } from "../execution/executor";
import type { ContainerRuntime } from "../runtime/types";
import type {
  ActionResult,
  MigrationAction,
  MigrationPlan,
  MigrationResult,
  PortMap,
  RollbackResult,
} from "../types";
import { elapsedMs, getErrorMessage } from "../utils/helpers";
import type { Logger } from "../utils/logger";
import { filteredOutput } from "../utils/streamFilter";
import {
  BACKUP_EXTERNAL,
  BACKUP_MANAGED,
  MIGRATE_EXTENSIONS,
  MIGRATE_SETTINGS,
  categorizeServices,
  migrateActions,
  portCollisions,
  selectStrategy,
  upgradeActions,
} from "./plan";

const SOURCE = "migrator";

export type MigratorDeps = {
  config: EngineConfig;
  manager: Manager;
  runtime: ContainerRuntime;
  logger: Logger;
  now?: () => Date;
};

type ActionOutcome = { output: string; backupPath?: string };

export class Migrator {
  private readonly config: EngineConfig;
  private readonly manager: Manager;
  private readonly runtime: ContainerRuntime;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private dryRun = false;

  constructor(deps: MigratorDeps) {
    this.config = deps.config;
    this.manager = deps.manager;
    this.runtime = deps.runtime;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  setDryRun(dryRun: boolean): void {
    this.dryRun = dryRun;
  }

  get backupRoot(): string {
    return path.resolve(this.config.projectRoot, this.config.backup.dir);
  }

  async analyzeExisting(
    targetPorts: Readonly<PortMap>,
    signal?: AbortSignal,
  ): Promise<MigrationPlan> {
    const detection = await this.manager.detectExistingServices(signal);
    const categories = categorizeServices(detection.services);
    const strategy = selectStrategy(categories, targetPorts);

    const portMappings: PortMap = { ...targetPorts };
    const warnings: string[] = [];
    let actions: MigrationAction[] = [];

    switch (strategy) {
      case "upgrade":
        actions = upgradeActions(categories.managed);
        break;
      case "migrate-external":
        actions = migrateActions(categories.sameKind);
        warnings.push(
          `External ${this.config.sameKindSignature} detected. Migration will preserve your extensions and settings.`,
        );
        break;
      case "parallel":
        for (const { key, port, holder } of portCollisions(
          categories.other,
          targetPorts,
        )) {
          const reserved = new Set(
            Object.entries(portMappings)
              .filter(([other, mapped]) => other !== key && mapped > 0)
              .map(([, mapped]) => mapped),
          );
          const alternate = await this.manager.findFreePort(port, reserved);
          portMappings[key] = alternate;
          warnings.push(
            `Port ${port} is in use by ${holder.name}. Will use port ${alternate} instead.`,
          );
        }
        break;
      case "fresh":
        break;
    }

    warnings.push(...detection.warnings);

    const plan: MigrationPlan = {
      strategy,
      existingServices: detection.services,
      actions,
      portMappings,
      warnings,
      requiresConfirmation: strategy === "migrate-external",
    };
    this.logger.debug(
      SOURCE,
      `Plan: ${strategy}, ${actions.length} action(s), ${warnings.length} warning(s)`,
    );
    return plan;
  }

  /**
   * Run actions in ascending order, halting at the first failure.
   * Failures are reported in the result, never thrown.
   */
  async execute(
    plan: MigrationPlan,
    signal?: AbortSignal,
  ): Promise<MigrationResult> {
    const results: ActionResult[] = [];
    const ordered = [...plan.actions].sort((a, b) => a.order - b.order);
    let backupPath: string | undefined;

    for (const action of ordered) {
      if (this.dryRun) {
        results.push({
          action,
          success: true,
          output: "[DRY RUN] Would execute",
          durationMs: 0,
        });
        continue;
      }

      this.logger.info(
        SOURCE,
        `[${action.order}/${ordered.length}] ${action.description}`,
      );
      const startedAt = performance.now();

      try {
        const outcome = await this.executeAction(action, plan, signal);
        backupPath = outcome.backupPath ?? backupPath;
        results.push({
          action,
          success: true,
          output: outcome.output,
          durationMs: elapsedMs(startedAt),
        });
      } catch (err) {
        const reason = getErrorMessage(err);
        results.push({
          action,
          success: false,
          output: "",
          error: reason,
          durationMs: elapsedMs(startedAt),
        });
        const error = `action '${action.description}' failed: ${reason}`;
        this.logger.error(SOURCE, error);
        return {
          success: false,
          completedAt: this.now().toISOString(),
          actions: results,
          backupPath,
          error,
        };
      }
    }

    return {
      success: true,
      completedAt: this.now().toISOString(),
      actions: results,
      backupPath,
    };
  }

  /**
   * Undo what can be undone, newest first: stopped containers are started
   * again. Removed containers are reported, not restored.
   */
  async rollback(
    result: MigrationResult,
    signal?: AbortSignal,
  ): Promise<RollbackResult> {
    const restarted: string[] = [];
    const skipped: string[] = [];
    const errors: string[] = [];

    const completed = result.actions.filter((entry) => entry.success);
    for (const { action } of [...completed].reverse()) {
      if (action.type === "remove") {
        skipped.push(
          `${action.target}: a removed container cannot be restored automatically; restore it from the backup`,
        );
        continue;
      }
      if (action.type !== "stop" || !action.reversible) continue;

      try {
        await this.runtime.start(action.target, signal);
        restarted.push(action.target);
        this.logger.info(SOURCE, `Rolled back: restarted ${action.target}`);
      } catch (err) {
        errors.push(getErrorMessage(err));
      }
    }

    return { restarted, skipped, errors };
  }

  private async executeAction(
    action: MigrationAction,
    plan: MigrationPlan,
    signal?: AbortSignal,
  ): Promise<ActionOutcome> {
    switch (action.type) {
      case "backup":
        return this.backup(action.target, signal);
      case "stop":
        await this.runtime.stop(
          action.target,
          this.config.timeouts.stopGraceSeconds,
          signal,
        );
        return { output: "Container stopped" };
      case "remove":
        await this.runtime.remove(action.target, signal);
        return { output: "Container removed" };
      case "pull":
        await this.compose(["pull"], plan, signal);
        return { output: "Images pulled" };
      case "start":
        await this.compose(["up", "-d"], plan, signal);
        return { output: "Containers started" };
      case "migrate-data":
        return this.migrateData(action.target, signal);
    }
  }

  private async compose(
    args: string[],
    plan: MigrationPlan,
    signal?: AbortSignal,
  ): Promise<void> {
    const result = await this.runtime.compose(args, {
      composeFile: composePath(this.config),
      cwd: this.config.projectRoot,
      env: portEnvironment(this.config, plan.portMappings),
      signal,
      output: filteredOutput(this.logger, "compose"),
    });
    if (!result.success) {
      throw new Error(`compose ${args.join(" ")}: ${failureReason(result)}`);
    }
  }

  private async backup(
    target: string,
    signal?: AbortSignal,
  ): Promise<ActionOutcome> {
    const backupPath = path.join(this.backupRoot, backupStamp(this.now()));
    await mkdir(backupPath, { recursive: true });

    if (target === BACKUP_MANAGED) {
      const notes: string[] = [];
      const envFile = path.resolve(this.config.projectRoot, this.config.envFile);
      if (existsSync(envFile)) {
        await copyFile(envFile, path.join(backupPath, path.basename(envFile)));
      }

      // Volume failures are reported, not fatal
      for (const volume of this.config.backup.volumes) {
        try {
          await this.runtime.backupVolume(
            volume,
            backupPath,
            this.config.backup.helperImage,
            signal,
          );
        } catch (err) {
          notes.push(`volume ${volume} not backed up: ${getErrorMessage(err)}`);
          this.logger.warning(SOURCE, `Volume backup skipped: ${volume}`);
        }
      }

      return {
        output: [`Backup created at ${backupPath}`, ...notes].join("; "),
        backupPath,
      };
    }

    if (target === BACKUP_EXTERNAL) {
      const source = this.config.migration.sourceDirs.find((dir) =>
        existsSync(dir),
      );
      if (!source) {
        return { output: `No external IDE data found; backup at ${backupPath} is empty`, backupPath };
      }
      await cp(source, path.join(backupPath, this.config.sameKindSignature), {
        recursive: true,
      });
      return { output: `Backed up ${source} to ${backupPath}`, backupPath };
    }

    throw new Error(`unknown backup target: ${target}`);
  }

  private async migrateData(
    target: string,
    signal?: AbortSignal,
  ): Promise<ActionOutcome> {
    const ide = findRole(this.config, this.config.ideRole);
    if (!ide) throw new Error(`role ${this.config.ideRole} is not configured`);

    const { sourceDirs, ideDataDir } = this.config.migration;
    let candidates: string[];
    let destDir: string;

    if (target === MIGRATE_EXTENSIONS) {
      candidates = sourceDirs.map((dir) => path.join(dir, "extensions"));
      destDir = `${ideDataDir}/`;
    } else if (target === MIGRATE_SETTINGS) {
      candidates = sourceDirs.map((dir) =>
        path.join(dir, "User", "settings.json"),
      );
      destDir = `${ideDataDir}/User/`;
    } else {
      throw new Error(`unknown migration target: ${target}`);
    }

    const source = candidates.find((candidate) => existsSync(candidate));
    if (!source) return { output: `No ${target} found, nothing to migrate` };

    await this.runtime.copyInto(source, ide.container, destDir, signal);
    return { output: `Migrated ${target} from ${source}` };
  }
}

/** Local-time "YYYYMMDD-HHMMSS" */
function backupStamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
