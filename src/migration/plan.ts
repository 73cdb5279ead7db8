/**
 * Pure planning: service categorization, strategy selection, action lists
 * and the human-readable plan summary.
 */

import { isActiveState } from "../detection/manager";
import type {
  ActionType,
  MigrationAction,
  MigrationPlan,
  MigrationStrategy,
  PortMap,
  ServiceRecord,
} from "../types";

export const BACKUP_MANAGED = "devstack-config";
export const BACKUP_EXTERNAL = "external-config";
export const MIGRATE_EXTENSIONS = "extensions";
export const MIGRATE_SETTINGS = "settings";

export type ServiceCategories = {
  managed: ServiceRecord[];
  sameKind: ServiceRecord[];
  other: ServiceRecord[];
};

const STRATEGY_NAMES: Record<MigrationStrategy, string> = {
  fresh: "Fresh Installation",
  upgrade: "Upgrade Existing",
  "migrate-external": "Migrate from External",
  parallel: "Parallel Installation",
};

const REVERSIBLE: Record<ActionType, boolean> = {
  backup: true,
  stop: true,
  start: true,
  pull: false,
  remove: false,
  "migrate-data": false,
};

export function strategyName(strategy: MigrationStrategy): string {
  return STRATEGY_NAMES[strategy];
}

/** Managed first, then same-kind externals, then anything else holding a port */
export function categorizeServices(
  services: readonly ServiceRecord[],
): ServiceCategories {
  const categories: ServiceCategories = { managed: [], sameKind: [], other: [] };

  for (const service of services) {
    if (service.isManaged) {
      categories.managed.push(service);
    } else if (service.role === "external-same-kind") {
      categories.sameKind.push(service);
    } else if (service.port && service.port > 0) {
      categories.other.push(service);
    }
  }

  return categories;
}

/** Role keys whose requested port is held by one of `others`, with the holder */
export function portCollisions(
  others: readonly ServiceRecord[],
  targetPorts: Readonly<PortMap>,
): Array<{ key: string; port: number; holder: ServiceRecord }> {
  const collisions: Array<{ key: string; port: number; holder: ServiceRecord }> = [];
  for (const [key, port] of Object.entries(targetPorts)) {
    const holder = others.find((service) => service.port === port);
    if (holder) collisions.push({ key, port, holder });
  }
  return collisions;
}

export function selectStrategy(
  categories: ServiceCategories,
  targetPorts: Readonly<PortMap>,
): MigrationStrategy {
  if (categories.managed.length > 0) return "upgrade";
  if (categories.sameKind.length > 0) return "migrate-external";
  if (portCollisions(categories.other, targetPorts).length > 0) return "parallel";
  return "fresh";
}

type ActionDraft = Omit<MigrationAction, "order" | "reversible">;

function numbered(drafts: readonly ActionDraft[]): MigrationAction[] {
  return drafts.map((draft, index) => ({
    order: index + 1,
    ...draft,
    reversible: REVERSIBLE[draft.type],
  }));
}

function stopDrafts(
  services: readonly ServiceRecord[],
  describe: (service: ServiceRecord) => string,
): ActionDraft[] {
  const drafts: ActionDraft[] = [];
  for (const service of services) {
    if (service.containerName && isActiveState(service.state)) {
      drafts.push({
        type: "stop",
        target: service.containerName,
        description: describe(service),
      });
    }
  }
  return drafts;
}

export function upgradeActions(
  managed: readonly ServiceRecord[],
): MigrationAction[] {
  return numbered([
    {
      type: "backup",
      target: BACKUP_MANAGED,
      description: "Backup current configuration and data",
    },
    ...stopDrafts(managed, (service) => `Stop container ${service.containerName}`),
    { type: "pull", target: "images", description: "Pull latest container images" },
    { type: "start", target: "stack", description: "Start updated containers" },
  ]);
}

export function migrateActions(
  sameKind: readonly ServiceRecord[],
): MigrationAction[] {
  return numbered([
    {
      type: "backup",
      target: BACKUP_EXTERNAL,
      description: "Backup external IDE extensions and settings",
    },
    ...stopDrafts(sameKind, (service) => `Stop external IDE (${service.name})`),
    {
      type: "migrate-data",
      target: MIGRATE_EXTENSIONS,
      description: "Migrate IDE extensions",
    },
    {
      type: "migrate-data",
      target: MIGRATE_SETTINGS,
      description: "Migrate IDE settings",
    },
    { type: "start", target: "stack", description: "Start containers" },
  ]);
}

export function formatPlanSummary(plan: MigrationPlan): string {
  const lines: string[] = [
    "Migration Plan Summary",
    "======================",
    "",
    `Strategy: ${strategyName(plan.strategy)}`,
    "",
  ];

  if (plan.existingServices.length > 0) {
    lines.push("Detected Services:");
    for (const service of plan.existingServices) {
      const tag = service.isManaged ? " (managed)" : "";
      lines.push(`  - ${service.name} [${service.state}${tag}]`);
    }
    lines.push("");
  }

  if (plan.actions.length > 0) {
    lines.push("Planned Actions:");
    for (const action of plan.actions) {
      const tag = action.reversible ? " [reversible]" : "";
      lines.push(`  ${action.order}. ${action.description}${tag}`);
    }
    lines.push("");
  }

  lines.push("Port Configuration:");
  for (const [key, port] of Object.entries(plan.portMappings)) {
    lines.push(`  - ${key}: ${port}`);
  }
  lines.push("");

  if (plan.warnings.length > 0) {
    lines.push("Warnings:");
    for (const warning of plan.warnings) lines.push(`  ! ${warning}`);
  }

  return lines.join("\n") + "\n";
}
