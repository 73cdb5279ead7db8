import fs from "fs";
import os from "os";
import path from "path";
import configSchema from "./config.schema.json";
import { validateSchema } from "../utils/validateSchema";

export type RuntimeKind = "api" | "cli";

/** One fixed position in the stack */
export type RoleConfig = Readonly<{
  key: string;
  name: string;
  container: string;
  port: number; // 0 = nothing published
  scheme?: "http" | "https";
  portEnv?: string; // compose variable that carries the host port
}>;

export type EngineConfig = Readonly<{
  projectRoot: string;
  composeFile: string;
  envFile: string;
  runtime: RuntimeKind;
  roles: readonly RoleConfig[];
  ideRole: string;
  vpnRole: string;
  managedLabelPrefix: string;
  sameKindSignature: string;
  vpnSignature: string;
  probePorts: readonly number[];
  portRange: Readonly<{ start: number; end: number }>;
  backup: Readonly<{
    dir: string;
    volumes: readonly string[];
    helperImage: string;
  }>;
  migration: Readonly<{
    sourceDirs: readonly string[];
    ideDataDir: string;
  }>;
  timeouts: Readonly<{
    operationMs: number;
    healthMs: number;
    healthIntervalMs: number;
    stopGraceSeconds: number;
    forceStopGraceSeconds: number;
    restartDelayMs: number;
  }>;
  healthChecks: boolean;
  logging: Readonly<{ file?: string; verbose: boolean }>;
}>;

/** Shape of devstack.config.json: every field optional */
export type ConfigFile = {
  composeFile?: string;
  envFile?: string;
  runtime?: RuntimeKind;
  roles?: RoleConfig[];
  ideRole?: string;
  vpnRole?: string;
  managedLabelPrefix?: string;
  sameKindSignature?: string;
  vpnSignature?: string;
  probePorts?: number[];
  portRange?: { start: number; end: number };
  backup?: Partial<EngineConfig["backup"]>;
  migration?: Partial<EngineConfig["migration"]>;
  timeouts?: Partial<EngineConfig["timeouts"]>;
  healthChecks?: boolean;
  logging?: { file?: string; verbose?: boolean };
};

export const CONFIG_FILE_NAME = "devstack.config.json";

const DEFAULT_ROLES: RoleConfig[] = [
  { key: "vpn", name: "Tailscale", container: "devstack-tailscale", port: 0 },
  {
    key: "code-server",
    name: "code-server",
    container: "devstack-code-server",
    port: 8443,
    scheme: "https",
    portEnv: "CODE_SERVER_PORT",
  },
  {
    key: "ttyd",
    name: "Assistant",
    container: "devstack-assistant",
    port: 7681,
    scheme: "http",
    portEnv: "TTYD_PORT",
  },
];

export function defaultConfig(projectRoot: string): EngineConfig {
  return deepFreeze({
    projectRoot,
    composeFile: "docker-compose.yml",
    envFile: ".env",
    runtime: "api",
    roles: DEFAULT_ROLES.map((role) => ({ ...role })),
    ideRole: "code-server",
    vpnRole: "vpn",
    managedLabelPrefix: "com.devstack",
    sameKindSignature: "code-server",
    vpnSignature: "tailscale",
    probePorts: [8443, 7681],
    portRange: { start: 8000, end: 9000 },
    backup: {
      dir: ".migration-backup",
      volumes: ["devstack-code-server-config", "devstack-assistant-config"],
      helperImage: "alpine",
    },
    migration: {
      sourceDirs: [
        "/config/.local/share/code-server",
        "~/.local/share/code-server",
        "/home/coder/.local/share/code-server",
      ].map(expandHome),
      ideDataDir: "/config/.local/share/code-server",
    },
    timeouts: {
      operationMs: 2 * 60 * 1000,
      healthMs: 60 * 1000,
      healthIntervalMs: 2000,
      stopGraceSeconds: 30,
      forceStopGraceSeconds: 5,
      restartDelayMs: 2000,
    },
    healthChecks: true,
    logging: { verbose: false },
  });
}

/**
 * Merge a (validated) config file over the defaults.
 * Sections are merged one level deep; arrays replace.
 */
export function mergeConfig(
  base: EngineConfig,
  file: ConfigFile,
): EngineConfig {
  const merged: EngineConfig = {
    ...base,
    ...file,
    backup: { ...base.backup, ...file.backup },
    migration: {
      ...base.migration,
      ...file.migration,
      sourceDirs: (
        file.migration?.sourceDirs ?? base.migration.sourceDirs
      ).map(expandHome),
    },
    timeouts: { ...base.timeouts, ...file.timeouts },
    logging: { ...base.logging, ...file.logging },
  };

  assertConsistent(merged);
  return deepFreeze(merged);
}

/** Environment overrides (DEVSTACK_*) */
export function applyEnv(
  base: EngineConfig,
  env: NodeJS.ProcessEnv,
): EngineConfig {
  const runtime = env.DEVSTACK_RUNTIME;
  if (runtime !== undefined && !isRuntimeKind(runtime)) {
    throw new Error(`DEVSTACK_RUNTIME must be "api" or "cli", got "${runtime}"`);
  }

  return deepFreeze({
    ...base,
    composeFile: env.DEVSTACK_COMPOSE_FILE || base.composeFile,
    runtime: runtime ?? base.runtime,
    logging: {
      file: env.DEVSTACK_LOG_FILE || base.logging.file,
      verbose:
        env.DEVSTACK_VERBOSE !== undefined
          ? ["1", "true", "yes"].includes(env.DEVSTACK_VERBOSE.toLowerCase())
          : base.logging.verbose,
    },
  });
}

export function loadConfig(
  options: { projectRoot?: string; env?: NodeJS.ProcessEnv } = {},
): EngineConfig {
  const projectRoot = path.resolve(options.projectRoot ?? process.cwd());
  const configPath = path.join(projectRoot, CONFIG_FILE_NAME);

  let config = defaultConfig(projectRoot);

  if (fs.existsSync(configPath)) {
    const raw = fs.readFileSync(configPath, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    config = mergeConfig(
      config,
      validateSchema<ConfigFile>(configSchema, parsed, CONFIG_FILE_NAME),
    );
  }

  return applyEnv(config, options.env ?? process.env);
}

/** Target port map derived from the roles that publish a port */
export function targetPorts(config: EngineConfig): Record<string, number> {
  const ports: Record<string, number> = {};
  for (const role of config.roles) {
    if (role.port > 0) ports[role.key] = role.port;
  }
  return ports;
}

export function composePath(config: EngineConfig): string {
  return path.resolve(config.projectRoot, config.composeFile);
}

/** Compose variables (`portEnv`) carrying the host port of each role */
export function portEnvironment(
  config: EngineConfig,
  ports: Readonly<Record<string, number>>,
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const role of config.roles) {
    const port = ports[role.key];
    if (role.portEnv && port !== undefined && port > 0) {
      env[role.portEnv] = String(port);
    }
  }
  return env;
}

export function findRole(
  config: EngineConfig,
  key: string,
): RoleConfig | undefined {
  return config.roles.find((role) => role.key === key);
}

function assertConsistent(config: EngineConfig): void {
  if (config.portRange.start > config.portRange.end) {
    throw new Error(
      `portRange.start (${config.portRange.start}) is after portRange.end (${config.portRange.end})`,
    );
  }
  const keys = new Set<string>();
  for (const role of config.roles) {
    if (keys.has(role.key)) {
      throw new Error(`Duplicate role key: ${role.key}`);
    }
    keys.add(role.key);
  }
  for (const ref of [config.ideRole, config.vpnRole]) {
    if (!keys.has(ref)) {
      throw new Error(`Role "${ref}" is referenced but not defined`);
    }
  }
}

function expandHome(dir: string): string {
  return dir.startsWith("~/") ? path.join(os.homedir(), dir.slice(2)) : dir;
}

function isRuntimeKind(value: string): value is RuntimeKind {
  return value === "api" || value === "cli";
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}
