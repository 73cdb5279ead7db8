import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import {
  CONFIG_FILE_NAME,
  applyEnv,
  composePath,
  defaultConfig,
  loadConfig,
  mergeConfig,
  portEnvironment,
  targetPorts,
} from "./config";

describe("defaultConfig", () => {
  it("maps the published role ports", () => {
    const config = defaultConfig("/srv/stack");

    expect(targetPorts(config)).toEqual({ "code-server": 8443, ttyd: 7681 });
    expect(composePath(config)).toBe("/srv/stack/docker-compose.yml");
    expect(Object.isFrozen(config.roles[0])).toBe(true);
  });
});

describe("mergeConfig", () => {
  it("merges sections one level deep", () => {
    const config = mergeConfig(defaultConfig("/srv/stack"), {
      runtime: "cli",
      timeouts: { healthMs: 1000 },
    });

    expect(config.runtime).toBe("cli");
    expect(config.timeouts.healthMs).toBe(1000);
    expect(config.timeouts.operationMs).toBe(120000);
  });

  it("rejects an inverted port range", () => {
    expect(() =>
      mergeConfig(defaultConfig("/srv/stack"), { portRange: { start: 9000, end: 8000 } }),
    ).toThrow("portRange.start (9000) is after portRange.end (8000)");
  });

  it("rejects references to undefined roles", () => {
    expect(() =>
      mergeConfig(defaultConfig("/srv/stack"), { ideRole: "editor" }),
    ).toThrow('Role "editor" is referenced but not defined');
  });
});

describe("applyEnv", () => {
  it("reads DEVSTACK_* overrides", () => {
    const config = applyEnv(defaultConfig("/srv/stack"), {
      DEVSTACK_RUNTIME: "cli",
      DEVSTACK_COMPOSE_FILE: "compose.dev.yml",
      DEVSTACK_LOG_FILE: "/var/log/devstack.log",
      DEVSTACK_VERBOSE: "TRUE",
    });

    expect(config.runtime).toBe("cli");
    expect(config.composeFile).toBe("compose.dev.yml");
    expect(config.logging).toEqual({ file: "/var/log/devstack.log", verbose: true });
  });

  it("rejects an unknown runtime", () => {
    expect(() =>
      applyEnv(defaultConfig("/srv/stack"), { DEVSTACK_RUNTIME: "podman" }),
    ).toThrow('DEVSTACK_RUNTIME must be "api" or "cli", got "podman"');
  });
});

describe("portEnvironment", () => {
  it("exports the ports of roles that declare a compose variable", () => {
    expect(
      portEnvironment(defaultConfig("/srv/stack"), { vpn: 0, "code-server": 8000, ttyd: 7681 }),
    ).toEqual({ CODE_SERVER_PORT: "8000", TTYD_PORT: "7681" });
  });
});

describe("loadConfig", () => {
  const dirs: string[] = [];
  const tempProject = (contents?: unknown) => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "devstack-config-"));
    dirs.push(dir);
    if (contents !== undefined) {
      fs.writeFileSync(path.join(dir, CONFIG_FILE_NAME), JSON.stringify(contents));
    }
    return dir;
  };

  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  it("uses the defaults without a config file", () => {
    const dir = tempProject();

    const config = loadConfig({ projectRoot: dir, env: {} });

    expect(config.projectRoot).toBe(dir);
    expect(config.runtime).toBe("api");
  });

  it("applies a valid config file", () => {
    const dir = tempProject({ composeFile: "stack.yml", probePorts: [9443] });

    const config = loadConfig({ projectRoot: dir, env: {} });

    expect(config.composeFile).toBe("stack.yml");
    expect(config.probePorts).toEqual([9443]);
  });

  it("rejects a config file that does not match the schema", () => {
    const dir = tempProject({ composeFile: "stack.yml", colour: "blue" });

    expect(() => loadConfig({ projectRoot: dir, env: {} })).toThrow(
      `[${CONFIG_FILE_NAME} schema invalid]`,
    );
  });
});
