/**
 * Container runtime driven through the `docker` CLI.
 * Also provides the primitives the Engine API adapter reuses: compose,
 * file copy and the throwaway volume-backup container.
 */

import path from "path";
import {
  failureReason,
  runCommand,
  runStreaming,
  type CommandResult,
  type CommandRunner,
  type StreamingRunner,
} from "../execution/executor";
import { RuntimeCommandError } from "../utils/errors";
import {
  isNoSuchContainer,
  parseFirstPort,
  parseHealthFromStatus,
  parseJsonLines,
  parseLabels,
  parseStateJson,
  stringField,
} from "./parse";
import type {
  ComposeOptions,
  ContainerRuntime,
  ContainerState,
  ContainerSummary,
} from "./types";

export type DockerCliOptions = {
  binary?: string;
  run?: CommandRunner;
  stream?: StreamingRunner;
};

export class DockerCliRuntime implements ContainerRuntime {
  protected readonly binary: string;
  protected readonly run: CommandRunner;
  protected readonly stream: StreamingRunner;

  constructor(options: DockerCliOptions = {}) {
    this.binary = options.binary ?? "docker";
    this.run = options.run ?? runCommand;
    this.stream = options.stream ?? runStreaming;
  }

  async ping(signal?: AbortSignal): Promise<void> {
    await this.docker("info", "daemon", ["info", "--format", "{{.ServerVersion}}"], signal);
  }

  async listContainers(signal?: AbortSignal): Promise<ContainerSummary[]> {
    const stdout = await this.docker(
      "list",
      "containers",
      ["ps", "-a", "--no-trunc", "--format", "{{json .}}"],
      signal,
    );

    return parseJsonLines(stdout).map((row) => {
      const status = stringField(row, "Status");
      return {
        id: stringField(row, "ID"),
        name: stringField(row, "Names").split(",")[0],
        image: stringField(row, "Image"),
        state: stringField(row, "State").toLowerCase(),
        status,
        health: parseHealthFromStatus(status),
        labels: parseLabels(stringField(row, "Labels")),
        firstPort: parseFirstPort(stringField(row, "Ports")),
      };
    });
  }

  async inspectState(
    name: string,
    signal?: AbortSignal,
  ): Promise<ContainerState | null> {
    const result = await this.run(
      this.binary,
      ["inspect", "--type", "container", "--format", "{{json .State}}", name],
      { signal },
    );

    if (!result.success) {
      if (isNoSuchContainer(result.stderr)) return null;
      throw new RuntimeCommandError("inspect", name, failureReason(result));
    }

    const state = parseStateJson(result.stdout);
    if (!state) {
      throw new RuntimeCommandError("inspect", name, "unreadable state");
    }
    return state;
  }

  async stop(
    name: string,
    graceSeconds: number,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.docker("stop", name, ["stop", "-t", String(graceSeconds), name], signal);
  }

  async start(name: string, signal?: AbortSignal): Promise<void> {
    await this.docker("start", name, ["start", name], signal);
  }

  async kill(name: string, signal?: AbortSignal): Promise<void> {
    await this.docker("kill", name, ["kill", name], signal);
  }

  async remove(name: string, signal?: AbortSignal): Promise<void> {
    await this.docker("remove", name, ["rm", "-f", name], signal);
  }

  async exec(
    name: string,
    command: readonly string[],
    signal?: AbortSignal,
  ): Promise<string> {
    return this.docker("exec", name, ["exec", name, ...command], signal);
  }

  async backupVolume(
    volume: string,
    hostDir: string,
    helperImage: string,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.docker(
      "backup",
      volume,
      [
        "run",
        "--rm",
        "-v",
        `${volume}:/data:ro`,
        "-v",
        `${path.resolve(hostDir)}:/backup`,
        helperImage,
        "tar",
        "cf",
        `/backup/${volume}.tar`,
        "-C",
        "/data",
        ".",
      ],
      signal,
    );
  }

  async copyInto(
    source: string,
    container: string,
    destDir: string,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.docker(
      "copy",
      `${source} -> ${container}:${destDir}`,
      ["cp", source, `${container}:${destDir}`],
      signal,
    );
  }

  compose(
    args: readonly string[],
    options: ComposeOptions,
  ): Promise<CommandResult> {
    const fullArgs = ["compose", "-f", options.composeFile, ...args];
    const commandOptions = {
      signal: options.signal,
      cwd: options.cwd,
      env: options.env,
    };

    return options.output
      ? this.stream(this.binary, fullArgs, options.output, commandOptions)
      : this.run(this.binary, fullArgs, commandOptions);
  }

  /** Run a docker subcommand, returning stdout or throwing with context */
  protected async docker(
    operation: string,
    target: string,
    args: readonly string[],
    signal?: AbortSignal,
  ): Promise<string> {
    const result = await this.run(this.binary, args, { signal });
    if (!result.success) {
      throw new RuntimeCommandError(operation, target, failureReason(result));
    }
    return result.stdout;
  }
}
