import Docker from "dockerode";
import { PassThrough, type Duplex, type Writable } from "stream";
import { finished } from "stream/promises";
import { abortable, getErrorMessage } from "../utils/helpers";
import { RuntimeCommandError } from "../utils/errors";
import { DockerCliRuntime, type DockerCliOptions } from "./dockerCli";
import { isRecord, parseHealthFromStatus } from "./parse";
import type { ContainerState, ContainerSummary } from "./types";

type EngineContainerInfo = {
  Id: string;
  Names?: string[];
  Image: string;
  State?: string;
  Status?: string;
  Labels?: Record<string, string>;
  Ports?: Array<{ PublicPort?: number }>;
};

type EngineExec = {
  start(options: { hijack: boolean; stdin: boolean }): Promise<Duplex>;
  inspect(): Promise<{ ExitCode: number | null }>;
};

type EngineContainer = {
  inspect(): Promise<{
    State: { Status?: string; Running?: boolean; Health?: { Status?: string } };
  }>;
  stop(options: { t: number }): Promise<unknown>;
  start(): Promise<unknown>;
  kill(): Promise<unknown>;
  remove(options: { force: boolean }): Promise<unknown>;
  exec(options: {
    Cmd: string[];
    AttachStdout: boolean;
    AttachStderr: boolean;
  }): Promise<EngineExec>;
};

/** The part of the dockerode client this runtime calls */
export type EngineClient = {
  ping(): Promise<unknown>;
  listContainers(options: { all: boolean }): Promise<EngineContainerInfo[]>;
  getContainer(id: string): EngineContainer;
  modem: {
    demuxStream(stream: Duplex, stdout: Writable, stderr: Writable): void;
  };
};

/**
 * Container runtime backed by the Docker Engine API (dockerode).
 * Compose, `docker cp` and the volume-backup helper still go through the CLI.
 */
export class DockerApiRuntime extends DockerCliRuntime {
  constructor(
    private readonly client: EngineClient = new Docker(),
    options: DockerCliOptions = {},
  ) {
    super(options);
  }

  async ping(signal?: AbortSignal): Promise<void> {
    await this.call("ping", "daemon", () => this.client.ping(), signal);
  }

  async listContainers(signal?: AbortSignal): Promise<ContainerSummary[]> {
    const containers = await this.call(
      "list",
      "containers",
      () => this.client.listContainers({ all: true }),
      signal,
    );

    return containers.map((container) => ({
      id: container.Id,
      name: container.Names?.[0]?.replace(/^\//, "") ?? "",
      image: container.Image,
      state: (container.State ?? "").toLowerCase(),
      status: container.Status ?? "",
      health: parseHealthFromStatus(container.Status ?? ""),
      labels: container.Labels ?? {},
      firstPort:
        (container.Ports ?? []).find((port) => (port.PublicPort ?? 0) > 0)
          ?.PublicPort ?? 0,
    }));
  }

  async inspectState(
    name: string,
    signal?: AbortSignal,
  ): Promise<ContainerState | null> {
    try {
      const data = await abortable(
        this.client.getContainer(name).inspect(),
        signal,
      );
      const state = data.State;
      return {
        status: (state.Status ?? "unknown").toLowerCase(),
        running: Boolean(state.Running),
        health: state.Health?.Status || undefined,
      };
    } catch (err) {
      if (hasStatusCode(err, 404)) return null;
      throw new RuntimeCommandError("inspect", name, getErrorMessage(err));
    }
  }

  async stop(
    name: string,
    graceSeconds: number,
    signal?: AbortSignal,
  ): Promise<void> {
    await this.callIgnoring(
      304, // already stopped
      "stop",
      name,
      () => this.client.getContainer(name).stop({ t: graceSeconds }),
      signal,
    );
  }

  async start(name: string, signal?: AbortSignal): Promise<void> {
    await this.callIgnoring(
      304, // already running
      "start",
      name,
      () => this.client.getContainer(name).start(),
      signal,
    );
  }

  async kill(name: string, signal?: AbortSignal): Promise<void> {
    await this.call(
      "kill",
      name,
      () => this.client.getContainer(name).kill(),
      signal,
    );
  }

  async remove(name: string, signal?: AbortSignal): Promise<void> {
    await this.call(
      "remove",
      name,
      () => this.client.getContainer(name).remove({ force: true }),
      signal,
    );
  }

  async exec(
    name: string,
    command: readonly string[],
    signal?: AbortSignal,
  ): Promise<string> {
    return this.call(
      "exec",
      name,
      async () => {
        const exec = await this.client.getContainer(name).exec({
          Cmd: [...command],
          AttachStdout: true,
          AttachStderr: true,
        });
        const stream = await exec.start({ hijack: true, stdin: false });

        const stdout = new PassThrough();
        const stderr = new PassThrough();
        const out: Buffer[] = [];
        const err: Buffer[] = [];
        stdout.on("data", (chunk: Buffer) => out.push(chunk));
        stderr.on("data", (chunk: Buffer) => err.push(chunk));

        // Use Dockerode's demuxer to split the multiplexed stream
        this.client.modem.demuxStream(stream, stdout, stderr);
        await finished(stream, { writable: false });

        const info = await exec.inspect();
        if (info.ExitCode !== 0) {
          const message = Buffer.concat(err).toString("utf-8").trim();
          throw new Error(message || `exit code ${info.ExitCode}`);
        }
        return Buffer.concat(out).toString("utf-8").trim();
      },
      signal,
    );
  }

  private async call<T>(
    operation: string,
    target: string,
    fn: () => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    try {
      return await abortable(fn(), signal);
    } catch (err) {
      throw new RuntimeCommandError(operation, target, getErrorMessage(err));
    }
  }

  /** Like call(), but an HTTP status meaning "already done" is success */
  private async callIgnoring(
    benignStatus: number,
    operation: string,
    target: string,
    fn: () => Promise<unknown>,
    signal?: AbortSignal,
  ): Promise<void> {
    try {
      await abortable(fn(), signal);
    } catch (err) {
      if (hasStatusCode(err, benignStatus)) return;
      throw new RuntimeCommandError(operation, target, getErrorMessage(err));
    }
  }
}

function hasStatusCode(err: unknown, code: number): boolean {
  return isRecord(err) && err.statusCode === code;
}
