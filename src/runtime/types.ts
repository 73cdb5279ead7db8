/**
 * Container runtime contract.
 *
 * Decision logic only ever sees these records; how they are obtained
 * (Engine API or CLI output) stays inside the adapters.
 */

import type {
  CommandResult,
  StreamConsumer,
} from "../execution/executor";

export type HealthStatus = "healthy" | "unhealthy" | "starting";

/** One row of the container list */
export type ContainerSummary = Readonly<{
  id: string;
  name: string;
  image: string;
  state: string; // lowercase runtime state: running, exited, created...
  status: string; // free text, e.g. "Up 2 hours (healthy)"
  health?: HealthStatus;
  labels: Readonly<Record<string, string>>;
  firstPort: number; // first published host port, 0 if none
}>;

/** Result of inspecting one container */
export type ContainerState = Readonly<{
  status: string;
  running: boolean;
  health?: string; // absent when the image defines no health check
}>;

export type ComposeOptions = {
  composeFile: string;
  cwd: string;
  env?: Record<string, string>;
  signal?: AbortSignal;
  /** Stream stdout/stderr here instead of buffering them */
  output?: StreamConsumer;
};

export interface ContainerRuntime {
  /** Throws when the runtime daemon cannot be reached */
  ping(signal?: AbortSignal): Promise<void>;
  listContainers(signal?: AbortSignal): Promise<ContainerSummary[]>;
  /** null when the container does not exist */
  inspectState(
    name: string,
    signal?: AbortSignal,
  ): Promise<ContainerState | null>;
  stop(name: string, graceSeconds: number, signal?: AbortSignal): Promise<void>;
  start(name: string, signal?: AbortSignal): Promise<void>;
  kill(name: string, signal?: AbortSignal): Promise<void>;
  remove(name: string, signal?: AbortSignal): Promise<void>;
  /** Run a command inside a running container and return its stdout */
  exec(
    name: string,
    command: readonly string[],
    signal?: AbortSignal,
  ): Promise<string>;
  /** Tar a named volume into hostDir/<volume>.tar via a throwaway container */
  backupVolume(
    volume: string,
    hostDir: string,
    helperImage: string,
    signal?: AbortSignal,
  ): Promise<void>;
  /** Copy a host file or directory into a container directory */
  copyInto(
    source: string,
    container: string,
    destDir: string,
    signal?: AbortSignal,
  ): Promise<void>;
  compose(
    args: readonly string[],
    options: ComposeOptions,
  ): Promise<CommandResult>;
}
