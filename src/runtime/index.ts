import type { EngineConfig } from "../config/config";
import type { CommandRunner, StreamingRunner } from "../execution/executor";
import { DockerApiRuntime } from "./dockerApi";
import { DockerCliRuntime } from "./dockerCli";
import type { ContainerRuntime } from "./types";

export type { ContainerRuntime } from "./types";

export function createRuntime(
  config: EngineConfig,
  runners: { run?: CommandRunner; stream?: StreamingRunner } = {},
): ContainerRuntime {
  return config.runtime === "cli"
    ? new DockerCliRuntime(runners)
    : new DockerApiRuntime(undefined, runners);
}
