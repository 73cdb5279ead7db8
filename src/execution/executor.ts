/**
 * Command execution infrastructure.
 * Runs external tools without a shell and reports their results.
 */

import { execFile, spawn } from "child_process";
import type { Readable } from "stream";
import { getErrorMessage } from "../utils/helpers";

export type CommandResult = {
  success: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
  /** Set when the process never ran (ENOENT, EACCES) or was aborted */
  spawnError?: string;
};

export type CommandOptions = {
  signal?: AbortSignal;
  cwd?: string;
  env?: Record<string, string>;
};

/** Injected wherever a component shells out, so tests can stand in */
export type CommandRunner = (
  file: string,
  args: readonly string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

export type StreamConsumer = (
  stdout: Readable,
  stderr: Readable,
) => Promise<void>;

/** Streaming variant: output goes to the consumer instead of being buffered */
export type StreamingRunner = (
  file: string,
  args: readonly string[],
  consume: StreamConsumer,
  options?: CommandOptions,
) => Promise<CommandResult>;

function mergeEnv(env?: Record<string, string>): NodeJS.ProcessEnv | undefined {
  return env ? { ...process.env, ...env } : undefined;
}

function describeSpawnError(error: {
  name: string;
  code?: unknown;
}): string | undefined {
  if (error.name === "AbortError") return "aborted";
  if (typeof error.code === "string") return error.code;
  return undefined;
}

export const runCommand: CommandRunner = (file, args, options = {}) => {
  return new Promise((resolve) => {
    execFile(
      file,
      [...args],
      {
        signal: options.signal,
        cwd: options.cwd,
        env: mergeEnv(options.env),
        maxBuffer: 16 * 1024 * 1024,
      },
      (error, stdout, stderr) => {
        let exitCode = 0;
        let spawnError: string | undefined;

        if (error) {
          exitCode = typeof error.code === "number" ? error.code : 1;
          spawnError = describeSpawnError(error);
        }

        resolve({
          success: !error,
          exitCode,
          stdout: stdout.trim(),
          stderr: stderr.trim(),
          spawnError,
        });
      },
    );
  });
};

export const runStreaming: StreamingRunner = (
  file,
  args,
  consume,
  options = {},
) => {
  return new Promise((resolve) => {
    const child = spawn(file, [...args], {
      signal: options.signal,
      cwd: options.cwd,
      env: mergeEnv(options.env),
      stdio: ["ignore", "pipe", "pipe"],
    });

    let spawnError: string | undefined;
    let consumeError: string | undefined;
    let settled = false;

    const consumed = consume(child.stdout, child.stderr).then(
      () => undefined,
      (err: unknown) => {
        consumeError = getErrorMessage(err);
      },
    );

    const finish = (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      const exitCode = code ?? 1;
      void consumed.then(() =>
        resolve({
          success: exitCode === 0 && !signal && !spawnError,
          exitCode,
          stdout: "",
          stderr: signal ? `terminated by ${signal}` : (consumeError ?? ""),
          spawnError,
        }),
      );
    };

    // 'close' is not guaranteed after a spawn failure
    child.on("error", (error: NodeJS.ErrnoException) => {
      spawnError = describeSpawnError(error) ?? error.message;
      if (child.exitCode === null && child.pid === undefined) finish(1, null);
    });
    child.on("close", finish);
  });
};

/** Human-readable failure reason for a finished command */
export function failureReason(result: CommandResult): string {
  if (result.spawnError) return result.spawnError;
  return result.stderr || result.stdout || `exit code ${result.exitCode}`;
}
