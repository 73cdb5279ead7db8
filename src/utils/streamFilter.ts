/**
 * Live filtering of subprocess output (docker compose pull/up/down).
 *
 * Layer-by-layer pull progress collapses into one rewritable counter;
 * container lifecycle lines, errors and warnings are surfaced; everything
 * else is logged at debug.
 */

import * as readline from "readline";
import type { Readable } from "stream";
import type { StreamConsumer } from "../execution/executor";
import type { Logger } from "./logger";

export type LineKind =
  | "pull-progress"
  | "pull-layer-done"
  | "pull-finished"
  | "lifecycle"
  | "error"
  | "warning"
  | "other";

export function classifyLine(line: string): LineKind {
  if (line.includes(": Pulling") || line.includes(": Downloading")) {
    return "pull-progress";
  }
  if (line.includes(": Pull complete") || line.includes(": Already exists")) {
    return "pull-layer-done";
  }
  if (line.startsWith("Digest:") || line.startsWith("Status:")) {
    return "pull-finished";
  }
  if (
    line.includes("Container") &&
    (line.includes("Started") ||
      line.includes("Stopped") ||
      line.includes("Created"))
  ) {
    return "lifecycle";
  }

  const lower = line.toLowerCase();
  if (lower.includes("error") || lower.includes("failed")) return "error";
  if (lower.includes("warn")) return "warning";
  return "other";
}

/**
 * Consume one output stream line by line until it ends.
 */
export async function filterStream(
  logger: Logger,
  source: string,
  input: Readable,
): Promise<void> {
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  const layers = new Set<string>();
  let progressShown = false;

  for await (const raw of rl) {
    const line = raw.trim();

    switch (classifyLine(line)) {
      case "pull-progress": {
        layers.add(line.slice(0, line.indexOf(":")));
        logger.progress(source, `Pulling images... (${layers.size} layers)`);
        progressShown = true;
        break;
      }
      case "pull-layer-done":
        break;
      case "pull-finished":
        if (progressShown) {
          logger.progressDone();
          progressShown = false;
          layers.clear();
        }
        if (line.startsWith("Status:")) logger.info(source, line);
        break;
      case "lifecycle":
        logger.info(source, line);
        break;
      case "error":
        logger.error(source, line);
        break;
      case "warning":
        logger.warning(source, line);
        break;
      case "other":
        logger.debug(source, line);
        break;
    }
  }

  if (progressShown) logger.progressDone();
}

/**
 * Stream consumer that filters stdout and stderr concurrently into one logger.
 */
export function filteredOutput(logger: Logger, source: string): StreamConsumer {
  return async (stdout, stderr) => {
    await Promise.all([
      filterStream(logger, source, stdout),
      filterStream(logger, source, stderr),
    ]);
  };
}
