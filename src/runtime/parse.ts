/**
 * Parsers for container runtime and VPN client output.
 * All of them tolerate malformed input and fall back to empty values.
 */

import type { LifecycleState } from "../types";
import type { ContainerState, HealthStatus } from "./types";

/** "k1=v1,k2=v2" -> { k1: "v1", k2: "v2" } */
export function parseLabels(labels: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const pair of labels.split(",")) {
    const eq = pair.indexOf("=");
    if (eq <= 0) continue;
    const key = pair.slice(0, eq).trim();
    if (key) result[key] = pair.slice(eq + 1).trim();
  }
  return result;
}

/** "0.0.0.0:8443->8443/tcp, :::8443->8443/tcp" -> 8443 */
export function parseFirstPort(ports: string): number {
  const arrow = ports.indexOf("->");
  if (arrow < 0) return 0;
  const hostPart = ports.slice(0, arrow);
  const colon = hostPart.lastIndexOf(":");
  if (colon < 0) return 0;
  const port = Number.parseInt(hostPart.slice(colon + 1), 10);
  return Number.isInteger(port) && port > 0 && port <= 65535 ? port : 0;
}

/** Health marker from a status text such as "Up 5 minutes (healthy)" */
export function parseHealthFromStatus(status: string): HealthStatus | undefined {
  const match = /\((healthy|unhealthy|health: starting)\)/.exec(status);
  if (!match) return undefined;
  if (match[1] === "healthy") return "healthy";
  if (match[1] === "unhealthy") return "unhealthy";
  return "starting";
}

/** Map a runtime state and optional health field onto a lifecycle state */
export function classifyContainerState(
  state: string,
  health?: string,
): LifecycleState {
  switch (state.trim().toLowerCase()) {
    case "running":
      if (health === "healthy") return "healthy";
      if (health === "unhealthy") return "unhealthy";
      if (health === "starting") return "starting";
      return "running";
    case "exited":
    case "dead":
    case "created":
      return "stopped";
    case "restarting":
      return "starting";
    case "removing":
      return "stopping";
    default:
      return "unknown";
  }
}

/** `{{json .State}}` output -> ContainerState, or null when unreadable */
export function parseStateJson(text: string): ContainerState | null {
  const data = parseJsonObject(text);
  if (!data || typeof data.Status !== "string") return null;

  let health: string | undefined;
  if (isRecord(data.Health) && typeof data.Health.Status === "string") {
    health = data.Health.Status || undefined;
  }

  return {
    status: data.Status.toLowerCase(),
    running: data.Running === true,
    health,
  };
}

/** One JSON object per line; unparsable lines are skipped */
export function parseJsonLines(text: string): Record<string, unknown>[] {
  return text
    .split("\n")
    .map((line) => parseJsonObject(line))
    .filter((value): value is Record<string, unknown> => value !== null);
}

export type VpnStatus = Readonly<{
  running: boolean;
  version: string;
  addresses: readonly string[];
}>;

/** `tailscale status --json` -> VpnStatus, or null when unreadable */
export function parseVpnStatus(text: string): VpnStatus | null {
  const data = parseJsonObject(text);
  if (!data) return null;

  const self = isRecord(data.Self) ? data.Self : {};
  const addresses = Array.isArray(self.TailscaleIPs)
    ? self.TailscaleIPs.filter((ip): ip is string => typeof ip === "string")
    : [];

  return {
    running: data.BackendState === "Running",
    version: typeof data.Version === "string" ? data.Version : "",
    addresses,
  };
}

/** First whitespace-separated token, e.g. from `tailscale ip -4` */
export function firstToken(text: string): string {
  return text.trim().split(/\s+/)[0] ?? "";
}

export function isNoSuchContainer(stderr: string): boolean {
  return /no such (container|object)/i.test(stderr);
}

export function stringField(
  data: Record<string, unknown>,
  key: string,
): string {
  const value = data[key];
  return typeof value === "string" ? value : "";
}

function parseJsonObject(text: string): Record<string, unknown> | null {
  const trimmed = text.trim();
  if (!trimmed.startsWith("{")) return null;
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
