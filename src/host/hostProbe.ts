/**
 * Host-level probes: port binding, socket owners, the host VPN client and
 * network interfaces.
 */

import net from "net";
import os from "os";
import { runCommand, type CommandRunner } from "../execution/executor";
import { firstToken, parseVpnStatus, type VpnStatus } from "../runtime/parse";

export type PortOwner = {
  pid?: number;
  processName?: string;
  /** Raw socket-table row(s) when the owner could not be resolved by pid */
  socketTable?: string;
};

export type VpnProbe =
  | { kind: "absent" }
  | { kind: "failed"; reason: string }
  | { kind: "ok"; status: VpnStatus };

export interface HostProbe {
  /**
   * Bind-then-release probe. Racy by construction: the port can be taken
   * between this check and the caller's own bind.
   */
  isPortFree(port: number): Promise<boolean>;
  findPortOwner(port: number, signal?: AbortSignal): Promise<PortOwner>;
  vpnStatus(signal?: AbortSignal): Promise<VpnProbe>;
  /** First IPv4 address the running host VPN client reports, or null */
  vpnAddress(signal?: AbortSignal): Promise<string | null>;
  /** First non-internal IPv4 address of this host, or null */
  primaryAddress(): string | null;
}

export class NodeHostProbe implements HostProbe {
  constructor(
    private readonly run: CommandRunner = runCommand,
    private readonly vpnBinary = "tailscale",
  ) {}

  isPortFree(port: number): Promise<boolean> {
    return new Promise((resolve) => {
      const server = net.createServer();
      server.once("error", () => resolve(false));
      server.listen({ port, exclusive: true }, () => {
        server.close(() => resolve(true));
      });
    });
  }

  async findPortOwner(port: number, signal?: AbortSignal): Promise<PortOwner> {
    const owner: PortOwner = {};

    const lsof = await this.run("lsof", ["-i", `:${port}`, "-P", "-n", "-t"], {
      signal,
    });
    const pid = lsof.success ? Number.parseInt(firstToken(lsof.stdout), 10) : NaN;

    if (Number.isInteger(pid) && pid > 0) {
      owner.pid = pid;
      const ps = await this.run("ps", ["-p", String(pid), "-o", "comm="], {
        signal,
      });
      if (ps.success && ps.stdout) owner.processName = ps.stdout.trim();
      return owner;
    }

    const ss = await this.run("ss", ["-tlpn", `sport = :${port}`], { signal });
    if (ss.success) owner.socketTable = ss.stdout;
    return owner;
  }

  async vpnStatus(signal?: AbortSignal): Promise<VpnProbe> {
    const result = await this.run(this.vpnBinary, ["status", "--json"], {
      signal,
    });
    if (result.spawnError === "ENOENT") return { kind: "absent" };

    const status = parseVpnStatus(result.stdout);
    if (status) return { kind: "ok", status };

    return {
      kind: "failed",
      reason: result.stderr || result.spawnError || `exit code ${result.exitCode}`,
    };
  }

  async vpnAddress(signal?: AbortSignal): Promise<string | null> {
    const probe = await this.vpnStatus(signal);
    if (probe.kind !== "ok" || !probe.status.running) return null;
    return probe.status.addresses.find((ip) => net.isIPv4(ip)) ?? null;
  }

  primaryAddress(): string | null {
    for (const addresses of Object.values(os.networkInterfaces())) {
      for (const address of addresses ?? []) {
        if (address.family === "IPv4" && !address.internal) {
          return address.address;
        }
      }
    }
    return null;
  }
}
