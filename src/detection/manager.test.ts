import { beforeEach, describe, expect, it } from "vitest";
import type { ConfigFile } from "../config/config";
import { FakeHostProbe, FakeRuntime, testConfig, testLogger } from "../test/fakes";
import type { ServiceRecord } from "../types";
import { Manager, deduplicateServices } from "./manager";

let runtime: FakeRuntime;
let host: FakeHostProbe;

function manager(overrides: ConfigFile = {}): Manager {
  return new Manager({
    config: testConfig(overrides),
    runtime,
    host,
    logger: testLogger().logger,
  });
}

beforeEach(() => {
  runtime = new FakeRuntime();
  host = new FakeHostProbe();
});

describe("detectExistingServices", () => {
  it("records managed and same-kind containers only", async () => {
    runtime
      .add({
        name: "devstack-code-server",
        image: "lscr.io/linuxserver/code-server:latest",
        port: 8443,
        health: "healthy",
      })
      .add({ name: "devstack-tailscale", image: "tailscale/tailscale" })
      .add({ name: "my-ide", image: "codercom/code-server:4", port: 9443, status: "exited" })
      .add({ name: "extra", labels: { "com.devstack.role": "extra" } })
      .add({ name: "db", image: "postgres:16", port: 5432 });

    const { services, warnings } = await manager().detectExistingServices();

    expect(warnings).toEqual([]);
    expect(
      services.map(({ name, role, state, port, isManaged }) => ({ name, role, state, port, isManaged })),
    ).toEqual([
      { name: "devstack-code-server", role: "managed", state: "healthy", port: 8443, isManaged: true },
      { name: "devstack-tailscale", role: "vpn-daemon", state: "running", port: undefined, isManaged: true },
      { name: "my-ide", role: "external-same-kind", state: "stopped", port: 9443, isManaged: false },
      { name: "extra", role: "managed", state: "running", port: undefined, isManaged: true },
    ]);
    expect(services[0]).toMatchObject({
      containerId: "id-devstack-code-server",
      containerName: "devstack-code-server",
      protocol: "tcp",
    });
  });

  it("names port occupiers by process, then by socket table", async () => {
    host.busyPorts.add(8443).add(7681);
    host.owners.set(8443, { pid: 4242, processName: "node" });
    host.owners.set(7681, { socketTable: 'LISTEN 0 511 *:7681 users:(("code-server",pid=9))' });

    const { services } = await manager().detectExistingServices();

    expect(services).toEqual([
      {
        name: "node",
        role: "external-generic-service",
        state: "running",
        port: 8443,
        protocol: "tcp",
        pid: 4242,
        processName: "node",
        version: "",
        isManaged: false,
        labels: {},
      },
      expect.objectContaining({ name: "code-server (external)", port: 7681, pid: undefined }),
    ]);
  });

  it("falls back to a generic name when the owner is unknown", async () => {
    host.busyPorts.add(7681);

    const { services } = await manager().detectExistingServices();

    expect(services.map((s) => s.name)).toEqual(["Unknown service on port 7681"]);
  });

  it("reports the host VPN client", async () => {
    host.vpn = { kind: "ok", status: { running: true, version: "1.60.0", addresses: ["100.64.0.1"] } };

    const { services } = await manager().detectExistingServices();

    expect(services).toEqual([
      {
        name: "Host Tailscale",
        role: "vpn-daemon",
        state: "running",
        version: "1.60.0",
        isManaged: false,
        labels: {},
      },
    ]);
  });

  it("records a failing VPN client as stopped and says why", async () => {
    host.vpn = { kind: "failed", reason: "not logged in" };

    const { services, warnings } = await manager().detectExistingServices();

    expect(services.map((s) => s.state)).toEqual(["stopped"]);
    expect(warnings).toEqual(["host VPN status unavailable: not logged in"]);
  });

  it("absorbs a failed container listing into warnings", async () => {
    runtime.fail("list", "containers");
    host.busyPorts.add(8443);

    const { services, warnings } = await manager().detectExistingServices();

    expect(services.map((s) => s.port)).toEqual([8443]);
    expect(warnings).toEqual(["container detection failed: list containers: boom"]);
  });
});

describe("deduplicateServices", () => {
  const record = (overrides: Partial<ServiceRecord>): ServiceRecord => ({
    name: "svc",
    role: "external-generic-service",
    state: "running",
    version: "",
    isManaged: false,
    labels: {},
    ...overrides,
  });

  it("keeps the first record per key and is idempotent", () => {
    const services = [
      record({ name: "a", containerName: "web", port: 8443, role: "managed" }),
      record({ name: "b", containerName: "web", port: 8443, role: "managed" }),
      record({ name: "c", port: 8443, pid: 10 }),
      record({ name: "d", port: 8443, pid: 10 }),
      record({ name: "e", port: 8443, pid: 11 }),
      record({ name: "f", containerName: "web", port: 8443, role: "external-same-kind" }),
    ];

    const once = deduplicateServices(services);
    const twice = deduplicateServices(once);

    expect(once.map((s) => s.name)).toEqual(["a", "c", "e", "f"]);
    expect(twice).toEqual(once);
  });
});

describe("checkPortConflicts", () => {
  it("ignores occupied ports that were not requested", async () => {
    host.busyPorts.add(9100);
    const detector = manager({ probePorts: [9100] });

    const { services } = await detector.detectExistingServices();
    const conflicts = await detector.checkPortConflicts({ "code-server": 8443, ttyd: 7681 });

    expect(services.map((s) => s.port)).toEqual([9100]);
    expect(conflicts).toEqual([]);
  });

  it("resolves our own previous installation in place", async () => {
    runtime.add({ name: "devstack-code-server", port: 8443 });

    const [conflict] = await manager().checkPortConflicts({ "code-server": 8443 });

    expect(conflict).toMatchObject({
      port: 8443,
      requestedBy: "code-server",
      canResolve: true,
      resolutionHint: "Previous devstack installation detected. Will upgrade in place.",
    });
    expect(conflict.suggestedPort).toBeUndefined();
  });

  it("suggests relocating from a same-kind external service", async () => {
    runtime.add({ name: "my-ide", image: "codercom/code-server:4", port: 8443 });
    host.busyPorts.add(8443);

    const conflicts = await manager().checkPortConflicts({ "code-server": 8443 });

    expect(conflicts).toHaveLength(1);
    expect(conflicts[0]).toMatchObject({
      canResolve: true,
      suggestedPort: 8000,
      resolutionHint: "Existing code-server found. Relocate to port 8000 or migrate its data.",
    });
    expect(conflicts[0].occupiedBy?.name).toBe("my-ide");
  });

  it("cannot resolve an unknown occupier", async () => {
    host.busyPorts.add(7681).add(8000);
    host.owners.set(7681, { pid: 77, processName: "nginx" });

    const conflicts = await manager().checkPortConflicts({ ttyd: 7681 });

    expect(conflicts).toEqual([
      expect.objectContaining({
        canResolve: false,
        suggestedPort: 8001,
        resolutionHint: "Port 7681 in use by nginx. Use port 8001 or stop the conflicting service.",
      }),
    ]);
  });

  it("only counts running services", async () => {
    runtime.add({ name: "my-ide", image: "codercom/code-server:4", port: 8443, status: "exited" });

    await expect(manager().checkPortConflicts({ "code-server": 8443 })).resolves.toEqual([]);
  });
});

describe("free ports", () => {
  it("prefers the requested port, then scans the range, then gives up with 0", async () => {
    const detector = manager({ portRange: { start: 8000, end: 8001 } });

    expect(await detector.findFreePort(8443)).toBe(8443);

    host.busyPorts.add(8443).add(8000);
    expect(await detector.findFreePort(8443)).toBe(8001);

    host.busyPorts.add(8001);
    expect(await detector.findFreePort(8443)).toBe(0);
  });

  it("skips reserved ports", async () => {
    host.busyPorts.add(8443);

    expect(await manager().findFreePort(8443, new Set([8000, 8001]))).toBe(8002);
    expect(await manager().findFreePort(7681, new Set([7681]))).toBe(8000);
  });

  it("never hands the same port to two roles", async () => {
    host.busyPorts.add(8443).add(7681);

    await expect(manager().findAvailablePorts()).resolves.toEqual({
      vpn: 0,
      "code-server": 8000,
      ttyd: 8001,
    });
  });

  it("maps every role to an available port", async () => {
    host.busyPorts.add(7681);

    await expect(manager().findAvailablePorts()).resolves.toEqual({
      vpn: 0,
      "code-server": 8443,
      ttyd: 8000,
    });
  });
});

describe("stopManagedServices", () => {
  it("kills a container whose graceful stop fails", async () => {
    runtime.add({ name: "devstack-code-server" }).fail("stop", "devstack-code-server");

    const errors = await manager().stopManagedServices(10);

    expect(errors).toEqual([]);
    expect(runtime.calls).toContain("stop devstack-code-server -t 10");
    expect(runtime.calls).toContain("kill devstack-code-server");
    expect(runtime.containers.get("devstack-code-server")?.status).toBe("exited");
  });

  it("reports what could not be stopped and skips missing containers", async () => {
    runtime
      .add({ name: "devstack-assistant" })
      .fail("stop", "devstack-assistant")
      .fail("kill", "devstack-assistant", "no permission");

    const errors = await manager().stopManagedServices(10);

    expect(errors).toEqual(["kill devstack-assistant: no permission"]);
    expect(runtime.calls.filter((call) => call.startsWith("stop"))).toEqual([
      "stop devstack-assistant -t 10",
    ]);
  });
});

describe("removeManagedContainers", () => {
  it("removes the canonical containers that exist", async () => {
    runtime.add({ name: "devstack-tailscale" }).add({ name: "unrelated" });

    await expect(manager().removeManagedContainers()).resolves.toEqual([]);
    expect([...runtime.containers.keys()]).toEqual(["unrelated"]);
  });
});
