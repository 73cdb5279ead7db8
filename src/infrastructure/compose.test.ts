import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { loadCompose } from "./compose";

const dir = fs.mkdtempSync(path.join(os.tmpdir(), "devstack-compose-"));

afterEach(() => {
  for (const entry of fs.readdirSync(dir)) fs.rmSync(path.join(dir, entry));
});

function write(contents: string): string {
  const file = path.join(dir, "docker-compose.yml");
  fs.writeFileSync(file, contents);
  return file;
}

describe("loadCompose", () => {
  it("lists services and their container names", () => {
    const file = write(
      "services:\n  ide:\n    image: code-server\n    container_name: devstack-code-server\n  devstack-tailscale:\n    image: tailscale\n",
    );

    const compose = loadCompose(file);

    expect(compose.services).toEqual(["ide", "devstack-tailscale"]);
    expect(compose.containers).toEqual(["devstack-code-server", "devstack-tailscale"]);
  });

  it("rejects a file without services", () => {
    const file = write("volumes:\n  data: {}\n");

    expect(() => loadCompose(file)).toThrow(`${file} declares no services`);
  });

  it("rejects a file that is not YAML", () => {
    const file = write("services: [unclosed\n");

    expect(() => loadCompose(file)).toThrow();
  });
});
