/**
 * Docker Compose file reader.
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import { isRecord } from "../runtime/parse";

export type ComposeDefinition = {
  services: string[];
  /** container_name if specified, else the service name */
  containers: string[];
};

/**
 * Read and parse a compose file. Throws when the file is missing, is not
 * YAML, or declares no `services` map.
 */
export function loadCompose(composePath: string): ComposeDefinition {
  const raw = readFileSync(composePath, "utf-8");
  const parsed: unknown = parseYaml(raw);

  if (!isRecord(parsed) || !isRecord(parsed.services)) {
    throw new Error(`${composePath} declares no services`);
  }

  const services = Object.keys(parsed.services);
  const containers = Object.entries(parsed.services).map(
    ([serviceName, service]) =>
      isRecord(service) && typeof service.container_name === "string"
        ? service.container_name
        : serviceName,
  );

  return { services, containers };
}
