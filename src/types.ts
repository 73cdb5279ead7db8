/**
 * Core domain types for the devstack engine.
 * Every record here is produced by a single call and never mutated afterwards.
 */

/** Lifecycle state of a detected or managed service */
export type LifecycleState =
  | "unknown"
  | "stopped"
  | "starting"
  | "running"
  | "healthy"
  | "unhealthy"
  | "stopping";

/** What a detected service is, relative to our stack */
export type ServiceRole =
  | "managed"
  | "external-generic-service"
  | "external-same-kind"
  | "vpn-daemon";

export type Protocol = "tcp" | "udp";

/** A running (or stopped) thing found by one detection pass */
export type ServiceRecord = Readonly<{
  name: string;
  role: ServiceRole;
  state: LifecycleState;
  containerId?: string;
  containerName?: string;
  port?: number;
  protocol?: Protocol;
  pid?: number;
  processName?: string;
  version: string;
  isManaged: boolean;
  labels: Readonly<Record<string, string>>;
}>;

/** Output of a detection pass; failed probes land in warnings */
export type Detection = {
  services: ServiceRecord[];
  warnings: string[];
};

/** A requested port that is already taken */
export type PortConflict = Readonly<{
  port: number;
  protocol: Protocol;
  requestedBy: string;
  occupiedBy: ServiceRecord | null;
  canResolve: boolean;
  resolutionHint: string;
  suggestedPort?: number; // 0 = let the OS choose
}>;

/** Role key -> host port */
export type PortMap = Record<string, number>;

export type MigrationStrategy =
  | "fresh"
  | "upgrade"
  | "migrate-external"
  | "parallel";

export type ActionType =
  | "backup"
  | "stop"
  | "pull"
  | "remove"
  | "migrate-data"
  | "start";

/** Single step of a migration plan */
export type MigrationAction = Readonly<{
  order: number;
  type: ActionType;
  target: string;
  description: string;
  reversible: boolean;
}>;

/** How to treat whatever is already installed */
export type MigrationPlan = Readonly<{
  strategy: MigrationStrategy;
  existingServices: readonly ServiceRecord[];
  actions: readonly MigrationAction[];
  portMappings: Readonly<PortMap>;
  warnings: readonly string[];
  requiresConfirmation: boolean;
}>;

/** Result of executing a single migration action */
export type ActionResult = Readonly<{
  action: MigrationAction;
  success: boolean;
  output: string;
  error?: string;
  durationMs: number;
}>;

/** Result of executing a migration plan */
export type MigrationResult = Readonly<{
  success: boolean;
  completedAt: string;
  actions: readonly ActionResult[];
  backupPath?: string;
  error?: string;
}>;

export type RollbackResult = Readonly<{
  restarted: readonly string[];
  skipped: readonly string[];
  errors: readonly string[];
}>;

/** Status of one stack role after a lifecycle operation */
export type ServiceStatus = Readonly<{
  name: string;
  container: string;
  state: LifecycleState;
  port: number;
  healthUrl?: string;
  error?: string;
}>;

export type StartupResult = Readonly<{
  success: boolean;
  startedAt: string;
  durationMs: number;
  services: readonly ServiceStatus[];
  accessUrls: Readonly<Record<string, string>>;
  warnings: readonly string[];
  errors: readonly string[];
  plan: MigrationPlan | null;
}>;

export type ShutdownResult = Readonly<{
  success: boolean;
  stoppedAt: string;
  durationMs: number;
  services: readonly ServiceStatus[];
  errors: readonly string[];
}>;
