/**
 * Compose stack type definitions
 */

import type { CommandResult } from "../utils/exec";

export interface ComposeRunOptions {
  /** Attach to the terminal (logs -f, exec -it, psql) */
  interactive?: boolean;
}

/**
 * Runs `docker compose -f <file> --env-file <env> <args>` for one deployment
 */
export interface ComposeRunner {
  run(args: string[], options?: ComposeRunOptions): Promise<CommandResult>;
}

export type ServiceHealth = "healthy" | "unhealthy" | "starting" | "none";

export interface ServiceStatus {
  service: string;
  container: string;
  /** Runtime state as reported by compose: running, exited, paused, ... */
  state: string;
  /** Human readable status, e.g. "Up 2 hours (healthy)" */
  status: string;
  health: ServiceHealth;
  running: boolean;
  healthy: boolean;
}
