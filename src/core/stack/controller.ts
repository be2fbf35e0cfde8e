/**
 * Thin façade over the compose stack. State lives in the container runtime;
 * nothing is cached here.
 */

import { parseComposePs } from "../../docker/compose";
import type { ComposeRunner, ServiceStatus } from "../../types";
import { ToolFailedError } from "../../utils/errors";
import { logger } from "../../utils/logger";

export class StackController {
  constructor(private readonly compose: ComposeRunner) {}

  /**
   * Stop every service so nothing writes to the data volumes
   */
  async quiesce(): Promise<void> {
    logger.info("Stopping services...");
    const result = await this.compose.run(["stop"]);
    if (!result.success) {
      throw new ToolFailedError("compose stop", result);
    }
  }

  /**
   * Bring the stack up (creating containers as needed)
   */
  async resume(): Promise<void> {
    logger.info("Starting services...");
    const result = await this.compose.run(["up", "-d", "--remove-orphans"]);
    if (!result.success) {
      throw new ToolFailedError("compose up", result);
    }
  }

  /**
   * Needs compose v2; docker-compose v1 has no JSON output for ps
   */
  async status(): Promise<ServiceStatus[]> {
    const result = await this.compose.run(["ps", "--all", "--format", "json"]);
    if (!result.success) {
      throw new ToolFailedError("compose ps", result);
    }
    return parseComposePs(result.stdout);
  }

  /**
   * Names of the services with a running container. Works on both compose
   * generations, so export and the shell commands do not depend on v2.
   */
  async runningServices(): Promise<string[]> {
    const result = await this.compose.run(["ps", "--services", "--filter", "status=running"]);
    if (!result.success) {
      throw new ToolFailedError("compose ps", result);
    }
    return result.stdout
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  async isRunning(): Promise<boolean> {
    return (await this.runningServices()).length > 0;
  }
}
