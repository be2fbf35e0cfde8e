/**
 * Docker CLI client wrapper
 */

import { type CommandResult, type CommandRunner, runCommand } from "../utils/exec";
import { logger } from "../utils/logger";

export interface VolumeMount {
  source: string;
  target: string;
  readonly?: boolean;
}

export interface RunContainerOptions {
  image: string;
  command: string[];
  volumes?: VolumeMount[];
  remove?: boolean;
}

export class DockerClient {
  constructor(
    readonly bin: string = "docker",
    private readonly runner: CommandRunner = runCommand,
  ) {}

  /**
   * Run a Docker command and return the result
   */
  run(args: string[], options: { inherit?: boolean; cwd?: string } = {}): Promise<CommandResult> {
    return this.runner(this.bin, args, options);
  }

  /**
   * Check if Docker is available and the daemon reachable
   */
  async isAvailable(): Promise<boolean> {
    const result = await this.run(["info"]);
    return result.success;
  }

  async version(): Promise<string | null> {
    const result = await this.run(["version", "--format", "{{.Server.Version}}"]);
    return result.success ? result.stdout : null;
  }

  /**
   * Run a throwaway container with the given mounts
   */
  runContainer(options: RunContainerOptions): Promise<CommandResult> {
    const args: string[] = ["run"];

    if (options.remove !== false) {
      args.push("--rm");
    }

    for (const vol of options.volumes ?? []) {
      const mountSpec = vol.readonly
        ? `${vol.source}:${vol.target}:ro`
        : `${vol.source}:${vol.target}`;
      args.push("-v", mountSpec);
    }

    args.push(options.image, ...options.command);

    logger.debug(`Running Docker container: ${this.bin} ${args.join(" ")}`);
    return this.run(args);
  }

  /**
   * Pull an image if it is not present locally
   */
  async ensureImage(image: string): Promise<boolean> {
    const inspectResult = await this.run(["image", "inspect", image]);
    if (inspectResult.success) {
      return true;
    }

    logger.info(`Pulling Docker image: ${image}`);
    const pullResult = await this.run(["pull", image]);
    return pullResult.success;
  }

  /**
   * Remove dangling images left behind by an upgrade
   */
  pruneImages(): Promise<CommandResult> {
    return this.run(["image", "prune", "-f"]);
  }
}
