/**
 * Archiver backed by the system tar
 */

import type { Archiver } from "../../types";
import { DeployError, ToolFailedError } from "../../utils/errors";
import { type CommandRunner, runCommand } from "../../utils/exec";
import { logger } from "../../utils/logger";

export class TarArchiver implements Archiver {
  constructor(
    private readonly bin: string = "tar",
    private readonly runner: CommandRunner = runCommand,
  ) {}

  async create(archivePath: string, cwd: string, entries: string[]): Promise<void> {
    if (entries.length === 0) {
      throw new DeployError(`No entries to archive into ${archivePath}`);
    }

    logger.debug(`Creating ${archivePath} from ${entries.length} entries in ${cwd}`);
    const result = await this.runner(this.bin, ["-czf", archivePath, "-C", cwd, ...entries]);

    if (!result.success) {
      throw new ToolFailedError(`tar create ${archivePath}`, result);
    }
  }

  async extract(archivePath: string, destDir: string): Promise<void> {
    logger.debug(`Extracting ${archivePath} into ${destDir}`);
    const result = await this.runner(this.bin, ["-xzf", archivePath, "-C", destDir]);

    if (!result.success) {
      throw new ToolFailedError(`tar extract ${archivePath}`, result);
    }
  }
}
