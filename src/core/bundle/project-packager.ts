/**
 * Archives the project's configuration surface into project.tgz
 */

import * as path from "node:path";
import type { Archiver, ProjectFileEntry, ProjectPackage } from "../../types";
import { computeFileChecksum } from "../../utils/crypto";
import { MissingRequiredFileError, PreconditionFailedError } from "../../utils/errors";
import { fileSize, pathExists } from "../../utils/fs";
import { logger } from "../../utils/logger";
import { PROJECT_ARCHIVE_NAME } from "../../utils/naming";
import { isPathWithinDir, toArchivePath } from "../../utils/path";

export class ProjectPackager {
  constructor(
    private readonly projectRoot: string,
    private readonly archiver: Archiver,
  ) {}

  /**
   * Package the given entries, in order. Every required entry must exist;
   * absent optional entries are skipped.
   */
  async package(entries: ProjectFileEntry[], outputDir: string): Promise<ProjectPackage> {
    const included: string[] = [];
    const skipped: string[] = [];
    const missing: string[] = [];
    const seen = new Set<string>();

    for (const entry of entries) {
      const absolute = path.resolve(this.projectRoot, entry.path);
      if (!isPathWithinDir(absolute, this.projectRoot) || absolute === path.resolve(this.projectRoot)) {
        throw new PreconditionFailedError(
          `project file ${entry.path}`,
          `must be inside ${this.projectRoot}`,
        );
      }

      const relative = toArchivePath(absolute, this.projectRoot);
      if (seen.has(relative)) continue;
      seen.add(relative);

      if (await pathExists(absolute)) {
        included.push(relative);
      } else if (entry.required) {
        missing.push(relative);
      } else {
        logger.debug(`Optional project file not present, skipping: ${relative}`);
        skipped.push(relative);
      }
    }

    if (missing.length > 0) {
      throw new MissingRequiredFileError(missing);
    }

    if (included.length === 0) {
      throw new PreconditionFailedError("project files", "none of the listed entries exist");
    }

    logger.info(`Packaging project files: ${included.join(", ")}`);

    const archivePath = path.join(outputDir, PROJECT_ARCHIVE_NAME);
    await this.archiver.create(archivePath, this.projectRoot, included);

    return {
      archivePath,
      entries: included,
      skipped,
      sizeBytes: await fileSize(archivePath),
      checksum: await computeFileChecksum(archivePath),
    };
  }
}
