/**
 * Export orchestration: quiesce, snapshot every volume, package the
 * project, assemble the bundle, resume.
 */

import * as path from "node:path";
import type {
  Archiver,
  Bundle,
  DeploymentContext,
  ExportOptions,
  ExportResult,
  ProjectPackage,
  Snapshot,
  VolumeStore,
} from "../../types";
import { DeployError, errorMessage, PreconditionFailedError } from "../../utils/errors";
import { formatBytes, formatDuration } from "../../utils/format";
import { isFile, makeScratchDir, pathExists, removeDir } from "../../utils/fs";
import { logger } from "../../utils/logger";
import { generateBundleName, isReservedVolumeName } from "../../utils/naming";
import { BundleAssembler } from "./assembler";
import { ProjectPackager } from "./project-packager";
import { VolumeSnapshotter } from "./volume-snapshotter";

export type ExporterContext = Pick<
  DeploymentContext,
  "projectRoot" | "composeFile" | "envFile" | "volumes" | "bundle"
>;

export interface ExporterDeps {
  volumes: VolumeStore;
  archiver: Archiver;
  stack: {
    isRunning(): Promise<boolean>;
    quiesce(): Promise<void>;
    resume(): Promise<void>;
  };
  /** Parent of scratch directories, the system temp dir by default */
  scratchParent?: string;
}

/**
 * Compose and env files must exist before anything is stopped or written
 */
export async function checkExportPreconditions(ctx: ExporterContext): Promise<void> {
  if (!(await isFile(ctx.composeFile))) {
    throw new PreconditionFailedError(ctx.composeFile, "compose stack definition");
  }
  if (!(await isFile(ctx.envFile))) {
    throw new PreconditionFailedError(ctx.envFile, ".env with configuration");
  }
}

async function checkBundleTarget(ctx: ExporterContext, bundlePath: string): Promise<void> {
  const reserved = ctx.volumes.find(isReservedVolumeName);
  if (reserved) {
    throw new DeployError(`Volume ${reserved} cannot be exported: its snapshot would replace the project archive`);
  }
  if (await pathExists(bundlePath)) {
    throw new PreconditionFailedError("a free bundle path", `${bundlePath} already exists; choose another --out`);
  }
}

export function resolveBundlePath(ctx: ExporterContext, out: string | undefined, now: Date): string {
  if (out) {
    return path.resolve(out);
  }
  return path.join(ctx.bundle.outputDir, generateBundleName(ctx.bundle.prefix, now));
}

async function buildBundle(
  ctx: ExporterContext,
  deps: ExporterDeps,
  bundlePath: string,
  options: ExportOptions,
  now: Date,
): Promise<{ snapshots: Snapshot[]; project: ProjectPackage; bundle: Bundle }> {
  const stagingDir = await makeScratchDir("n8n-deploy-export-", deps.scratchParent);
  logger.debug(`Creating export workspace: ${stagingDir}`);

  try {
    const snapshotter = new VolumeSnapshotter(deps.volumes);
    const snapshots: Snapshot[] = [];
    for (const volumeName of ctx.volumes) {
      snapshots.push(await snapshotter.snapshot(volumeName, stagingDir));
    }

    const packager = new ProjectPackager(ctx.projectRoot, deps.archiver);
    const project = await packager.package(
      options.projectFiles ?? ctx.bundle.projectFiles,
      stagingDir,
    );

    const assembler = new BundleAssembler(deps.archiver, { scratchParent: deps.scratchParent });
    const bundle = await assembler.assemble(project, snapshots, bundlePath, now);

    return { snapshots, project, bundle };
  } finally {
    await removeDir(stagingDir);
    logger.debug(`Cleaned up export workspace: ${stagingDir}`);
  }
}

export async function exportBundle(
  ctx: ExporterContext,
  deps: ExporterDeps,
  options: ExportOptions = {},
): Promise<ExportResult> {
  const startTime = Date.now();
  const now = new Date();

  await checkExportPreconditions(ctx);

  const bundlePath = resolveBundlePath(ctx, options.out, now);
  await checkBundleTarget(ctx, bundlePath);
  logger.info(`Exporting ${ctx.volumes.length} volume(s) to ${bundlePath}`);

  const running = await deps.stack.isRunning();
  const shouldQuiesce = running && (options.quiesce ?? ctx.bundle.quiesce);

  if (shouldQuiesce) {
    await deps.stack.quiesce();
  } else if (running) {
    logger.warn(
      "Services are running while volumes are snapshotted. The database snapshot " +
        "may be inconsistent; export without --no-quiesce to stop them first.",
    );
  }

  let built: Awaited<ReturnType<typeof buildBundle>>;
  try {
    built = await buildBundle(ctx, deps, bundlePath, options, now);
  } catch (error) {
    if (shouldQuiesce) {
      await resumeAfterFailure(deps.stack);
    }
    throw error;
  }

  if (shouldQuiesce) {
    await deps.stack.resume();
  }

  const durationMs = Date.now() - startTime;
  logger.info(
    `Export completed in ${formatDuration(durationMs)}: ${built.bundle.bundleName} (${formatBytes(built.bundle.sizeBytes)})`,
  );

  return {
    ...built,
    quiesced: shouldQuiesce,
    ranWhileLive: running && !shouldQuiesce,
    durationMs,
  };
}

async function resumeAfterFailure(stack: ExporterDeps["stack"]): Promise<void> {
  logger.info("Export failed, starting the stopped services again...");
  try {
    await stack.resume();
  } catch (error) {
    logger.error(`Services could not be started again, start them manually: ${errorMessage(error)}`);
  }
}
