/**
 * In-process stand-ins for the container runtime, tar and child processes
 */

import { mkdir, mkdtemp, readdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { DEFAULT_CONFIG } from "../../src/config/defaults";
import { resolveContext } from "../../src/config/resolver";
import type { Archiver, DeploymentContext, VolumeStore } from "../../src/types";
import type { CommandResult, CommandRunner, RunCommandOptions } from "../../src/utils/exec";

export type FileTree = Map<string, Buffer>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Archives are JSON: { files: { "<relative path>": "<base64>" } }
 */
export function encodeTree(tree: FileTree): string {
  const files: Record<string, string> = {};
  for (const [name, content] of tree) {
    files[name] = content.toString("base64");
  }
  return JSON.stringify({ files });
}

export function decodeTree(content: string): FileTree {
  const parsed: unknown = JSON.parse(content);
  if (!isRecord(parsed) || !isRecord(parsed.files)) {
    throw new Error("not a test archive");
  }
  const tree: FileTree = new Map();
  for (const [name, data] of Object.entries(parsed.files)) {
    if (typeof data !== "string") throw new Error(`bad entry ${name}`);
    tree.set(name, Buffer.from(data, "base64"));
  }
  return tree;
}

export function treeOf(files: Record<string, string | number[]>): FileTree {
  const tree: FileTree = new Map();
  for (const [name, content] of Object.entries(files)) {
    tree.set(name, typeof content === "string" ? Buffer.from(content) : Buffer.from(content));
  }
  return tree;
}

async function walk(root: string, relative: string, tree: FileTree): Promise<void> {
  const absolute = path.join(root, relative);
  const info = await stat(absolute);
  if (info.isDirectory()) {
    for (const entry of await readdir(absolute)) {
      await walk(root, path.posix.join(relative, entry), tree);
    }
  } else {
    tree.set(relative, await readFile(absolute));
  }
}

export async function writeTree(destDir: string, tree: FileTree): Promise<void> {
  for (const [name, content] of tree) {
    const target = path.join(destDir, name);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}

/**
 * Archiver over the real filesystem writing JSON trees instead of tarballs
 */
export class JsonArchiver implements Archiver {
  created: string[] = [];
  failCreate: Error | null = null;

  async create(archivePath: string, cwd: string, entries: string[]): Promise<void> {
    if (this.failCreate) throw this.failCreate;
    if (entries.length === 0) throw new Error("no entries");

    const tree: FileTree = new Map();
    for (const entry of entries) {
      await walk(cwd, entry, tree);
    }
    await writeFile(archivePath, encodeTree(tree));
    this.created.push(archivePath);
  }

  async extract(archivePath: string, destDir: string): Promise<void> {
    await writeTree(destDir, decodeTree(await readFile(archivePath, "utf8")));
  }
}

/**
 * Named volumes held in memory. Snapshots are written as JSON trees.
 */
export class MemoryVolumeStore implements VolumeStore {
  readonly volumes = new Map<string, FileTree>();
  /** Every call that changes a volume, as "<op>:<volume>" */
  readonly mutations: string[] = [];
  failSnapshotOf: string | null = null;
  /** Replay of this volume writes one file, then fails */
  failReplayOf: string | null = null;

  constructor(initial: Record<string, FileTree> = {}) {
    for (const [name, tree] of Object.entries(initial)) {
      this.volumes.set(name, new Map(tree));
    }
  }

  async exists(volumeName: string): Promise<boolean> {
    return this.volumes.has(volumeName);
  }

  async create(volumeName: string): Promise<void> {
    this.mutations.push(`create:${volumeName}`);
    this.volumes.set(volumeName, new Map());
  }

  async snapshot(volumeName: string, outputDir: string, archiveName: string): Promise<void> {
    if (volumeName === this.failSnapshotOf) {
      throw new Error("helper container exited with code 2");
    }
    const tree = this.volumes.get(volumeName);
    if (!tree) throw new Error(`no such volume: ${volumeName}`);
    await writeFile(path.join(outputDir, archiveName), encodeTree(tree));
  }

  async replay(volumeName: string, archivePath: string): Promise<void> {
    this.mutations.push(`replay:${volumeName}`);
    const tree = this.volumes.get(volumeName);
    if (!tree) throw new Error(`no such volume: ${volumeName}`);

    const incoming = decodeTree(await readFile(archivePath, "utf8"));
    for (const [name, content] of incoming) {
      tree.set(name, content);
      if (volumeName === this.failReplayOf) {
        throw new Error("no space left on device");
      }
    }
  }

  remove(volumeName: string): void {
    this.volumes.delete(volumeName);
  }
}

export class FakeStack {
  readonly calls: string[] = [];
  resumeError: Error | null = null;

  constructor(public running = false) {}

  async isRunning(): Promise<boolean> {
    this.calls.push("isRunning");
    return this.running;
  }

  async quiesce(): Promise<void> {
    this.calls.push("quiesce");
    this.running = false;
  }

  async resume(): Promise<void> {
    this.calls.push("resume");
    if (this.resumeError) throw this.resumeError;
    this.running = true;
  }
}

export interface RecordedCall {
  bin: string;
  args: string[];
  options: RunCommandOptions;
}

type Responder = (bin: string, args: string[]) => Partial<CommandResult> | undefined;

/**
 * CommandRunner that records every call. The responder decides each result;
 * unanswered calls succeed with empty output.
 */
export function fakeRunner(respond: Responder = () => undefined): {
  runner: CommandRunner;
  calls: RecordedCall[];
} {
  const calls: RecordedCall[] = [];
  const runner: CommandRunner = async (bin, args, options = {}) => {
    calls.push({ bin, args, options });
    const answer = respond(bin, args) ?? {};
    const exitCode = answer.exitCode ?? (answer.success === false ? 1 : 0);
    return {
      success: answer.success ?? exitCode === 0,
      stdout: answer.stdout ?? "",
      stderr: answer.stderr ?? "",
      exitCode,
    };
  };
  return { runner, calls };
}

export function makeTempDir(label: string): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), `n8n-deploy-${label}-test-`));
}

export function removeTempDir(dir: string): Promise<void> {
  return rm(dir, { recursive: true, force: true });
}

export function makeContext(projectRoot: string, volumes: string[] = ["app-data", "db-data"]): DeploymentContext {
  return resolveContext({ ...structuredClone(DEFAULT_CONFIG), volumes }, projectRoot, null);
}

/**
 * Write compose.yml and .env into a project root
 */
export async function writeProject(projectRoot: string, envContent = "N8N_ENCRYPTION_KEY=test-secret\n"): Promise<void> {
  await mkdir(projectRoot, { recursive: true });
  await writeFile(path.join(projectRoot, "compose.yml"), "services:\n  n8n:\n    image: n8nio/n8n\n");
  await writeFile(path.join(projectRoot, ".env"), envContent);
}

/**
 * Build a bundle by hand: one or more top-level directories holding the given
 * files, archived with the JSON archiver
 */
export async function writeBundle(
  workDir: string,
  bundlePath: string,
  dirs: Record<string, Record<string, string>>,
): Promise<void> {
  const staging = await mkdtemp(path.join(workDir, "bundle-src-"));
  for (const [dir, files] of Object.entries(dirs)) {
    await mkdir(path.join(staging, dir), { recursive: true });
    for (const [name, content] of Object.entries(files)) {
      await writeFile(path.join(staging, dir, name), content);
    }
  }
  await new JsonArchiver().create(bundlePath, staging, Object.keys(dirs));
  await rm(staging, { recursive: true, force: true });
}

export async function listDir(dir: string): Promise<string[]> {
  return (await readdir(dir)).sort();
}
