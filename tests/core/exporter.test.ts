import { mkdir, readdir, readFile, unlink, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { exportBundle, resolveBundlePath } from "../../src/core/bundle";
import type { DeploymentContext } from "../../src/types";
import { MissingRequiredFileError, PreconditionFailedError, SnapshotFailedError } from "../../src/utils/errors";
import { pathExists } from "../../src/utils/fs";
import {
  FakeStack,
  JsonArchiver,
  listDir,
  MemoryVolumeStore,
  makeContext,
  makeTempDir,
  removeTempDir,
  treeOf,
  writeProject,
} from "../helpers/fakes";

describe("exportBundle", () => {
  let tempDir: string;
  let scratchParent: string;
  let root: string;
  let ctx: DeploymentContext;
  let store: MemoryVolumeStore;
  let archiver: JsonArchiver;

  beforeEach(async () => {
    tempDir = await makeTempDir("exporter");
    scratchParent = path.join(tempDir, "scratch");
    root = path.join(tempDir, "project");
    await mkdir(scratchParent);
    await writeProject(root);
    ctx = makeContext(root);
    store = new MemoryVolumeStore({
      "app-data": treeOf({ "a.txt": "hello" }),
      "db-data": treeOf({ "b.bin": [1, 2] }),
    });
    archiver = new JsonArchiver();
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  function deps(stack: FakeStack) {
    return { volumes: store, archiver, stack, scratchParent };
  }

  test("stops a running stack, bundles and starts it again", async () => {
    const stack = new FakeStack(true);
    const out = path.join(tempDir, "out.tgz");

    const result = await exportBundle(ctx, deps(stack), { out });

    expect(stack.calls).toEqual(["isRunning", "quiesce", "resume"]);
    expect(result.quiesced).toBe(true);
    expect(result.ranWhileLive).toBe(false);
    expect(result.bundle.bundlePath).toBe(out);
    expect(result.snapshots.map((s) => s.volumeName)).toEqual(["app-data", "db-data"]);
    expect(result.project.entries).toEqual(["compose.yml", ".env"]);
    expect(result.project.skipped).toEqual(["README.md", "nginx", "local-files"]);
    expect(await pathExists(out)).toBe(true);
    expect(await listDir(scratchParent)).toEqual([]);
  });

  test("leaves a stopped stack stopped", async () => {
    const stack = new FakeStack(false);
    const result = await exportBundle(ctx, deps(stack), { out: path.join(tempDir, "out.tgz") });

    expect(stack.calls).toEqual(["isRunning"]);
    expect(result.quiesced).toBe(false);
    expect(result.ranWhileLive).toBe(false);
  });

  test("snapshots a live stack when quiesce is off", async () => {
    const stack = new FakeStack(true);
    const result = await exportBundle(ctx, deps(stack), { out: path.join(tempDir, "out.tgz"), quiesce: false });

    expect(stack.calls).toEqual(["isRunning"]);
    expect(result.ranWhileLive).toBe(true);
  });

  test("names the bundle after the prefix and time in the output dir", async () => {
    const result = await exportBundle(ctx, deps(new FakeStack()));

    expect(path.dirname(result.bundle.bundlePath)).toBe(root);
    expect(result.bundle.bundleName).toMatch(/^n8n-bundle-\d{4}-\d{2}-\d{2}-\d{6}\.tgz$/);
    expect(result.bundle.bundleName.startsWith("n8n-bundle-")).toBe(true);
  });

  test("resolveBundlePath prefers --out", () => {
    const now = new Date(2024, 8, 2, 12, 0, 0);
    expect(resolveBundlePath(ctx, undefined, now)).toBe(path.join(root, "n8n-bundle-2024-09-02-120000.tgz"));
    expect(resolveBundlePath(ctx, "/srv/x.tgz", now)).toBe("/srv/x.tgz");
  });

  test("checks the project files before touching the stack", async () => {
    await unlink(ctx.envFile);
    const stack = new FakeStack(true);

    await expect(exportBundle(ctx, deps(stack))).rejects.toBeInstanceOf(PreconditionFailedError);
    expect(stack.calls).toEqual([]);
  });

  test("refuses an existing bundle path before touching the stack", async () => {
    const out = path.join(tempDir, "out.tgz");
    await writeFile(out, "earlier bundle");
    const stack = new FakeStack(true);

    await expect(exportBundle(ctx, deps(stack), { out })).rejects.toBeInstanceOf(PreconditionFailedError);
    expect(stack.calls).toEqual([]);
    expect(await readFile(out, "utf8")).toBe("earlier bundle");
  });

  test("refuses a volume named after the project archive before touching the stack", async () => {
    const stack = new FakeStack(true);
    const out = path.join(tempDir, "out.tgz");

    await expect(exportBundle({ ...ctx, volumes: ["project", "db-data"] }, deps(stack), { out })).rejects.toThrow(
      "Volume project cannot be exported: its snapshot would replace the project archive",
    );
    expect(stack.calls).toEqual([]);
    expect(await pathExists(out)).toBe(false);
  });

  test("a failed snapshot emits no bundle and still restarts the stack", async () => {
    store.failSnapshotOf = "db-data";
    const stack = new FakeStack(true);
    const out = path.join(tempDir, "out.tgz");

    await expect(exportBundle(ctx, deps(stack), { out })).rejects.toBeInstanceOf(SnapshotFailedError);

    expect(stack.calls).toEqual(["isRunning", "quiesce", "resume"]);
    expect(await pathExists(out)).toBe(false);
    expect(await listDir(scratchParent)).toEqual([]);
  });

  test("the original error wins when the restart also fails", async () => {
    store.failSnapshotOf = "app-data";
    const stack = new FakeStack(true);
    stack.resumeError = new Error("compose up failed");

    await expect(exportBundle(ctx, deps(stack), { out: path.join(tempDir, "out.tgz") })).rejects.toBeInstanceOf(
      SnapshotFailedError,
    );
  });

  test("a missing required project file fails the export", async () => {
    const stack = new FakeStack(false);
    const out = path.join(tempDir, "out.tgz");

    await expect(
      exportBundle(ctx, deps(stack), {
        out,
        projectFiles: [
          { path: "compose.yml", required: true },
          { path: "manage.yml", required: true },
        ],
      }),
    ).rejects.toBeInstanceOf(MissingRequiredFileError);
    expect(await readdir(tempDir)).not.toContain("out.tgz");
  });
});
