import { mkdir } from "node:fs/promises";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { TarArchiver } from "../../src/core/archive/tar";
import { BundleAssembler, BundleRestorer, ProjectPackager, VolumeSnapshotter } from "../../src/core/bundle";
import type { Archiver } from "../../src/types";
import {
  FakeStack,
  type FileTree,
  JsonArchiver,
  listDir,
  MemoryVolumeStore,
  makeContext,
  makeTempDir,
  removeTempDir,
  treeOf,
  writeProject,
} from "../helpers/fakes";

function copyTree(tree: FileTree | undefined): FileTree {
  return new Map(tree ?? []);
}

describe.each([
  ["json archiver", (): Archiver => new JsonArchiver()],
  ["system tar", (): Archiver => new TarArchiver()],
])("assemble then restore (%s)", (_name, makeArchiver) => {
  let tempDir: string;
  let scratchParent: string;

  beforeEach(async () => {
    tempDir = await makeTempDir("round-trip");
    scratchParent = path.join(tempDir, "scratch");
    await mkdir(scratchParent);
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  test("reproduces every volume after the volumes are deleted", async () => {
    const archiver = makeArchiver();
    const source = path.join(tempDir, "source");
    await writeProject(source);
    const ctx = makeContext(source);

    const store = new MemoryVolumeStore({
      "app-data": treeOf({ "a.txt": "hello" }),
      "db-data": treeOf({ "b.bin": [1, 2] }),
    });
    const before = { app: copyTree(store.volumes.get("app-data")), db: copyTree(store.volumes.get("db-data")) };

    const staging = path.join(tempDir, "staging");
    await mkdir(staging);
    const snapshotter = new VolumeSnapshotter(store);
    const snapshots = [await snapshotter.snapshot("app-data", staging), await snapshotter.snapshot("db-data", staging)];
    const project = await new ProjectPackager(source, archiver).package(ctx.bundle.projectFiles, staging);
    const bundle = await new BundleAssembler(archiver, { scratchParent }).assemble(
      project,
      snapshots,
      path.join(tempDir, "n8n-bundle.tgz"),
    );

    store.remove("app-data");
    store.remove("db-data");

    const target = path.join(tempDir, "target");
    const result = await new BundleRestorer(makeContext(target), { volumes: store, archiver, stack: new FakeStack() }, {
      scratchParent,
    }).restore(bundle.bundlePath);

    expect(result.volumesCreated).toEqual(["app-data", "db-data"]);
    expect(store.volumes.get("app-data")).toEqual(before.app);
    expect(store.volumes.get("db-data")).toEqual(before.db);
    expect(store.volumes.get("app-data")?.get("a.txt")?.toString()).toBe("hello");
    expect([...(store.volumes.get("db-data")?.get("b.bin") ?? [])]).toEqual([1, 2]);

    expect(await listDir(target)).toEqual([".env", "compose.yml"]);
    expect(await listDir(scratchParent)).toEqual([]);
  });
});
