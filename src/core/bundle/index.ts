/**
 * Bundle module exports
 */

export { type AssemblerOptions, BundleAssembler } from "./assembler";
export {
  checkExportPreconditions,
  type ExporterContext,
  type ExporterDeps,
  exportBundle,
  resolveBundlePath,
} from "./exporter";
export {
  buildManifest,
  findManifestMismatches,
  MANIFEST_FILE,
  MANIFEST_FORMAT_VERSION,
  parseManifest,
} from "./manifest";
export { ProjectPackager } from "./project-packager";
export {
  BundleRestorer,
  type RestorerContext,
  type RestorerDeps,
  type RestorerOptions,
} from "./restorer";
export { VolumeSnapshotter } from "./volume-snapshotter";
