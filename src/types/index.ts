/**
 * Centralized type exports
 */

// Bundle types
export type {
  ArchiveDigest,
  Archiver,
  Bundle,
  BundleManifest,
  ExportOptions,
  ExportResult,
  ProjectPackage,
  RestoreOptions,
  RestoreResult,
  Snapshot,
  VolumeStore,
} from "./bundle";
// Config types
export type {
  BundleSettings,
  DeployConfig,
  DeploymentContext,
  DockerSettings,
  ProjectFileEntry,
  ProxySettings,
  ServiceSettings,
} from "./config";
// Stack types
export type { ComposeRunOptions, ComposeRunner, ServiceHealth, ServiceStatus } from "./stack";
