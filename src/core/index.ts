/**
 * Core module exports
 */

// Archive
export { TarArchiver } from "./archive/tar";

// Bundle
export {
  BundleAssembler,
  BundleRestorer,
  checkExportPreconditions,
  exportBundle,
  ProjectPackager,
  VolumeSnapshotter,
} from "./bundle";

// Doctor
export { type CheckStatus, type DoctorCheck, doctorPassed, runDoctor } from "./doctor";

// Stack
export { StackController } from "./stack";
