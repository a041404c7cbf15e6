export {
  runArchive,
  planArchive,
  indexTrees,
  markSubdir,
  restoreSubdir,
  OperatorCommandError,
  type ArchiveOptions,
  type ArchiveRun,
} from "./archive.js";

export {
  planReconciliation,
  pairEntry,
  describePairing,
  isActing,
  ANOMALY_CATEGORIES,
  type ActingAction,
  type ActingPairing,
  type Anomaly,
  type AnomalyCategory,
  type Pairing,
  type PairingAction,
  type ReconcilePlan,
  type ReconcilePolicy,
  type SkippedPairing,
} from "./reconcile.js";

export {
  buildIdentityIndex,
  lookupById,
  lookupByName,
  type DuplicateIdentity,
  type IdentityIndex,
  type TreeSide,
} from "./identity-index.js";

export {
  scanTree,
  TreeRootError,
  type SubdirEntry,
  type TreeScan,
  type MarkerWarning,
} from "./scan.js";

export {
  UNIDENTIFIED,
  identified,
  identityId,
  parseMarker,
  formatMarker,
  readMarker,
  writeMarker,
  generateIdentity,
  type Identity,
  type MarkerParse,
  type MarkerRead,
} from "./identity.js";

export {
  FsActionExecutor,
  executePlan,
  applyPairing,
  type ActionExecutor,
  type MirrorFn,
  type ExecutionResult,
  type ExecutionFailure,
  type AppliedPairing,
} from "./executor.js";

export {
  ConsoleReporter,
  CollectingReporter,
  formatAnomaly,
  formatMarkerWarning,
  renderPlanTable,
  type Reporter,
  type RunSummary,
} from "./report.js";

export { rsyncMirror, RsyncError, DiskFullError } from "./rsync.js";

export { detectFileRenames, type FileRename } from "./file-renames.js";

export {
  ConsoleLogger,
  StructuredLogger,
  NullLogger,
  MemoryLogger,
  parseLogLevel,
  type Logger,
  type LogLevel,
} from "./logger.js";
