/**
 * Artifact and run-state stores
 * @module @loadramp/core/stores
 */

export {
  MemoryArtifactStore,
  normalizeArtifactPath,
  joinArtifactPath,
  directoriesUnder,
  type ArtifactStore,
} from './artifact-store';

export { FsArtifactStore } from './fs-artifact-store';

export { HostArtifactStore } from './host-artifact-store';

export {
  RunStateStore,
  RUNNING_MARKER,
  DONE_MARKER,
  ALL_DONE_MARKER,
  serializeRunMarker,
  parseRunMarker,
  parseTimestampMarker,
  deriveRunState,
  type MarkerScope,
} from './run-state-store';

export {
  ResultsBundle,
  BUNDLE_FILES,
  formatResultsRow,
  formatHealthRow,
  parseResultsTable,
  parseHealthTable,
  type BundleFile,
  type RecordedOutcome,
} from './results-bundle';
