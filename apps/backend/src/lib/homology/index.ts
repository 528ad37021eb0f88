/**
 * Homology Module
 *
 * Exports the matching engine, the sketch capabilities and their types.
 */

// Core types
export type {
  MeasureDistanceRequest,
  Namespace,
  NamespaceSourceInfo,
  SequenceMatch,
  SequenceMatches,
  SequenceMetadata,
} from "./types.js";
export type { HomologyStore } from "./store.js";

// Errors
export {
  HomologyError,
  isHomologyError,
  isUserError,
  statusCodeFor,
  type HomologyErrorDetails,
  type HomologyErrorKind,
} from "./errors.js";

// Sketch capabilities
export {
  SketchToolError,
  isSketchToolError,
  type ImplementationInfo,
  type SketchDistance,
  type SketchDistanceSet,
  type SketchParameters,
  type SketchProvider,
  type SketchToolErrorKind,
  type SketchToolInstance,
} from "./sketch/sketch-interface.js";
export { SketchDatabase, type SketchDatabaseInit } from "./sketch/sketch-database.js";
export { SketchProviderRegistry } from "./sketch/sketch-provider-registry.js";
export {
  MASH_IMPLEMENTATION_NAME,
  MashSketchProvider,
  createExecaMashRunner,
  type MashRunner,
  type MashRunResult,
} from "./sketch/mash/mash-provider.js";

// Engine
export {
  DEFAULT_RETURN_COUNT,
  MAX_RETURN_COUNT,
  sanitizeReturnCount,
} from "./distance-aggregator.js";
export { QUERY_SKETCH_NAME } from "./query-loader.js";
export { withTempDirectory } from "./temp-directory.js";
export {
  HomologyService,
  type HomologyServiceOptions,
} from "./homology-service.js";
