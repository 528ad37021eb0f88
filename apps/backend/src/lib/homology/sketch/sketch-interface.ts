/**
 * Sketch Capability Interface
 *
 * Defines the core abstractions for sketch comparison capabilities.
 * Supports pluggable implementations (Mash, Sourmash, ...) selected by the
 * implementation name stored with each namespace.
 */

import type { SketchDatabase } from "./sketch-database.js";

/**
 * Parameters a sketch database was built with
 */
export interface SketchParameters {
  /** k-mer length used when hashing sequences */
  kmerSize: number;

  /** Seed of the hash function */
  hashSeed: number;

  /** Fixed number of hashes kept per sketch; absent for scaled sketches */
  sketchSize?: number;

  /** Scaling factor for scaled sketches; absent for fixed size sketches */
  scalingFactor?: number;
}

/**
 * One distance measured from the query to a sequence in a reference database
 */
export interface SketchDistance {
  /** Name of the sketch database the sequence belongs to */
  referenceDatabaseName: string;

  /** ID of the sequence within that database */
  sequenceId: string;

  /** Estimated distance, lower is closer */
  distance: number;
}

/**
 * Result of a distance computation
 */
export interface SketchDistanceSet {
  distances: SketchDistance[];

  /** Advisory output from the implementation */
  warnings: string[];
}

/**
 * Name and version of the implementation that produced a result
 */
export interface ImplementationInfo {
  implementationName: string;
  implementationVersion?: string;
}

/**
 * A capability bound to a temporary directory for one request
 */
export interface SketchToolInstance {
  readonly implementationInfo: ImplementationInfo;

  /**
   * Load a sketch database from a file
   *
   * @param name - Name to give the database
   * @param location - Path to the sketch file
   * @throws SketchToolError NOT_A_SKETCH if the file is not a sketch this
   * implementation understands, TOOL_FAILED otherwise
   */
  loadSketchDatabase(name: string, location: string): Promise<SketchDatabase>;

  /**
   * Measure the distance from the query to every sequence in the references
   *
   * @param query - Single sequence query database
   * @param references - Databases to search
   * @param maxResults - Maximum number of distances across all references
   * @param strict - Whether sketch parameters must match exactly
   * @returns At most `maxResults` nearest distances
   */
  computeDistances(
    query: SketchDatabase,
    references: SketchDatabase[],
    maxResults: number,
    strict: boolean,
  ): Promise<SketchDistanceSet>;
}

/**
 * Factory for a sketch comparison capability
 */
export interface SketchProvider {
  /**
   * Returns the implementation name (e.g., "mash")
   */
  readonly implementationName: string;

  /**
   * File extension clients should use for sketches of this implementation
   */
  readonly expectedFileExtension?: string;

  /**
   * Create an instance that keeps its temporary files in `tempDir`
   *
   * @throws SketchToolError INIT_FAILED if the environment cannot run the tool
   */
  instantiate(tempDir: string): Promise<SketchToolInstance>;
}

export type SketchToolErrorKind =
  | "NOT_A_SKETCH"
  | "INIT_FAILED"
  | "TOOL_FAILED"
  | "INCOMPATIBLE_SKETCHES";

/**
 * Failure reported by a capability. `toolOutput` holds whatever the
 * underlying tool printed, for logging only.
 */
export class SketchToolError extends Error {
  public readonly kind: SketchToolErrorKind;
  public readonly toolOutput?: string;

  constructor(
    kind: SketchToolErrorKind,
    message: string,
    options: { toolOutput?: string; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "SketchToolError";
    this.kind = kind;
    this.toolOutput = options.toolOutput;
  }
}

export function isSketchToolError(
  error: unknown,
  kind?: SketchToolErrorKind,
): error is SketchToolError {
  return (
    error instanceof SketchToolError && (kind === undefined || error.kind === kind)
  );
}
