import type { SketchDatabase } from "./sketch/sketch-database.js";
import type {
  ImplementationInfo,
  SketchDistance,
} from "./sketch/sketch-interface.js";

/**
 * Where the data in a namespace came from
 */
export interface NamespaceSourceInfo {
  dataSourceId: string;
  sourceDatabaseId?: string;
  description?: string;
}

/**
 * A named collection of sketched sequences sharing one implementation.
 * The sketch database is named after the namespace ID.
 */
export interface Namespace {
  id: string;
  /** Identifies the data load the metadata belongs to */
  loadId: string;
  sourceInfo: NamespaceSourceInfo;
  sketchDatabase: SketchDatabase;
  modifiedAt: Date;
}

export interface SequenceMetadata {
  id: string;
  sourceId: string;
  scientificName?: string;
  relatedIds: Record<string, string>;
  createdAt: Date;
}

/**
 * A distance joined to the namespace and metadata of the matched sequence
 */
export interface SequenceMatch {
  namespaceId: string;
  distance: SketchDistance;
  metadata: SequenceMetadata;
}

export interface SequenceMatches {
  namespaces: Namespace[];
  implementation: ImplementationInfo;
  matches: SequenceMatch[];
  warnings: string[];
}

export interface MeasureDistanceRequest {
  namespaceIds: string[];
  /** Path to an untrusted sketch file */
  querySketchPath: string;
  /** Out of range values are replaced by the default */
  returnCount: number;
  /** Require exact sketch parameter matches */
  strict: boolean;
}
