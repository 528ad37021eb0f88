import { SketchDatabase } from "../../lib/homology/sketch/sketch-database.js";
import type {
  Namespace,
  SequenceMetadata,
} from "../../lib/homology/types.js";
import type { NamespaceRow, SequenceMetadataRow } from "../schema.js";

/**
 * Build a namespace from its row. The sketch database is named after the
 * namespace so distances can be traced back to it.
 */
export function toNamespace(row: NamespaceRow): Namespace {
  return {
    id: row.namespace_id,
    loadId: row.load_id,
    sourceInfo: {
      dataSourceId: row.data_source_id,
      sourceDatabaseId: row.source_database_id ?? undefined,
      description: row.description ?? undefined,
    },
    sketchDatabase: new SketchDatabase({
      name: row.namespace_id,
      implementationName: row.implementation,
      location: row.sketch_location,
      parameters: {
        kmerSize: row.kmer_size,
        hashSeed: row.hash_seed,
        sketchSize: row.sketch_size ?? undefined,
        scalingFactor: row.scaling_factor ?? undefined,
      },
      sequenceCount: row.sequence_count,
    }),
    modifiedAt: row.modified_at,
  };
}

export function toSequenceMetadata(row: SequenceMetadataRow): SequenceMetadata {
  return {
    id: row.sequence_id,
    sourceId: row.source_id,
    scientificName: row.scientific_name ?? undefined,
    relatedIds: { ...row.related_ids },
    createdAt: row.created_at,
  };
}
