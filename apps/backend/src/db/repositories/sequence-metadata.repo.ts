import { and, eq, inArray } from "drizzle-orm";

import { HomologyError } from "../../lib/homology/errors.js";
import type { SequenceMetadata } from "../../lib/homology/types.js";
import { db } from "../index.js";
import { sequenceMetadataTable } from "../schema.js";
import { toSequenceMetadata } from "./mappers.js";

/**
 * Sequence Metadata Repository
 *
 * Batched reads of sequence metadata for one namespace load.
 */
export class SequenceMetadataRepository {
  /**
   * Find metadata for a batch of sequences
   *
   * @param namespaceId - Namespace the sequences belong to
   * @param loadId - Data load of the namespace
   * @param sequenceIds - Sequence IDs to fetch
   * @returns One entry per distinct ID
   * @throws HomologyError NO_SUCH_SEQUENCE listing the IDs that were not found
   */
  async findByIds(
    namespaceId: string,
    loadId: string,
    sequenceIds: string[],
  ): Promise<SequenceMetadata[]> {
    const wanted = [...new Set(sequenceIds)];
    if (wanted.length === 0) {
      return [];
    }

    const rows = await db
      .select()
      .from(sequenceMetadataTable)
      .where(
        and(
          eq(sequenceMetadataTable.namespace_id, namespaceId),
          eq(sequenceMetadataTable.load_id, loadId),
          inArray(sequenceMetadataTable.sequence_id, wanted),
        ),
      );

    const found = new Set(rows.map((row) => row.sequence_id));
    const missing = wanted.filter((id) => !found.has(id));
    if (missing.length > 0) {
      throw new HomologyError(
        "NO_SUCH_SEQUENCE",
        `Missing sequence(s) in namespace ${namespaceId} with load id ${loadId}: ${missing.join(", ")}`,
        { details: { namespaceId, loadId, missing } },
      );
    }
    return rows.map(toSequenceMetadata);
  }
}

export const sequenceMetadataRepository = new SequenceMetadataRepository();
