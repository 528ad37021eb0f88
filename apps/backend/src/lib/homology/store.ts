import type { Namespace, SequenceMetadata } from "./types.js";

/**
 * Read access to namespaces and sequence metadata
 */
export interface HomologyStore {
  listNamespaces(): Promise<Namespace[]>;

  /**
   * @throws HomologyError NO_SUCH_NAMESPACE if there is no such namespace
   */
  getNamespace(namespaceId: string): Promise<Namespace>;

  /**
   * Fetch metadata for a batch of sequences from one namespace load
   *
   * @throws HomologyError NO_SUCH_SEQUENCE if any of the IDs is missing
   */
  getSequenceMetadata(
    namespaceId: string,
    loadId: string,
    sequenceIds: string[],
  ): Promise<SequenceMetadata[]>;
}
