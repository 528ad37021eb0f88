import type { HomologyStore } from "../../lib/homology/store.js";
import {
  namespacesRepository,
  type NamespacesRepository,
} from "./namespaces.repo.js";
import {
  sequenceMetadataRepository,
  type SequenceMetadataRepository,
} from "./sequence-metadata.repo.js";

export * from "./namespaces.repo.js";
export * from "./sequence-metadata.repo.js";

/**
 * Expose the repositories through the store interface the service uses
 */
export function createRepositoryStore(
  namespaces: Pick<NamespacesRepository, "findAll" | "findById"> = namespacesRepository,
  sequences: Pick<SequenceMetadataRepository, "findByIds"> = sequenceMetadataRepository,
): HomologyStore {
  return {
    listNamespaces: () => namespaces.findAll(),
    getNamespace: (namespaceId) => namespaces.findById(namespaceId),
    getSequenceMetadata: (namespaceId, loadId, sequenceIds) =>
      sequences.findByIds(namespaceId, loadId, sequenceIds),
  };
}
