import type { ImplementationInfo } from "./sketch/sketch-interface.js";
import type { Namespace, SequenceMatch, SequenceMatches } from "./types.js";

/**
 * Bundle the parts of a search response. Namespaces are ordered by ID and
 * warnings are de-duplicated, keeping the first occurrence.
 */
export function assembleSequenceMatches(
  namespaces: Namespace[],
  implementation: ImplementationInfo,
  matches: SequenceMatch[],
  warnings: Iterable<string>,
): SequenceMatches {
  return {
    namespaces: [...namespaces].sort((a, b) =>
      a.id < b.id ? -1 : a.id > b.id ? 1 : 0,
    ),
    implementation: { ...implementation },
    matches: [...matches],
    warnings: [...new Set(warnings)],
  };
}
