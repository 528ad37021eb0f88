/**
 * Distance Aggregator
 *
 * Runs the distance computation across all target namespaces at once and
 * joins each distance to the stored metadata of the matched sequence.
 */

import { HomologyError, isHomologyError } from "./errors.js";
import type { SketchDatabase } from "./sketch/sketch-database.js";
import type {
  SketchDistance,
  SketchToolInstance,
} from "./sketch/sketch-interface.js";
import type { HomologyStore } from "./store.js";
import type { Namespace, SequenceMatch, SequenceMetadata } from "./types.js";

export const DEFAULT_RETURN_COUNT = 10;
export const MAX_RETURN_COUNT = 100;

/**
 * Out of range counts fall back to the default rather than being rejected
 */
export function sanitizeReturnCount(returnCount: number): number {
  if (
    !Number.isInteger(returnCount) ||
    returnCount < 1 ||
    returnCount > MAX_RETURN_COUNT
  ) {
    return DEFAULT_RETURN_COUNT;
  }
  return returnCount;
}

export interface ComputeMatchesInput {
  instance: SketchToolInstance;
  store: HomologyStore;
  namespaces: Namespace[];
  query: SketchDatabase;
  returnCount: number;
  strict: boolean;
}

/**
 * Compute the nearest sequences to the query and join them to their metadata
 *
 * @returns At most the sanitized return count of matches, sorted by distance,
 * then namespace ID, then sequence ID
 * @throws HomologyError TOOL_FAILURE if the capability fails, DATA_CORRUPTION
 * if a distance cannot be joined to stored metadata
 */
export async function computeMatches(
  input: ComputeMatchesInput,
): Promise<SequenceMatch[]> {
  const { instance, store, namespaces, query, strict } = input;
  const returnCount = sanitizeReturnCount(input.returnCount);
  const implementation = instance.implementationInfo.implementationName;

  let distances: SketchDistance[];
  try {
    const result = await instance.computeDistances(
      query,
      namespaces.map((ns) => ns.sketchDatabase),
      returnCount,
      strict,
    );
    // compatibility warnings were already gathered per namespace
    if (result.warnings.length > 0) {
      console.warn(
        `${implementation} warnings while computing distances:`,
        result.warnings,
      );
    }
    distances = result.distances;
  } catch (error) {
    console.error(`Unexpected error running ${implementation}:`, error);
    throw new HomologyError(
      "TOOL_FAILURE",
      `Unexpected error running implementation ${implementation}`,
      { details: { implementation }, cause: error },
    );
  }

  const byDatabaseName = new Map(
    namespaces.map((ns) => [ns.sketchDatabase.name, ns] as const),
  );
  const grouped = groupByNamespace(distances, byDatabaseName, implementation);
  const metadata = await fetchMetadata(store, grouped);

  const matches: SequenceMatch[] = [];
  for (const [ns, records] of grouped) {
    const sequences = metadata.get(ns.id);
    for (const distance of records) {
      const meta = sequences?.get(distance.sequenceId);
      if (!meta) {
        throw corruption(
          ns,
          `metadata for sequence ${distance.sequenceId} was not returned`,
        );
      }
      matches.push({ namespaceId: ns.id, distance, metadata: meta });
    }
  }

  return matches.sort(compareMatches).slice(0, returnCount);
}

function groupByNamespace(
  distances: SketchDistance[],
  byDatabaseName: Map<string, Namespace>,
  implementation: string,
): Map<Namespace, SketchDistance[]> {
  const grouped = new Map<Namespace, SketchDistance[]>();
  for (const distance of distances) {
    const ns = byDatabaseName.get(distance.referenceDatabaseName);
    if (!ns) {
      throw new HomologyError(
        "TOOL_FAILURE",
        `Implementation ${implementation} returned a distance for unknown sketch database ${distance.referenceDatabaseName}`,
        { details: { implementation } },
      );
    }
    const records = grouped.get(ns) ?? [];
    records.push(distance);
    grouped.set(ns, records);
  }
  return grouped;
}

async function fetchMetadata(
  store: HomologyStore,
  grouped: Map<Namespace, SketchDistance[]>,
): Promise<Map<string, Map<string, SequenceMetadata>>> {
  const result = new Map<string, Map<string, SequenceMetadata>>();
  for (const [ns, records] of grouped) {
    const ids = [...new Set(records.map((r) => r.sequenceId))];
    let metadata: SequenceMetadata[];
    try {
      metadata = await store.getSequenceMetadata(ns.id, ns.loadId, ids);
    } catch (error) {
      if (isHomologyError(error) && error.kind === "NO_SUCH_SEQUENCE") {
        throw corruption(ns, error.message, error);
      }
      throw error;
    }
    result.set(ns.id, new Map(metadata.map((m) => [m.id, m])));
  }
  return result;
}

function corruption(
  ns: Namespace,
  reason: string,
  cause?: unknown,
): HomologyError {
  const error = new HomologyError(
    "DATA_CORRUPTION",
    `Database is corrupt. Unable to find sequences from sketch file for namespace ${ns.id}: ${reason}`,
    { details: { namespaceId: ns.id, loadId: ns.loadId }, cause },
  );
  console.error(error.message);
  return error;
}

function compareMatches(a: SequenceMatch, b: SequenceMatch): number {
  return (
    a.distance.distance - b.distance.distance ||
    compareText(a.namespaceId, b.namespaceId) ||
    compareText(a.distance.sequenceId, b.distance.sequenceId)
  );
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
