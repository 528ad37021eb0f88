/**
 * Cross-namespace compatibility checks, run before any distance is computed.
 */

import { HomologyError } from "./errors.js";
import type { SketchDatabase } from "./sketch/sketch-database.js";
import { isSketchToolError, type SketchProvider } from "./sketch/sketch-interface.js";
import type { SketchProviderRegistry } from "./sketch/sketch-provider-registry.js";
import type { Namespace } from "./types.js";

/**
 * Find the single provider shared by all the namespaces
 *
 * @throws HomologyError INCOMPATIBLE_NAMESPACES if the namespaces use more
 * than one implementation, MISCONFIGURED if the implementation is stored in
 * the database but not registered
 */
export function resolveProvider(
  namespaces: Namespace[],
  registry: SketchProviderRegistry,
): SketchProvider {
  const names = new Set(
    namespaces.map((ns) => ns.sketchDatabase.implementationName.toLowerCase()),
  );
  if (names.size !== 1) {
    throw new HomologyError(
      "INCOMPATIBLE_NAMESPACES",
      "The selected namespaces must share the same implementation",
      { details: { implementations: [...names].sort() } },
    );
  }
  const [implementation] = names;
  if (!registry.has(implementation)) {
    throw new HomologyError(
      "MISCONFIGURED",
      `Application is misconfigured. Implementation ${implementation} stored in database but not available.`,
      { details: { implementation } },
    );
  }
  return registry.get(implementation);
}

/**
 * Check the query sketch against each namespace's sketch database
 *
 * @returns Warnings for tolerated differences, prefixed with the namespace ID
 * @throws HomologyError INCOMPATIBLE_SKETCHES for the first namespace that
 * cannot be queried with the sketch
 */
export function checkNamespaceCompatibility(
  namespaces: Namespace[],
  query: SketchDatabase,
  strict: boolean,
): string[] {
  const warnings: string[] = [];
  for (const ns of namespaces) {
    let messages: string[];
    try {
      messages = ns.sketchDatabase.checkQueryCompatibility(query, strict);
    } catch (error) {
      if (isSketchToolError(error, "INCOMPATIBLE_SKETCHES")) {
        throw new HomologyError(
          "INCOMPATIBLE_SKETCHES",
          `Unable to query namespace ${ns.id} with input sketch: ${error.message}`,
          { details: { namespaceId: ns.id }, cause: error },
        );
      }
      throw error;
    }
    warnings.push(...messages.map((m) => `Namespace ${ns.id}: ${m}`));
  }
  return warnings;
}
