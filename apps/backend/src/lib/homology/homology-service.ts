/**
 * Homology Service
 *
 * Integrates namespaces and sequence metadata from the store with the
 * distances a sketch capability measures from a query sequence to the sketch
 * databases of those namespaces.
 */

import {
  checkNamespaceCompatibility,
  resolveProvider,
} from "./compatibility.js";
import { computeMatches } from "./distance-aggregator.js";
import { HomologyError } from "./errors.js";
import { loadQuerySketch } from "./query-loader.js";
import { assembleSequenceMatches } from "./sequence-matches.js";
import {
  isSketchToolError,
  type SketchProvider,
  type SketchToolInstance,
} from "./sketch/sketch-interface.js";
import type { SketchProviderRegistry } from "./sketch/sketch-provider-registry.js";
import type { HomologyStore } from "./store.js";
import { withTempDirectory } from "./temp-directory.js";
import type {
  MeasureDistanceRequest,
  Namespace,
  SequenceMatches,
} from "./types.js";

export interface HomologyServiceOptions {
  store: HomologyStore;
  registry: SketchProviderRegistry;
  /** Directory that per-request temporary directories are created in */
  tempDirectory: string;
}

export class HomologyService {
  private readonly store: HomologyStore;
  private readonly registry: SketchProviderRegistry;
  private readonly tempDirectory: string;

  constructor(options: HomologyServiceOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.tempDirectory = options.tempDirectory;
  }

  /**
   * Get all the namespaces available
   */
  async listNamespaces(): Promise<Namespace[]> {
    return await this.store.listNamespaces();
  }

  /**
   * Get a set of namespaces
   *
   * @throws HomologyError NO_SUCH_NAMESPACE if one of the IDs does not exist
   */
  async getNamespaces(namespaceIds: Iterable<string>): Promise<Namespace[]> {
    const namespaces: Namespace[] = [];
    // add a bulk store method if this proves too slow
    for (const id of new Set(namespaceIds)) {
      namespaces.push(await this.store.getNamespace(id));
    }
    return namespaces;
  }

  async getNamespace(namespaceId: string): Promise<Namespace> {
    return await this.store.getNamespace(namespaceId);
  }

  /**
   * Get the file extension expected by an implementation, if any
   *
   * @throws HomologyError UNKNOWN_IMPLEMENTATION if it is not registered
   */
  expectedFileExtension(implementationName: string): string | undefined {
    return this.registry.expectedFileExtension(implementationName);
  }

  implementationNames(): string[] {
    return this.registry.implementationNames();
  }

  /**
   * Find the provider the given namespaces share, without running it
   *
   * @throws HomologyError NO_SUCH_NAMESPACE, INCOMPATIBLE_NAMESPACES or
   * MISCONFIGURED
   */
  async resolveImplementation(namespaceIds: string[]): Promise<SketchProvider> {
    requireNamespaceIds(namespaceIds);
    return resolveProvider(await this.getNamespaces(namespaceIds), this.registry);
  }

  /**
   * Measure the distance from a single query sequence to the sequences in
   * one or more namespaces
   *
   * @throws HomologyError with a user kind (NO_SUCH_NAMESPACE, INVALID_SKETCH,
   * INCOMPATIBLE_NAMESPACES, INCOMPATIBLE_SKETCHES, ILLEGAL_INPUT) or a fatal
   * kind (MISCONFIGURED, TOOL_FAILURE, DATA_CORRUPTION)
   */
  async measureDistance(
    request: MeasureDistanceRequest,
  ): Promise<SequenceMatches> {
    requireNamespaceIds(request.namespaceIds);
    if (request.querySketchPath.trim().length === 0) {
      throw new HomologyError("ILLEGAL_INPUT", "No query sketch provided");
    }

    const namespaces = await this.getNamespaces(request.namespaceIds);
    const provider = resolveProvider(namespaces, this.registry);

    return await withTempDirectory(
      this.tempDirectory,
      "homology-",
      async (tempDir) => {
        const instance = await instantiate(provider, tempDir);
        const query = await loadQuerySketch(instance, request.querySketchPath);
        const warnings = checkNamespaceCompatibility(
          namespaces,
          query,
          request.strict,
        );
        const matches = await computeMatches({
          instance,
          store: this.store,
          namespaces,
          query,
          returnCount: request.returnCount,
          strict: request.strict,
        });
        return assembleSequenceMatches(
          namespaces,
          instance.implementationInfo,
          matches,
          warnings,
        );
      },
    );
  }
}

function requireNamespaceIds(namespaceIds: string[]): void {
  if (namespaceIds.length === 0) {
    throw new HomologyError("ILLEGAL_INPUT", "No namespace IDs provided");
  }
}

async function instantiate(
  provider: SketchProvider,
  tempDir: string,
): Promise<SketchToolInstance> {
  try {
    return await provider.instantiate(tempDir);
  } catch (error) {
    console.error(
      `Error building the ${provider.implementationName} implementation:`,
      error,
    );
    throw new HomologyError(
      "MISCONFIGURED",
      `Application is misconfigured. Error attempting to build the ${provider.implementationName} implementation.`,
      {
        details: {
          implementation: provider.implementationName,
          diagnostic: isSketchToolError(error) ? error.toolOutput : undefined,
        },
        cause: error,
      },
    );
  }
}
