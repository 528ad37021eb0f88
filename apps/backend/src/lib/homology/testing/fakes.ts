import { HomologyError } from "../errors.js";
import { SketchDatabase } from "../sketch/sketch-database.js";
import {
  SketchToolError,
  type ImplementationInfo,
  type SketchDistance,
  type SketchDistanceSet,
  type SketchParameters,
  type SketchProvider,
  type SketchToolInstance,
} from "../sketch/sketch-interface.js";
import type { HomologyStore } from "../store.js";
import type { Namespace, SequenceMetadata } from "../types.js";

export const DEFAULT_PARAMETERS: SketchParameters = {
  kmerSize: 21,
  hashSeed: 42,
  sketchSize: 1000,
};

/**
 * What the fake tool finds at a sketch path
 */
export type FakeSketchFile =
  | { kind: "sketch"; parameters?: SketchParameters; sequenceCount?: number }
  | { kind: "not-a-sketch"; toolOutput?: string }
  | { kind: "broken"; message: string };

export interface FakeSketchProviderOptions {
  implementationName?: string;
  implementationVersion?: string;
  expectedFileExtension?: string;
  files?: Record<string, FakeSketchFile>;
  /** Distances returned for every request, or an error to throw */
  distances?: SketchDistance[] | Error;
  toolWarnings?: string[];
  initError?: Error;
}

/**
 * In-process sketch capability that records every call made to it
 */
export class FakeSketchProvider implements SketchProvider {
  readonly implementationName: string;
  readonly expectedFileExtension?: string;

  readonly instantiatedIn: string[] = [];
  readonly loadedPaths: string[] = [];
  readonly computeCalls: Array<{
    query: SketchDatabase;
    references: SketchDatabase[];
    maxResults: number;
    strict: boolean;
  }> = [];

  constructor(private readonly options: FakeSketchProviderOptions = {}) {
    this.implementationName = options.implementationName ?? "fake";
    this.expectedFileExtension = options.expectedFileExtension;
  }

  /** Number of load or compute calls made on any instance */
  get invocationCount(): number {
    return this.loadedPaths.length + this.computeCalls.length;
  }

  async instantiate(tempDir: string): Promise<SketchToolInstance> {
    if (this.options.initError) {
      throw this.options.initError;
    }
    this.instantiatedIn.push(tempDir);
    return new FakeSketchInstance(this, this.options);
  }
}

class FakeSketchInstance implements SketchToolInstance {
  readonly implementationInfo: ImplementationInfo;

  constructor(
    private readonly provider: FakeSketchProvider,
    private readonly options: FakeSketchProviderOptions,
  ) {
    this.implementationInfo = {
      implementationName: provider.implementationName,
      implementationVersion: options.implementationVersion,
    };
  }

  async loadSketchDatabase(
    name: string,
    location: string,
  ): Promise<SketchDatabase> {
    this.provider.loadedPaths.push(location);
    const file: FakeSketchFile = this.options.files?.[location] ?? {
      kind: "sketch",
    };
    switch (file.kind) {
      case "not-a-sketch":
        throw new SketchToolError("NOT_A_SKETCH", `${location} is not a sketch`, {
          toolOutput: file.toolOutput,
        });
      case "broken":
        throw new SketchToolError("TOOL_FAILED", file.message);
      case "sketch":
        return new SketchDatabase({
          name,
          implementationName: this.provider.implementationName,
          location,
          parameters: file.parameters ?? DEFAULT_PARAMETERS,
          sequenceCount: file.sequenceCount ?? 1,
        });
    }
  }

  async computeDistances(
    query: SketchDatabase,
    references: SketchDatabase[],
    maxResults: number,
    strict: boolean,
  ): Promise<SketchDistanceSet> {
    this.provider.computeCalls.push({ query, references, maxResults, strict });
    const distances = this.options.distances ?? [];
    if (distances instanceof Error) {
      throw distances;
    }
    return {
      distances: distances.slice(0, maxResults),
      warnings: this.options.toolWarnings ?? [],
    };
  }
}

export function makeNamespace(
  id: string,
  options: {
    implementation?: string;
    parameters?: SketchParameters;
    loadId?: string;
    sequenceCount?: number;
  } = {},
): Namespace {
  return {
    id,
    loadId: options.loadId ?? "load1",
    sourceInfo: { dataSourceId: "test-source" },
    sketchDatabase: new SketchDatabase({
      name: id,
      implementationName: options.implementation ?? "fake",
      location: `/sketches/${id}.msh`,
      parameters: options.parameters ?? DEFAULT_PARAMETERS,
      sequenceCount: options.sequenceCount ?? 100,
    }),
    modifiedAt: new Date(1700000000000),
  };
}

export function makeMetadata(id: string): SequenceMetadata {
  return {
    id,
    sourceId: `source-${id}`,
    scientificName: `Organism ${id}`,
    relatedIds: {},
    createdAt: new Date(1600000000000),
  };
}

/**
 * Store backed by plain maps. Metadata is keyed by namespace ID and load ID.
 */
export class InMemoryHomologyStore implements HomologyStore {
  readonly metadataRequests: Array<{
    namespaceId: string;
    loadId: string;
    sequenceIds: string[];
  }> = [];

  private readonly namespaces = new Map<string, Namespace>();
  private readonly metadata = new Map<string, Map<string, SequenceMetadata>>();

  addNamespace(ns: Namespace, sequences: SequenceMetadata[] = []): this {
    this.namespaces.set(ns.id, ns);
    this.metadata.set(
      `${ns.id}/${ns.loadId}`,
      new Map(sequences.map((s) => [s.id, s])),
    );
    return this;
  }

  async listNamespaces(): Promise<Namespace[]> {
    return [...this.namespaces.values()];
  }

  async getNamespace(namespaceId: string): Promise<Namespace> {
    const ns = this.namespaces.get(namespaceId);
    if (!ns) {
      throw new HomologyError(
        "NO_SUCH_NAMESPACE",
        `No such namespace: ${namespaceId}`,
      );
    }
    return ns;
  }

  async getSequenceMetadata(
    namespaceId: string,
    loadId: string,
    sequenceIds: string[],
  ): Promise<SequenceMetadata[]> {
    this.metadataRequests.push({ namespaceId, loadId, sequenceIds });
    const sequences =
      this.metadata.get(`${namespaceId}/${loadId}`) ??
      new Map<string, SequenceMetadata>();
    const missing = sequenceIds.filter((id) => !sequences.has(id));
    if (missing.length > 0) {
      throw new HomologyError(
        "NO_SUCH_SEQUENCE",
        `Missing sequence(s): ${missing.join(", ")}`,
      );
    }
    return sequenceIds.flatMap((id) => {
      const meta = sequences.get(id);
      return meta ? [meta] : [];
    });
  }
}

/**
 * Run `fn` and return the HomologyError it throws or rejects with
 */
export async function catchHomologyError(
  fn: () => unknown,
): Promise<HomologyError> {
  try {
    await fn();
  } catch (error) {
    if (error instanceof HomologyError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a HomologyError");
}
