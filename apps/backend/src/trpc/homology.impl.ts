import { writeFile } from "node:fs/promises";
import path from "node:path";

import type {
  GetNamespaceRequest,
  NamespaceView,
  SearchNamespacesRequest,
  SearchResultView,
  SequenceMatchView,
  ServiceInfo,
} from "@homology/zod-types";
import { TRPCError } from "@trpc/server";

import {
  DEFAULT_RETURN_COUNT,
  isHomologyError,
  withTempDirectory,
  type HomologyService,
  type Namespace,
  type SequenceMatch,
  type SequenceMatches,
} from "../lib/homology/index.js";

export const SERVICE_NAME = "Assembly Homology";
export const SERVICE_VERSION = "0.1.0";

export function toNamespaceView(ns: Namespace): NamespaceView {
  const { parameters } = ns.sketchDatabase;
  return {
    id: ns.id,
    loadId: ns.loadId,
    dataSourceId: ns.sourceInfo.dataSourceId,
    sourceDatabaseId: ns.sourceInfo.sourceDatabaseId ?? null,
    description: ns.sourceInfo.description ?? null,
    implementation: ns.sketchDatabase.implementationName,
    kmerSize: parameters.kmerSize,
    sketchSize: parameters.sketchSize ?? null,
    scalingFactor: parameters.scalingFactor ?? null,
    sequenceCount: ns.sketchDatabase.sequenceCount,
    lastModified: ns.modifiedAt.getTime(),
  };
}

function toSequenceMatchView(match: SequenceMatch): SequenceMatchView {
  return {
    namespaceId: match.namespaceId,
    sequenceId: match.metadata.id,
    sourceId: match.metadata.sourceId,
    scientificName: match.metadata.scientificName ?? null,
    relatedIds: { ...match.metadata.relatedIds },
    distance: match.distance.distance,
  };
}

export function toSearchResultView(result: SequenceMatches): SearchResultView {
  return {
    namespaces: result.namespaces.map(toNamespaceView),
    implementation: result.implementation.implementationName,
    implementationVersion: result.implementation.implementationVersion ?? null,
    warnings: [...result.warnings],
    distances: result.matches.map(toSequenceMatchView),
  };
}

/**
 * Convert an error into a TRPCError. User errors keep their message; anything
 * else is logged and replaced with an opaque message.
 */
export function toTRPCError(error: unknown, operation: string): TRPCError {
  if (error instanceof TRPCError) {
    return error;
  }
  if (isHomologyError(error) && error.isUserError) {
    return new TRPCError({
      code: error.kind === "NO_SUCH_NAMESPACE" ? "NOT_FOUND" : "BAD_REQUEST",
      message: error.message,
      cause: error,
    });
  }
  console.error(`Error ${operation}:`, error);
  return new TRPCError({
    code: "INTERNAL_SERVER_ERROR",
    message: `An unexpected error occurred while ${operation}`,
  });
}

export interface HomologyImplementationOptions {
  /** Directory uploaded sketches are written to */
  tempDirectory: string;
  now?: () => number;
}

export const createHomologyImplementations = (
  service: HomologyService,
  options: HomologyImplementationOptions,
) => {
  const now = options.now ?? Date.now;

  return {
    info: async (): Promise<ServiceInfo> => ({
      serviceName: SERVICE_NAME,
      version: SERVICE_VERSION,
      serverTime: now(),
      implementations: service.implementationNames(),
    }),

    listNamespaces: async (): Promise<NamespaceView[]> => {
      try {
        const namespaces = await service.listNamespaces();
        return namespaces.map(toNamespaceView);
      } catch (error) {
        throw toTRPCError(error, "listing namespaces");
      }
    },

    getNamespace: async (input: GetNamespaceRequest): Promise<NamespaceView> => {
      try {
        return toNamespaceView(await service.getNamespace(input.namespaceId));
      } catch (error) {
        throw toTRPCError(error, "getting namespace");
      }
    },

    search: async (input: SearchNamespacesRequest): Promise<SearchResultView> => {
      try {
        const provider = await service.resolveImplementation(input.namespaceIds);
        const sketch = Buffer.from(input.sketch, "base64");
        const result = await withTempDirectory(
          options.tempDirectory,
          "upload-",
          async (dir) => {
            const sketchPath = path.join(
              dir,
              `query${provider.expectedFileExtension ?? ""}`,
            );
            await writeFile(sketchPath, sketch);
            return await service.measureDistance({
              namespaceIds: input.namespaceIds,
              querySketchPath: sketchPath,
              returnCount: input.maxResults ?? DEFAULT_RETURN_COUNT,
              strict: input.strict ?? false,
            });
          },
        );
        return toSearchResultView(result);
      } catch (error) {
        throw toTRPCError(error, "searching namespaces");
      }
    },
  };
};
