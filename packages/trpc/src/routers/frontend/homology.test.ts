import { TRPCError } from "@trpc/server";
import { describe, it, expect } from "vitest";

import type { NamespaceView, SearchNamespacesRequest } from "@homology/zod-types";

import { createCallerFactory } from "../../trpc.js";
import { createHomologyRouter } from "./homology.js";

const namespace: NamespaceView = {
  id: "ns_a",
  loadId: "load1",
  dataSourceId: "test-source",
  sourceDatabaseId: null,
  description: null,
  implementation: "mash",
  kmerSize: 21,
  sketchSize: 1000,
  scalingFactor: null,
  sequenceCount: 3,
  lastModified: 1700000000000,
};

const createCaller = () => {
  const searches: SearchNamespacesRequest[] = [];
  const router = createHomologyRouter({
    info: async () => ({
      serviceName: "Assembly Homology",
      version: "0.1.0",
      serverTime: 1,
      implementations: ["mash"],
    }),
    listNamespaces: async () => [namespace],
    getNamespace: async ({ namespaceId }) => ({ ...namespace, id: namespaceId }),
    search: async (input) => {
      searches.push(input);
      return {
        namespaces: [namespace],
        implementation: "mash",
        implementationVersion: null,
        warnings: [],
        distances: [],
      };
    },
  });
  return { caller: createCallerFactory(router)({}), searches };
};

async function trpcError(promise: Promise<unknown>): Promise<TRPCError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof TRPCError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a TRPCError");
}

describe("homology router", () => {
  it("should serve info and namespaces", async () => {
    const { caller } = createCaller();

    expect((await caller.info()).implementations).toEqual(["mash"]);
    expect(await caller.listNamespaces()).toEqual([namespace]);
    expect((await caller.getNamespace({ namespaceId: "ns_b" })).id).toBe("ns_b");
  });

  it("should reject namespace IDs that are not word characters", async () => {
    const { caller } = createCaller();

    const error = await trpcError(caller.getNamespace({ namespaceId: "<query>" }));

    expect(error.code).toBe("BAD_REQUEST");
  });

  it("should pass validated search input through", async () => {
    const { caller, searches } = createCaller();

    await caller.search({
      namespaceIds: ["ns_a"],
      sketch: "c2tldGNo",
      maxResults: 500,
    });

    expect(searches).toEqual([
      { namespaceIds: ["ns_a"], sketch: "c2tldGNo", maxResults: 500 },
    ]);
  });

  it("should reject searches without namespaces or with a bad sketch", async () => {
    const { caller, searches } = createCaller();

    const noNamespaces = await trpcError(
      caller.search({ namespaceIds: [], sketch: "c2tldGNo" }),
    );
    const notBase64 = await trpcError(
      caller.search({ namespaceIds: ["ns_a"], sketch: "not base64!" }),
    );

    expect(noNamespaces.code).toBe("BAD_REQUEST");
    expect(notBase64.code).toBe("BAD_REQUEST");
    expect(searches).toEqual([]);
  });
});
