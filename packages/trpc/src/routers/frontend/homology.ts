import {
  GetNamespaceRequestSchema,
  SearchNamespacesRequestSchema,
  type GetNamespaceRequest,
  type NamespaceView,
  type SearchNamespacesRequest,
  type SearchResultView,
  type ServiceInfo,
} from "@homology/zod-types";

import { publicProcedure, router } from "../../trpc.js";

export const createHomologyRouter = (implementations: {
  info: () => Promise<ServiceInfo>;
  listNamespaces: () => Promise<NamespaceView[]>;
  getNamespace: (input: GetNamespaceRequest) => Promise<NamespaceView>;
  search: (input: SearchNamespacesRequest) => Promise<SearchResultView>;
}) =>
  router({
    info: publicProcedure.query(async () => {
      return await implementations.info();
    }),

    listNamespaces: publicProcedure.query(async () => {
      return await implementations.listNamespaces();
    }),

    getNamespace: publicProcedure
      .input(GetNamespaceRequestSchema)
      .query(async ({ input }) => {
        return await implementations.getNamespace(input);
      }),

    search: publicProcedure
      .input(SearchNamespacesRequestSchema)
      .mutation(async ({ input }) => {
        return await implementations.search(input);
      }),
  });

export type HomologyImplementations = Parameters<
  typeof createHomologyRouter
>[0];
