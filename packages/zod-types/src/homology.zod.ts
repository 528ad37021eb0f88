import { z } from "zod";

// Namespace IDs are word characters only, so they can never collide with the
// reserved query sketch name
export const NamespaceIdSchema = z
  .string()
  .min(1)
  .max(256)
  .regex(/^\w+$/, "Namespace IDs may only contain letters, digits and _");

// Requests outside [1, 100] are accepted and replaced by the default on the server
export const MaxResultsSchema = z.number().int();

// Namespace request schemas
export const GetNamespaceRequestSchema = z.object({
  namespaceId: NamespaceIdSchema,
});

export const SearchNamespacesRequestSchema = z.object({
  namespaceIds: z.array(NamespaceIdSchema).min(1).max(100),
  /** Base64 encoded query sketch */
  sketch: z.string().base64().min(1),
  maxResults: MaxResultsSchema.optional(),
  strict: z.boolean().optional(),
});

// Response views
export const NamespaceViewSchema = z.object({
  id: NamespaceIdSchema,
  loadId: z.string(),
  dataSourceId: z.string(),
  sourceDatabaseId: z.string().nullable(),
  description: z.string().nullable(),
  implementation: z.string(),
  kmerSize: z.number().int(),
  sketchSize: z.number().int().nullable(),
  scalingFactor: z.number().int().nullable(),
  sequenceCount: z.number().int(),
  lastModified: z.number().int(),
});

export const SequenceMatchViewSchema = z.object({
  namespaceId: NamespaceIdSchema,
  sequenceId: z.string(),
  sourceId: z.string(),
  scientificName: z.string().nullable(),
  relatedIds: z.record(z.string()),
  distance: z.number(),
});

export const SearchResultViewSchema = z.object({
  namespaces: z.array(NamespaceViewSchema),
  implementation: z.string(),
  implementationVersion: z.string().nullable(),
  warnings: z.array(z.string()),
  distances: z.array(SequenceMatchViewSchema),
});

export const ServiceInfoSchema = z.object({
  serviceName: z.string(),
  version: z.string(),
  serverTime: z.number().int(),
  implementations: z.array(z.string()),
});

// Type exports
export type NamespaceId = z.infer<typeof NamespaceIdSchema>;
export type GetNamespaceRequest = z.infer<typeof GetNamespaceRequestSchema>;
export type SearchNamespacesRequest = z.infer<
  typeof SearchNamespacesRequestSchema
>;
export type NamespaceView = z.infer<typeof NamespaceViewSchema>;
export type SequenceMatchView = z.infer<typeof SequenceMatchViewSchema>;
export type SearchResultView = z.infer<typeof SearchResultViewSchema>;
export type ServiceInfo = z.infer<typeof ServiceInfoSchema>;
