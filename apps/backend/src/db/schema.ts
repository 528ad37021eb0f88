import {
  integer,
  jsonb,
  pgTable,
  primaryKey,
  text,
  timestamp,
} from "drizzle-orm/pg-core";

export const namespacesTable = pgTable("namespaces", {
  namespace_id: text("namespace_id").primaryKey(),
  load_id: text("load_id").notNull(),
  data_source_id: text("data_source_id").notNull(),
  source_database_id: text("source_database_id"),
  description: text("description"),
  implementation: text("implementation").notNull(),
  sketch_location: text("sketch_location").notNull(),
  kmer_size: integer("kmer_size").notNull(),
  hash_seed: integer("hash_seed").notNull(),
  sketch_size: integer("sketch_size"),
  scaling_factor: integer("scaling_factor"),
  sequence_count: integer("sequence_count").notNull(),
  modified_at: timestamp("modified_at", { withTimezone: true })
    .notNull()
    .defaultNow(),
});

export const sequenceMetadataTable = pgTable(
  "sequence_metadata",
  {
    namespace_id: text("namespace_id")
      .notNull()
      .references(() => namespacesTable.namespace_id, { onDelete: "cascade" }),
    load_id: text("load_id").notNull(),
    sequence_id: text("sequence_id").notNull(),
    source_id: text("source_id").notNull(),
    scientific_name: text("scientific_name"),
    related_ids: jsonb("related_ids")
      .$type<Record<string, string>>()
      .notNull()
      .default({}),
    created_at: timestamp("created_at", { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    primaryKey({
      columns: [table.namespace_id, table.load_id, table.sequence_id],
    }),
  ],
);

export type NamespaceRow = typeof namespacesTable.$inferSelect;
export type SequenceMetadataRow = typeof sequenceMetadataTable.$inferSelect;
