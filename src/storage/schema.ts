import { pgTable, text, uuid, jsonb, timestamp, vector, index } from "drizzle-orm/pg-core";

/** Gemini embedding-001 output size */
export const EMBEDDING_DIMENSIONS = 768;

export const documents = pgTable("documents", {
    id: uuid("id").primaryKey().defaultRandom(),
    path: text("path").notNull(),
    checksum: text("checksum").notNull().unique(),
    status: text("status").default("pending"),
    createdAt: timestamp("created_at").defaultNow(),
});

export const chunks = pgTable("chunks", {
    id: uuid("id").primaryKey().defaultRandom(),
    documentId: uuid("document_id").references(() => documents.id, { onDelete: 'cascade' }),
    content: text("content").notNull(),
    metadata: jsonb("metadata").$type<Record<string, unknown>>(),
    embedding: vector("embedding", { dimensions: EMBEDDING_DIMENSIONS }),
    createdAt: timestamp("created_at").defaultNow(),
}, (table) => [
    index("chunkEmbeddingIndex").using("hnsw", table.embedding.op("vector_cosine_ops")),
]);
