import { count, cosineDistance, desc, eq, isNotNull, sql } from 'drizzle-orm';
import { createDatabase, type Database } from "./index.js";
import { chunks, documents } from "./schema.js";
import type { ChunkInput, ChunkStats, DocumentChunk } from "../types/domain.js";
import type { IChunkStore } from "../types/interfaces/storage.js";
import { generateEmbedding } from '../utils/embeddings.js';
import { BackendError, errorMessage } from '../utils/errors.js';

/** Chunks embedded concurrently per batch */
const BATCH_SIZE = 5;

/**
 * Chunk embeddings in Postgres (pgvector), queried by cosine similarity
 */
export class DrizzleChunkStore implements IChunkStore {
    name = "DrizzleChunkStore";

    constructor(private readonly database: Database = createDatabase()) {}

    async init(): Promise<void> {
        // Tables come from `npx drizzle-kit push`; the extension has to exist first
        await this.database.client`CREATE EXTENSION IF NOT EXISTS vector`;
        console.log(`[${this.name}] pgvector enabled (ensure you ran 'npx drizzle-kit push')`);
    }

    async similaritySearch(query: string, k: number): Promise<DocumentChunk[]> {
        try {
            const queryEmbedding = await generateEmbedding(query);

            // cosineDistance is 0 for identical vectors; report similarity instead
            const similarity = sql<number>`1 - (${cosineDistance(chunks.embedding, queryEmbedding)})`.mapWith(Number);

            const rows = await this.database.db
                .select({
                    content: chunks.content,
                    metadata: chunks.metadata,
                    score: similarity,
                })
                .from(chunks)
                .where(isNotNull(chunks.embedding))
                .orderBy(desc(similarity))
                .limit(k);

            return rows.map((row) => ({
                content: row.content,
                score: row.score,
                metadata: row.metadata ?? {},
            }));
        } catch (error) {
            throw new BackendError("vector", `[${this.name}] Similarity search failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    private async embedChunks(input: ChunkInput[]): Promise<(typeof chunks.$inferInsert)[]> {
        const rows: (typeof chunks.$inferInsert)[] = [];
        for (let i = 0; i < input.length; i += BATCH_SIZE) {
            const batch = input.slice(i, i + BATCH_SIZE);
            const embedded = await Promise.all(batch.map(async (chunk) => ({
                content: chunk.content,
                metadata: chunk.metadata ?? {},
                embedding: await generateEmbedding(chunk.content),
            })));
            rows.push(...embedded);
        }
        return rows;
    }

    /**
     * Embed a corpus file's chunks and store them together with the file record,
     * so a failed run leaves no checksum behind
     */
    async indexDocument(path: string, checksum: string, input: ChunkInput[]): Promise<void> {
        console.log(`[${this.name}] Indexing ${input.length} chunks from ${path}...`);
        try {
            const rows = await this.embedChunks(input);

            await this.database.db.transaction(async (tx) => {
                const [document] = await tx
                    .insert(documents)
                    .values({ path, checksum, status: "indexed" })
                    .returning({ id: documents.id });

                if (rows.length > 0) {
                    await tx.insert(chunks).values(rows.map((row) => ({ ...row, documentId: document?.id })));
                }
            });
        } catch (error) {
            throw new BackendError("vector", `[${this.name}] Indexing ${path} failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    async hasDocument(checksum: string): Promise<boolean> {
        try {
            const [existing] = await this.database.db
                .select({ id: documents.id })
                .from(documents)
                .where(eq(documents.checksum, checksum))
                .limit(1);
            return existing !== undefined;
        } catch (error) {
            throw new BackendError("vector", `[${this.name}] Document lookup failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    async clear(): Promise<void> {
        try {
            await this.database.db.delete(chunks);
            await this.database.db.delete(documents);
        } catch (error) {
            throw new BackendError("vector", `[${this.name}] Clearing chunks failed: ${errorMessage(error)}`, { cause: error });
        }
        console.log(`[${this.name}] Cleared existing chunks`);
    }

    async getStats(): Promise<ChunkStats> {
        try {
            const [chunkCount] = await this.database.db.select({ count: count() }).from(chunks);
            const [documentCount] = await this.database.db.select({ count: count() }).from(documents);
            return {
                chunks: chunkCount?.count ?? 0,
                documents: documentCount?.count ?? 0,
            };
        } catch (error) {
            throw new BackendError("vector", `[${this.name}] Stats query failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    async close(): Promise<void> {
        await this.database.client.end();
    }
}
