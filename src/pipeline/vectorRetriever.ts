import type { DocumentChunk } from "../types/domain.js";
import type { IRetriever } from "../types/interfaces/pipeline.js";
import type { IChunkStore } from "../types/interfaces/storage.js";

export const DEFAULT_K = 4;

export interface RankedChunk {
    rank: number;
    similarityScore: number;
    content: string;
    metadata: Record<string, unknown>;
}

export interface RelevantChunksReport {
    query: string;
    numResults: number;
    documents: RankedChunk[];
}

/**
 * Baseline strategy: plain embedding-similarity retrieval over the chunks
 */
export class VectorRetriever implements IRetriever {
    name = "VectorRetriever";

    constructor(private readonly store: Pick<IChunkStore, "similaritySearch">) {}

    async retrieve(question: string, k: number = DEFAULT_K): Promise<string> {
        console.log(`[${this.name}] Vector Search query: ${question}`);

        const chunks = await this.store.similaritySearch(question, k);
        console.log(`[${this.name}] Document chunks found: ${chunks.length}`);

        return chunks
            .map((chunk, i) => `Document ${i + 1}:\n${chunk.content}`)
            .join("\n\n");
    }

    async retrieveWithScores(question: string, k: number = DEFAULT_K): Promise<DocumentChunk[]> {
        const chunks = await this.store.similaritySearch(question, k);
        console.log(`[${this.name}] Retrieved ${chunks.length} documents with scores`);
        return chunks;
    }

    async retrieveFormatted(question: string, k: number = DEFAULT_K): Promise<string> {
        const chunks = await this.store.similaritySearch(question, k);
        return chunks
            .map((chunk, i) => `Document ${i + 1} (Similarity Score: ${chunk.score.toFixed(4)}):\n${chunk.content}\n`)
            .join("\n");
    }

    async getMostRelevantChunks(question: string, k: number = DEFAULT_K): Promise<RelevantChunksReport> {
        const chunks = await this.store.similaritySearch(question, k);
        return {
            query: question,
            numResults: chunks.length,
            documents: chunks.map((chunk, i) => ({
                rank: i + 1,
                similarityScore: chunk.score,
                content: chunk.content,
                metadata: chunk.metadata,
            })),
        };
    }
}
