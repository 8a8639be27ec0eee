import type { DocumentChunk } from "../../types/domain.js";
import type { IChunkStore } from "../../types/interfaces/storage.js";
import { ROLE_BOOST_KEYWORDS } from "../keywords.js";

export const BASE_K = 4;
export const BOOST_K = 2;
export const FINAL_CAP = 6;

/**
 * Drops repeated chunk contents (exact string match), first occurrence wins
 */
export function dedupeByContent(chunks: DocumentChunk[]): DocumentChunk[] {
    const seen = new Set<string>();
    const unique: DocumentChunk[] = [];
    for (const chunk of chunks) {
        if (!seen.has(chunk.content)) {
            seen.add(chunk.content);
            unique.push(chunk);
        }
    }
    return unique;
}

/**
 * Similarity retrieval with an extra role-focused search for role-centric questions
 */
export class UnstructuredRetriever {
    name = "UnstructuredRetriever";

    constructor(
        private readonly store: Pick<IChunkStore, "similaritySearch">,
        private readonly boostKeywords: readonly string[] = ROLE_BOOST_KEYWORDS,
    ) {}

    isRoleQuestion(question: string): boolean {
        const lowered = question.toLowerCase();
        return this.boostKeywords.some((keyword) => lowered.includes(keyword.toLowerCase()));
    }

    async retrieveUnstructured(
        question: string,
        baseK: number = BASE_K,
        boostK: number = BOOST_K,
        finalCap: number = FINAL_CAP,
    ): Promise<string[]> {
        const baseChunks = await this.store.similaritySearch(question, baseK);

        if (!this.isRoleQuestion(question)) {
            return baseChunks.map((chunk) => chunk.content);
        }

        const roleChunks = await this.store.similaritySearch(`role position ${question}`, boostK);
        return dedupeByContent([...baseChunks, ...roleChunks])
            .slice(0, finalCap)
            .map((chunk) => chunk.content);
    }
}
