import { GeminiEmbedding, GEMINI_EMBEDDING_MODEL } from "@llamaindex/google";

let embedder: GeminiEmbedding | null = null;

function getEmbedder(): GeminiEmbedding {
    if (!embedder) {
        embedder = new GeminiEmbedding({ model: GEMINI_EMBEDDING_MODEL.EMBEDDING_001 });
    }
    return embedder;
}

/**
 * Generate a vector embedding for a given text using Gemini
 * Dimension: 768
 */
export async function generateEmbedding(text: string): Promise<number[]> {
    return await getEmbedder().getTextEmbedding(text);
}
