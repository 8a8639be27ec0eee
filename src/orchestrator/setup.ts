import { validateConfig } from "../config/index.js";
import { EntityExtractor } from "../pipeline/extract/index.js";
import { GraphRetriever } from "../pipeline/graphRetriever.js";
import { VectorRetriever } from "../pipeline/vectorRetriever.js";
import { createRagWorkflow } from "../pipeline/workflow/ragWorkflow.js";
import { DrizzleChunkStore } from "../storage/drizzleChunkStore.js";
import { Neo4jGraphStore } from "../storage/neo4jGraphStore.js";
import { initLLM, LlamaIndexTextGenerator } from "../utils/llm.js";
import { RagComparison, type RagComparisonOptions } from "./comparison.js";

/**
 * Wire the stores, the model and both RAG chains from the environment
 */
export async function createRagComparison(options: RagComparisonOptions = {}) {
    validateConfig();
    initLLM();

    const chunkStore = new DrizzleChunkStore();
    const graphStore = new Neo4jGraphStore();
    try {
        await chunkStore.init();
        await graphStore.init();
    } catch (error) {
        await chunkStore.close();
        await graphStore.close();
        throw error;
    }

    const generator = new LlamaIndexTextGenerator();
    const graphRetriever = new GraphRetriever({
        extractor: new EntityExtractor(generator),
        graphStore,
        chunkStore,
    });
    const vectorRetriever = new VectorRetriever(chunkStore);

    const comparison = new RagComparison(
        {
            vector: createRagWorkflow(vectorRetriever, generator),
            graph: createRagWorkflow(graphRetriever, generator),
        },
        options,
    );

    const close = async () => {
        await chunkStore.close();
        await graphStore.close();
    };

    return { comparison, close };
}
