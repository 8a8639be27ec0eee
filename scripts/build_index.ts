import { config, validateConfig } from "../src/config/index.js";
import { TextCorpusLoader, chunkCorpus } from "../src/ingestion/loader.js";
import { GraphIndexer } from "../src/pipeline/graphIndex/index.js";
import { DrizzleChunkStore } from "../src/storage/drizzleChunkStore.js";
import { Neo4jGraphStore } from "../src/storage/neo4jGraphStore.js";
import { initLLM, LlamaIndexTextGenerator } from "../src/utils/llm.js";

/**
 * One-time index builder: embeds the corpus chunks into pgvector and extracts the
 * entity graph from the same chunks into Neo4j. Each index is skipped when it
 * already holds data, unless --rebuild clears both first.
 */
async function run() {
    validateConfig();

    const args = process.argv.slice(2);
    const rebuild = args.includes("--rebuild");
    const corpusPath = args.find((arg) => !arg.startsWith("--")) ?? config.paths.corpusPath;

    const chunkStore = new DrizzleChunkStore();
    const graphStore = new Neo4jGraphStore();

    try {
        await chunkStore.init();
        await graphStore.init();

        const corpus = await new TextCorpusLoader().load(corpusPath);
        const chunks = chunkCorpus(corpus);

        if (rebuild) {
            await chunkStore.clear();
            await graphStore.clear();
        }

        if (await chunkStore.hasDocument(corpus.checksum)) {
            console.log("Chunk index already contains this corpus, skipping (use --rebuild to force)");
        } else {
            await chunkStore.indexDocument(corpus.path, corpus.checksum, chunks);
            console.log("Chunk index built successfully!");
        }

        if ((await graphStore.getGraphStats()).nodes > 0) {
            console.log("Graph already populated, skipping (use --rebuild to force)");
        } else {
            initLLM();
            await new GraphIndexer(new LlamaIndexTextGenerator(), graphStore).indexChunks(chunks);
            console.log("Graph built successfully!");
        }

        const chunkStats = await chunkStore.getStats();
        const graphStats = await graphStore.getGraphStats();
        console.log(`Chunk index: ${chunkStats.chunks} chunks from ${chunkStats.documents} documents`);
        console.log(`Graph: ${graphStats.nodes} nodes, ${graphStats.relationships} relationships`);
    } finally {
        await chunkStore.close();
        await graphStore.close();
    }
}

run().catch((error) => {
    console.error("Error building indices:", error);
    process.exit(1);
});
