import type { RetrievalResult, SimilaritySearchFn } from "../types/domain.js";
import type { IEntityExtractor, IHybridRetriever } from "../types/interfaces/pipeline.js";
import type { IChunkStore, IGraphStore } from "../types/interfaces/storage.js";
import { composeContext } from "./compose/index.js";
import { GraphNeighborResolver, type GraphNeighborResolverOptions } from "./neighbors/index.js";
import { RoleContextScanner, type RoleContextScannerOptions } from "./roleContext/index.js";
import { StructuredRetriever } from "./structured/index.js";
import { UnstructuredRetriever } from "./unstructured/index.js";

export interface GraphRetrieverDeps {
    extractor: IEntityExtractor;
    graphStore: IGraphStore;
    chunkStore: Pick<IChunkStore, "similaritySearch">;
    resolverOptions?: GraphNeighborResolverOptions;
    roleContextOptions?: RoleContextScannerOptions;
    boostKeywords?: readonly string[];
}

/**
 * Hybrid graph retrieval: structured graph evidence plus role-boosted chunks,
 * composed into one context string for the answering step.
 */
export class GraphRetriever implements IHybridRetriever {
    name = "GraphRetriever";
    readonly resolver: GraphNeighborResolver;
    readonly structured: StructuredRetriever;
    readonly unstructured: UnstructuredRetriever;

    constructor(deps: GraphRetrieverDeps) {
        const { chunkStore } = deps;
        const search: SimilaritySearchFn = (query, k) => chunkStore.similaritySearch(query, k);

        this.resolver = new GraphNeighborResolver(deps.graphStore, deps.resolverOptions);
        this.structured = new StructuredRetriever(
            deps.extractor,
            this.resolver,
            new RoleContextScanner(deps.roleContextOptions),
            search,
        );
        this.unstructured = new UnstructuredRetriever(chunkStore, deps.boostKeywords);
    }

    async retrieveResult(question: string): Promise<RetrievalResult> {
        const [structuredText, unstructuredChunks] = await Promise.all([
            this.structured.retrieveStructured(question),
            this.unstructured.retrieveUnstructured(question),
        ]);
        return { structuredText, unstructuredChunks };
    }

    async retrieve(question: string): Promise<string> {
        console.log(`[${this.name}] Graph Search query: ${question}`);

        const { structuredText, unstructuredChunks } = await this.retrieveResult(question);
        const structuredLines = structuredText ? structuredText.split("\n").length : 0;

        console.log(`[${this.name}] Structured relationships found: ${structuredLines}`);
        console.log(`[${this.name}] Document chunks found: ${unstructuredChunks.length}`);

        return composeContext(structuredText, unstructuredChunks);
    }
}
