import { createHash } from "crypto";
import type { ChunkInput, GraphDocument, GraphNode, GraphRelationship } from "../../types/domain.js";
import type { ITextGenerator } from "../../types/interfaces/pipeline.js";
import type { IGraphWriter } from "../../types/interfaces/storage.js";
import { GraphExtractionSchema } from "../../types/zodSchemas.js";
import { GRAPH_EXTRACTION_PROMPT } from "../../prompts/graphPrompt.js";
import { config } from "../../config/index.js";
import { ExtractionError, errorMessage } from "../../utils/errors.js";

/** Label for nodes the model left untyped, and for relationship endpoints missing from its node list */
export const DEFAULT_NODE_LABEL = "Entity";

/** Chunks sent to the model concurrently per batch */
const BATCH_SIZE = 5;

/** `job title` -> `JobTitle` */
export function toNodeLabel(type: string): string {
    const label = type
        .split(/[^A-Za-z0-9]+/)
        .filter(Boolean)
        .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
        .join("");
    return label || DEFAULT_NODE_LABEL;
}

/** `works for` -> `WORKS_FOR`; "" when nothing usable is left */
export function toRelationType(type: string): string {
    return type
        .split(/[^A-Za-z0-9]+/)
        .filter(Boolean)
        .join("_")
        .toUpperCase();
}

/** Stable id of the source node a chunk is stored as */
export function chunkSourceId(text: string): string {
    return createHash("md5").update(text).digest("hex");
}

/**
 * Parse the model's graph output for one chunk.
 * Node ids are trimmed and deduplicated (first type wins); relationships with an
 * unusable or reserved type are dropped, and their endpoints are added as nodes.
 * @throws ExtractionError when the output is not `{ nodes, relationships }`
 */
export function parseGraphDocument(
    rawOutput: string,
    chunk: ChunkInput,
    reservedRelationType: string = config.retrieval.excludedRelationType,
): GraphDocument {
    let parsed: unknown;
    try {
        parsed = JSON.parse(rawOutput);
    } catch {
        throw new ExtractionError(`Graph extraction returned invalid JSON: ${rawOutput.substring(0, 50)}`);
    }

    const result = GraphExtractionSchema.safeParse(parsed);
    if (!result.success) {
        throw new ExtractionError(
            `Graph extraction returned a malformed structure: ${result.error.issues.map((issue) => issue.message).join("; ")}`,
        );
    }

    const nodes = new Map<string, GraphNode>();
    const addNode = (rawId: string, type: string) => {
        const id = rawId.trim();
        if (id && !nodes.has(id)) {
            nodes.set(id, { id, type: toNodeLabel(type) });
        }
    };
    for (const node of result.data.nodes) {
        addNode(node.id, node.type);
    }

    const relationships: GraphRelationship[] = [];
    const seen = new Set<string>();
    for (const relationship of result.data.relationships) {
        const source = relationship.source.trim();
        const target = relationship.target.trim();
        const type = toRelationType(relationship.type);
        if (!source || !target || !type || type === reservedRelationType) {
            continue;
        }

        const key = `${source}|${type}|${target}`;
        if (seen.has(key)) {
            continue;
        }
        seen.add(key);

        addNode(source, DEFAULT_NODE_LABEL);
        addNode(target, DEFAULT_NODE_LABEL);
        relationships.push({ source, target, type });
    }

    return {
        sourceId: chunkSourceId(chunk.content),
        text: chunk.content,
        nodes: [...nodes.values()],
        relationships,
    };
}

export interface GraphIndexerOptions {
    batchSize?: number;
    /** Relation type the store uses for chunk -> entity provenance; the model may not emit it */
    provenanceRelationType?: string;
}

export interface GraphIndexStats {
    documents: number;
    nodes: number;
    relationships: number;
}

/**
 * Turns corpus chunks into entity/relationship graph documents with the model
 * and writes them to the graph store
 */
export class GraphIndexer {
    name = "GraphIndexer";
    private readonly batchSize: number;
    private readonly provenanceRelationType: string;

    constructor(
        private readonly generator: ITextGenerator,
        private readonly writer: IGraphWriter,
        options: GraphIndexerOptions = {},
    ) {
        this.batchSize = options.batchSize ?? BATCH_SIZE;
        this.provenanceRelationType = options.provenanceRelationType ?? config.retrieval.excludedRelationType;
    }

    async extractGraphDocument(chunk: ChunkInput): Promise<GraphDocument> {
        const prompt = GRAPH_EXTRACTION_PROMPT.format({ text: chunk.content });

        let rawOutput: string;
        try {
            rawOutput = await this.generator.complete(prompt, { json: true });
        } catch (llmError) {
            throw new ExtractionError(`[${this.name}] LLM error: ${errorMessage(llmError)}`, { cause: llmError });
        }

        return parseGraphDocument(rawOutput, chunk, this.provenanceRelationType);
    }

    /**
     * One graph document per chunk, in chunk order
     */
    async convertToGraphDocuments(chunks: ChunkInput[]): Promise<GraphDocument[]> {
        const graphDocuments: GraphDocument[] = [];
        const batches = Math.ceil(chunks.length / this.batchSize);

        for (let i = 0; i < chunks.length; i += this.batchSize) {
            const batch = chunks.slice(i, i + this.batchSize);
            console.log(`[${this.name}] Processing batch ${Math.floor(i / this.batchSize) + 1}/${batches} (${batch.length} chunks)`);
            graphDocuments.push(...(await Promise.all(batch.map((chunk) => this.extractGraphDocument(chunk)))));
        }

        return graphDocuments;
    }

    async indexChunks(chunks: ChunkInput[]): Promise<GraphIndexStats> {
        const graphDocuments = await this.convertToGraphDocuments(chunks);
        if (graphDocuments.length > 0) {
            await this.writer.addGraphDocuments(graphDocuments);
        }

        const stats: GraphIndexStats = {
            documents: graphDocuments.length,
            nodes: new Set(graphDocuments.flatMap((doc) => doc.nodes.map((node) => node.id))).size,
            relationships: graphDocuments.reduce((total, doc) => total + doc.relationships.length, 0),
        };
        console.log(`[${this.name}] Indexed ${stats.documents} chunks: ${stats.nodes} entities, ${stats.relationships} relationships`);
        return stats;
    }
}
