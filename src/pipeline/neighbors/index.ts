import type { NeighborRecord, RelationshipTriple } from "../../types/domain.js";
import type { IGraphStore } from "../../types/interfaces/storage.js";
import { buildFullTextQuery } from "../fuzzy/index.js";
import { config } from "../../config/index.js";

export const DEFAULT_MATCH_LIMIT = 3;
export const MAX_TRIPLES = 100;

const RELATIONSHIP_NODE_LIMIT = 5;
const RELATIONSHIP_ROW_LIMIT = 20;

export interface GraphNeighborResolverOptions {
    fullTextIndex?: string;
    /** Provenance relation (chunk -> entity) left out of entity reasoning */
    excludedRelationType?: string;
    maxTriples?: number;
}

export function formatTriple(record: NeighborRecord): string {
    return `${record.sourceId} - ${record.relationType} -> ${record.targetId}`;
}

/**
 * Resolves fuzzy entity queries to graph nodes and their immediate relationships.
 */
export class GraphNeighborResolver {
    name = "GraphNeighborResolver";
    private readonly fullTextIndex: string;
    private readonly excludedRelationType: string;
    private readonly maxTriples: number;

    constructor(
        private readonly store: IGraphStore,
        options: GraphNeighborResolverOptions = {},
    ) {
        this.fullTextIndex = options.fullTextIndex ?? config.retrieval.fullTextIndex;
        this.excludedRelationType = options.excludedRelationType ?? config.retrieval.excludedRelationType;
        this.maxTriples = options.maxTriples ?? MAX_TRIPLES;
    }

    /**
     * `source - RELATION -> target` lines around the best `limit` matches.
     * An empty query resolves to nothing without touching the store.
     */
    async resolve(fuzzyQuery: string, limit: number = DEFAULT_MATCH_LIMIT): Promise<string[]> {
        if (!fuzzyQuery.trim()) {
            return [];
        }

        const matches = await this.store.queryNodes(this.fullTextIndex, fuzzyQuery, limit);
        if (matches.length === 0) {
            return [];
        }

        const perNode = await Promise.all(
            matches
                .slice(0, limit)
                .map((match) => this.store.neighbors(match.nodeId, this.excludedRelationType)),
        );

        // Cap after merging so the bound holds across all matched nodes
        return perNode
            .flat()
            .filter((record) => record.relationType !== this.excludedRelationType)
            .slice(0, this.maxTriples)
            .map(formatTriple);
    }

    /**
     * Every relationship (provenance included) around the nodes matching an entity name
     */
    async getEntityRelationships(entityName: string): Promise<RelationshipTriple[]> {
        const query = buildFullTextQuery(entityName);
        if (!query) {
            return [];
        }

        const matches = await this.store.queryNodes(this.fullTextIndex, query, RELATIONSHIP_NODE_LIMIT);
        const perNode = await Promise.all(
            matches.slice(0, RELATIONSHIP_NODE_LIMIT).map((match) => this.store.neighbors(match.nodeId)),
        );

        return perNode
            .flat()
            .slice(0, RELATIONSHIP_ROW_LIMIT)
            .map((record) => ({
                source: record.sourceId,
                relationship: record.relationType,
                target: record.targetId,
                direction: record.direction,
            }));
    }
}
