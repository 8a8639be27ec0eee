import neo4j, { type Driver } from "neo4j-driver";
import type { FullTextMatch, GraphDocument, GraphStats, NeighborRecord, RelationshipDirection } from "../types/domain.js";
import type { IGraphStore, IGraphWriter } from "../types/interfaces/storage.js";
import { config } from "../config/index.js";
import { BackendError, errorMessage } from "../utils/errors.js";

const neighborsQuery = (label: string) => `
MATCH (node:${label} {id: $nodeId})-[r]->(neighbor)
WHERE $exclude IS NULL OR type(r) <> $exclude
RETURN node.id AS sourceId, type(r) AS relationType, neighbor.id AS targetId, 'outgoing' AS direction
UNION ALL
MATCH (node:${label} {id: $nodeId})<-[r]-(neighbor)
WHERE $exclude IS NULL OR type(r) <> $exclude
RETURN neighbor.id AS sourceId, type(r) AS relationType, node.id AS targetId, 'incoming' AS direction
`;

type FullTextRow = {
    nodeId: string;
    score: number;
};

type NeighborRow = {
    sourceId: string;
    relationType: string;
    targetId: string;
    direction: RelationshipDirection;
};

/** Labels and relationship types cannot be parameters; backtick-quote them instead */
function quoteIdentifier(name: string): string {
    return `\`${name.replace(/`/g, "``")}\``;
}

function groupBy<T>(items: T[], key: (item: T) => string): Map<string, T[]> {
    const groups = new Map<string, T[]>();
    for (const item of items) {
        const group = groups.get(key(item));
        if (group) {
            group.push(item);
        } else {
            groups.set(key(item), [item]);
        }
    }
    return groups;
}

/** Neo4j returns 64-bit integers as driver Integers; counts stay well inside number range */
function toNumber(value: unknown): number {
    return neo4j.isInt(value) ? value.toNumber() : Number(value);
}

export interface Neo4jGraphStoreOptions {
    uri?: string;
    username?: string;
    password?: string;
    database?: string;
    entityLabel?: string;
    documentLabel?: string;
    provenanceRelationType?: string;
    fullTextIndex?: string;
}

/**
 * The entity graph in Neo4j: read access for retrieval, MERGE-based writes for indexing
 */
export class Neo4jGraphStore implements IGraphStore, IGraphWriter {
    name = "Neo4jGraphStore";
    private readonly driver: Driver;
    private readonly database: string | undefined;
    private readonly entityLabel: string;
    private readonly documentLabel: string;
    private readonly provenanceRelationType: string;
    private readonly fullTextIndex: string;

    constructor(options: Neo4jGraphStoreOptions = {}) {
        this.driver = neo4j.driver(
            options.uri ?? config.neo4j.uri,
            neo4j.auth.basic(options.username ?? config.neo4j.username, options.password ?? config.neo4j.password),
        );
        this.database = options.database ?? config.neo4j.database;
        this.entityLabel = options.entityLabel ?? config.retrieval.entityLabel;
        this.documentLabel = options.documentLabel ?? config.retrieval.documentLabel;
        this.provenanceRelationType = options.provenanceRelationType ?? config.retrieval.excludedRelationType;
        this.fullTextIndex = options.fullTextIndex ?? config.retrieval.fullTextIndex;
    }

    private readSession() {
        return this.driver.session({ database: this.database, defaultAccessMode: neo4j.session.READ });
    }

    async init(): Promise<void> {
        const session = this.driver.session({ database: this.database });
        try {
            await session.run(
                `CREATE FULLTEXT INDEX ${this.fullTextIndex} IF NOT EXISTS FOR (e:${this.entityLabel}) ON EACH [e.id]`,
            );
            console.log(`[${this.name}] Full-text index '${this.fullTextIndex}' ready`);
        } catch (error) {
            throw new BackendError("graph", `[${this.name}] Failed to create full-text index: ${errorMessage(error)}`, { cause: error });
        } finally {
            await session.close();
        }
    }

    async queryNodes(index: string, fuzzyQuery: string, limit: number): Promise<FullTextMatch[]> {
        const session = this.readSession();
        try {
            const result = await session.run<FullTextRow>(
                `CALL db.index.fulltext.queryNodes($index, $query, {limit: $limit})
                 YIELD node, score
                 RETURN node.id AS nodeId, score`,
                { index, query: fuzzyQuery, limit: neo4j.int(limit) },
            );
            return result.records.map((record) => ({
                nodeId: record.get("nodeId"),
                score: record.get("score"),
            }));
        } catch (error) {
            throw new BackendError("graph", `[${this.name}] Full-text query failed: ${errorMessage(error)}`, { cause: error });
        } finally {
            await session.close();
        }
    }

    async neighbors(nodeId: string, excludeRelationType?: string): Promise<NeighborRecord[]> {
        const session = this.readSession();
        try {
            const result = await session.run<NeighborRow>(neighborsQuery(this.entityLabel), {
                nodeId,
                exclude: excludeRelationType ?? null,
            });
            return result.records.map((record) => ({
                sourceId: record.get("sourceId"),
                relationType: record.get("relationType"),
                targetId: record.get("targetId"),
                direction: record.get("direction"),
            }));
        } catch (error) {
            throw new BackendError("graph", `[${this.name}] Neighbor query failed for '${nodeId}': ${errorMessage(error)}`, { cause: error });
        } finally {
            await session.close();
        }
    }

    async getGraphStats(): Promise<GraphStats> {
        const session = this.readSession();
        try {
            const nodes = await session.run("MATCH (n) RETURN count(n) AS nodeCount");
            const relationships = await session.run("MATCH ()-[r]->() RETURN count(r) AS relCount");
            return {
                nodes: toNumber(nodes.records[0]?.get("nodeCount")),
                relationships: toNumber(relationships.records[0]?.get("relCount")),
            };
        } catch (error) {
            throw new BackendError("graph", `[${this.name}] Stats query failed: ${errorMessage(error)}`, { cause: error });
        } finally {
            await session.close();
        }
    }

    async addGraphDocuments(graphDocuments: GraphDocument[]): Promise<void> {
        const entity = quoteIdentifier(this.entityLabel);
        const document = quoteIdentifier(this.documentLabel);
        const mentions = quoteIdentifier(this.provenanceRelationType);

        const session = this.driver.session({ database: this.database });
        try {
            await session.executeWrite(async (tx) => {
                for (const graphDocument of graphDocuments) {
                    await tx.run(`MERGE (d:${document} {id: $id}) SET d.text = $text`, {
                        id: graphDocument.sourceId,
                        text: graphDocument.text,
                    });

                    for (const [type, nodes] of groupBy(graphDocument.nodes, (node) => node.type)) {
                        await tx.run(
                            `UNWIND $ids AS id MERGE (e:${entity} {id: id}) SET e:${quoteIdentifier(type)}`,
                            { ids: nodes.map((node) => node.id) },
                        );
                    }

                    await tx.run(
                        `MATCH (d:${document} {id: $sourceId})
                         UNWIND $ids AS id
                         MATCH (e:${entity} {id: id})
                         MERGE (d)-[:${mentions}]->(e)`,
                        { sourceId: graphDocument.sourceId, ids: graphDocument.nodes.map((node) => node.id) },
                    );

                    for (const [type, relationships] of groupBy(graphDocument.relationships, (rel) => rel.type)) {
                        await tx.run(
                            `UNWIND $relationships AS rel
                             MATCH (source:${entity} {id: rel.source})
                             MATCH (target:${entity} {id: rel.target})
                             MERGE (source)-[:${quoteIdentifier(type)}]->(target)`,
                            { relationships: relationships.map(({ source, target }) => ({ source, target })) },
                        );
                    }
                }
            });
            console.log(`[${this.name}] Wrote ${graphDocuments.length} graph documents`);
        } catch (error) {
            throw new BackendError("graph", `[${this.name}] Graph write failed: ${errorMessage(error)}`, { cause: error });
        } finally {
            await session.close();
        }
    }

    async clear(): Promise<void> {
        const session = this.driver.session({ database: this.database });
        try {
            await session.run("MATCH (n) DETACH DELETE n");
            console.log(`[${this.name}] Cleared existing graph data`);
        } catch (error) {
            throw new BackendError("graph", `[${this.name}] Clearing the graph failed: ${errorMessage(error)}`, { cause: error });
        } finally {
            await session.close();
        }
    }

    async close(): Promise<void> {
        await this.driver.close();
    }
}
