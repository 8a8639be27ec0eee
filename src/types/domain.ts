/** Surface-form name pulled from a question (person, organization or role). */
export type EntityName = string;

export interface FullTextMatch {
  nodeId: string;
  score: number;
}

export type RelationshipDirection = "outgoing" | "incoming";

/** One edge around a matched node, as returned by the graph store */
export interface NeighborRecord {
  sourceId: string;
  relationType: string;
  targetId: string;
  direction: RelationshipDirection;
}

export interface RelationshipTriple {
  source: string;
  relationship: string;
  target: string;
  direction: RelationshipDirection;
}

export interface DocumentChunk {
  content: string; // dedup key (exact match)
  score: number;
  metadata: Record<string, unknown>;
}

export interface ChunkInput {
  content: string;
  metadata?: Record<string, unknown>;
}

export interface RetrievalResult {
  structuredText: string;
  unstructuredChunks: string[];
}

export interface GraphStats {
  nodes: number;
  relationships: number;
}

export interface ChunkStats {
  chunks: number;
  documents: number;
}

export type ChatTurn = [human: string, assistant: string];

export type SimilaritySearchFn = (query: string, k: number) => Promise<DocumentChunk[]>;

/** Entity node extracted from a chunk; `type` becomes an extra node label */
export interface GraphNode {
  id: string;
  type: string;
}

export interface GraphRelationship {
  source: string;
  target: string;
  type: string;
}

/**
 * Entities and relationships found in one chunk, kept with the chunk
 * so the store can link them back through provenance edges
 */
export interface GraphDocument {
  sourceId: string;
  text: string;
  nodes: GraphNode[];
  relationships: GraphRelationship[];
}
