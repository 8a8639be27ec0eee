import type {
  ChunkInput,
  ChunkStats,
  DocumentChunk,
  FullTextMatch,
  GraphDocument,
  GraphStats,
  NeighborRecord,
} from "../domain.js";

/**
 * Graph storage interface
 * Read-only view of the knowledge graph used during retrieval
 */
export interface IGraphStore {
    /**
     * Make sure the full-text entity index exists
     */
    init(): Promise<void>;

    /**
     * Full-text search over entity nodes, best score first
     */
    queryNodes(index: string, fuzzyQuery: string, limit: number): Promise<FullTextMatch[]>;

    /**
     * Immediate relationships of a node in both directions
     * @param excludeRelationType - relation type to leave out (e.g. document provenance)
     */
    neighbors(nodeId: string, excludeRelationType?: string): Promise<NeighborRecord[]>;

    getGraphStats(): Promise<GraphStats>;

    close(): Promise<void>;
}

/**
 * Graph write access used while indexing the corpus
 */
export interface IGraphWriter {
    /**
     * MERGE entity nodes and relationships, plus a source node per document
     * linked to every entity it mentions
     */
    addGraphDocuments(documents: GraphDocument[]): Promise<void>;

    /** Delete every node and relationship */
    clear(): Promise<void>;
}

/**
 * Chunk storage interface
 * Embedding index over document chunks
 */
export interface IChunkStore {
    init(): Promise<void>;

    /**
     * Top-k chunks by embedding similarity to the query text
     */
    similaritySearch(query: string, k: number): Promise<DocumentChunk[]>;

    /**
     * Embed a corpus file's chunks and record the file by checksum
     */
    indexDocument(path: string, checksum: string, chunks: ChunkInput[]): Promise<void>;

    hasDocument(checksum: string): Promise<boolean>;

    clear(): Promise<void>;

    getStats(): Promise<ChunkStats>;

    close(): Promise<void>;
}
