import type {
  ChunkStats,
  DocumentChunk,
  EntityName,
  ChunkInput,
  FullTextMatch,
  GraphDocument,
  GraphStats,
  NeighborRecord,
} from "../../types/domain.js";
import type {
  CompletionOptions,
  IEntityExtractor,
  IRetriever,
  ITextGenerator,
} from "../../types/interfaces/pipeline.js";
import type { IChunkStore, IGraphStore, IGraphWriter } from "../../types/interfaces/storage.js";

export interface Edge {
  source: string;
  type: string;
  target: string;
}

/**
 * Graph store stand-in: a node matches when its id contains every query token
 * (fuzzy suffixes dropped, case-insensitive); exact id matches score highest.
 * Written graph documents become entity nodes, typed edges and MENTIONS edges.
 */
export class InMemoryGraphStore implements IGraphStore, IGraphWriter {
  readonly queryCalls: Array<{ index: string; query: string; limit: number }> = [];
  readonly neighborCalls: Array<{ nodeId: string; exclude: string | undefined }> = [];
  readonly written: GraphDocument[][] = [];
  private readonly nodeIds: string[];
  private readonly edges: Edge[];

  constructor(
    nodeIds: string[] = [],
    edges: Edge[] = [],
    private readonly honorExclude = true,
  ) {
    this.nodeIds = [...nodeIds];
    this.edges = [...edges];
  }

  async init(): Promise<void> {}

  async queryNodes(index: string, query: string, limit: number): Promise<FullTextMatch[]> {
    this.queryCalls.push({ index, query, limit });
    const tokens = query.split(" AND ").map((token) => token.replace(/~\d+$/, "").toLowerCase());
    const joined = tokens.join(" ");

    return this.nodeIds
      .filter((id) => tokens.every((token) => id.toLowerCase().includes(token)))
      .map((id) => ({ nodeId: id, score: id.toLowerCase() === joined ? 1 : 0.5 }))
      .sort((a, b) => b.score - a.score)
      .slice(0, limit);
  }

  async neighbors(nodeId: string, exclude?: string): Promise<NeighborRecord[]> {
    this.neighborCalls.push({ nodeId, exclude });
    const keep = (edge: Edge) => !this.honorExclude || exclude === undefined || edge.type !== exclude;

    const outgoing = this.edges
      .filter((edge) => edge.source === nodeId && keep(edge))
      .map((edge): NeighborRecord => ({
        sourceId: edge.source,
        relationType: edge.type,
        targetId: edge.target,
        direction: "outgoing",
      }));
    const incoming = this.edges
      .filter((edge) => edge.target === nodeId && keep(edge))
      .map((edge): NeighborRecord => ({
        sourceId: edge.source,
        relationType: edge.type,
        targetId: edge.target,
        direction: "incoming",
      }));
    return [...outgoing, ...incoming];
  }

  async getGraphStats(): Promise<GraphStats> {
    return { nodes: this.nodeIds.length, relationships: this.edges.length };
  }

  async addGraphDocuments(documents: GraphDocument[]): Promise<void> {
    this.written.push(documents);
    for (const document of documents) {
      for (const node of document.nodes) {
        if (!this.nodeIds.includes(node.id)) {
          this.nodeIds.push(node.id);
        }
        this.edges.push({ source: document.sourceId, type: "MENTIONS", target: node.id });
      }
      for (const relationship of document.relationships) {
        this.edges.push({ source: relationship.source, type: relationship.type, target: relationship.target });
      }
    }
  }

  async clear(): Promise<void> {
    this.nodeIds.length = 0;
    this.edges.length = 0;
  }

  async close(): Promise<void> {}
}

export function chunk(content: string, score = 0.9): DocumentChunk {
  return { content, score, metadata: {} };
}

/**
 * Chunk store stand-in answering every search through `respond`
 */
export class FakeChunkStore implements IChunkStore {
  readonly calls: Array<{ query: string; k: number }> = [];
  readonly indexed: Array<{ path: string; checksum: string; chunks: ChunkInput[] }> = [];

  constructor(private readonly respond: (query: string, k: number) => DocumentChunk[] = () => []) {}

  async init(): Promise<void> {}

  async similaritySearch(query: string, k: number): Promise<DocumentChunk[]> {
    this.calls.push({ query, k });
    return this.respond(query, k);
  }

  async indexDocument(path: string, checksum: string, chunks: ChunkInput[]): Promise<void> {
    this.indexed.push({ path, checksum, chunks });
  }

  async hasDocument(checksum: string): Promise<boolean> {
    return this.indexed.some((entry) => entry.checksum === checksum);
  }

  async clear(): Promise<void> {
    this.indexed.length = 0;
  }

  async getStats(): Promise<ChunkStats> {
    return { chunks: 0, documents: 0 };
  }

  async close(): Promise<void> {}
}

export class StaticExtractor implements IEntityExtractor {
  name = "StaticExtractor";
  readonly questions: string[] = [];

  constructor(private readonly names: EntityName[]) {}

  async extract(question: string): Promise<EntityName[]> {
    this.questions.push(question);
    return [...this.names];
  }
}

export class FakeGenerator implements ITextGenerator {
  readonly prompts: Array<{ prompt: string; options: CompletionOptions | undefined }> = [];

  constructor(private readonly respond: (prompt: string) => string | Promise<string>) {}

  async complete(prompt: string, options?: CompletionOptions): Promise<string> {
    this.prompts.push({ prompt, options });
    return this.respond(prompt);
  }
}

export class FakeRetriever implements IRetriever {
  readonly questions: string[] = [];

  constructor(
    readonly name: string,
    private readonly respond: (question: string) => string | Promise<string>,
  ) {}

  async retrieve(question: string): Promise<string> {
    this.questions.push(question);
    return this.respond(question);
  }
}

export const SAMPLE_NODES = ["SolarOptima", "Aurora Dynamics", "Priya Nair", "chunk-1"];

export const SAMPLE_EDGES: Edge[] = [
  { source: "SolarOptima", type: "ACQUIRED_BY", target: "Aurora Dynamics" },
  { source: "Priya Nair", type: "CFO_OF", target: "Aurora Dynamics" },
  { source: "chunk-1", type: "MENTIONS", target: "SolarOptima" },
];
