import type { EntityName, RetrievalResult } from "../domain.js";

export interface CompletionOptions {
    /** Ask the model for a JSON object */
    json?: boolean;
}

/**
 * Language model capability
 * Swapped by injection; the llamaindex-backed implementation lives in utils/llm.ts
 */
export interface ITextGenerator {
    complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

/**
 * Extraction stage interface
 * Pulls candidate entity names out of a question
 */
export interface IEntityExtractor {
    name: string;
    extract(question: string): Promise<EntityName[]>;
}

/**
 * A retrieval strategy that produces grounding context for the answer step
 */
export interface IRetriever {
    name: string;
    retrieve(question: string): Promise<string>;
}

export interface IHybridRetriever extends IRetriever {
    retrieveResult(question: string): Promise<RetrievalResult>;
}
