import { runRagWorkflow, type RagWorkflow } from "../pipeline/workflow/ragWorkflow.js";
import type { ChatTurn } from "../types/domain.js";
import { withRetry, type RetryOptions } from "../utils/resilience.js";

/** Questions picked to show where graph retrieval and plain vector retrieval differ */
export const TEST_QUESTIONS: readonly string[] = [
    "Name Who approved the acquisition of SolarOptima?",
    "What is the relationship between Sophia Martinez and Aurora Dynamics?",
    "Tell me about the partnership between Aurora Dynamics and HelioSoft Technologies.",
    "Who founded SolarOptima and what was their previous company name?",
    "What role did Priya Nair play in the acquisition?",
    "How are Amelia Green, NorthBridge Capital, and Aurelia Corp connected?",
];

export interface QuestionAnswer {
    question: string;
    answer: string;
}

export interface ComparisonResult {
    question: string;
    vectorAnswer: string;
    graphAnswer: string;
}

export interface RagComparisonOptions {
    questions?: readonly string[];
    /** Pause between questions, to stay clear of model rate limits */
    pauseMs?: number;
    retry?: RetryOptions;
}

const RULE = "=".repeat(60);

function sleep(ms: number) {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Runs the same questions through the vector and graph RAG chains.
 * This is the top-level caller, so the retry policy lives here.
 */
export class RagComparison {
    readonly questions: readonly string[];
    private readonly pauseMs: number;
    private readonly retry: RetryOptions;

    constructor(
        private readonly chains: { vector: RagWorkflow; graph: RagWorkflow },
        options: RagComparisonOptions = {},
    ) {
        this.questions = options.questions ?? TEST_QUESTIONS;
        this.pauseMs = options.pauseMs ?? 1000;
        this.retry = options.retry ?? {};
    }

    async queryVectorRag(question: string, chatHistory: ChatTurn[] = []): Promise<string> {
        console.log(`\n${RULE}\nVECTOR RAG QUERY\n${RULE}`);
        const answer = await withRetry(
            () => runRagWorkflow(this.chains.vector, question, chatHistory),
            { ...this.retry, name: "VectorRAG" },
        );
        console.log(`Question: ${question}\nAnswer: ${answer}\n${RULE}\n`);
        return answer;
    }

    async queryGraphRag(question: string, chatHistory: ChatTurn[] = []): Promise<string> {
        console.log(`\n${RULE}\nGRAPH RAG QUERY\n${RULE}`);
        const answer = await withRetry(
            () => runRagWorkflow(this.chains.graph, question, chatHistory),
            { ...this.retry, name: "GraphRAG" },
        );
        console.log(`Question: ${question}\nAnswer: ${answer}\n${RULE}\n`);
        return answer;
    }

    async compareRagMethods(question: string, chatHistory: ChatTurn[] = []): Promise<ComparisonResult> {
        console.log(`\n${RULE}\nRAG COMPARISON\n${RULE}\nQuestion: ${question}\n${RULE}`);

        const vectorAnswer = await this.queryVectorRag(question, chatHistory);
        const graphAnswer = await this.queryGraphRag(question, chatHistory);

        console.log(`\n${RULE}\nCOMPARISON SUMMARY\n${RULE}`);
        console.log(`Vector RAG Answer:\n${vectorAnswer}`);
        console.log(`\nGraph RAG Answer:\n${graphAnswer}\n${RULE}\n`);

        return { question, vectorAnswer, graphAnswer };
    }

    async runVectorOnly(): Promise<QuestionAnswer[]> {
        return this.runEach((question) => this.queryVectorRag(question));
    }

    async runGraphOnly(): Promise<QuestionAnswer[]> {
        return this.runEach((question) => this.queryGraphRag(question));
    }

    async runComparison(): Promise<ComparisonResult[]> {
        const results: ComparisonResult[] = [];
        for (const [i, question] of this.questions.entries()) {
            if (i > 0) await sleep(this.pauseMs);
            results.push(await this.compareRagMethods(question));
        }
        return results;
    }

    private async runEach(ask: (question: string) => Promise<string>): Promise<QuestionAnswer[]> {
        const results: QuestionAnswer[] = [];
        for (const [i, question] of this.questions.entries()) {
            if (i > 0) await sleep(this.pauseMs);
            results.push({ question, answer: await ask(question) });
        }
        return results;
    }
}
