import { createWorkflow } from "@llamaindex/workflow-core";
import {
  questionEvent,
  retrieveEvent,
  answerEvent,
  completeEvent,
  errorEvent,
} from "./events.js";
import { ANSWER_PROMPT, CONDENSE_QUESTION_PROMPT } from "../../prompts/answerPrompt.js";
import type { ChatTurn } from "../../types/domain.js";
import type { IRetriever, ITextGenerator } from "../../types/interfaces/pipeline.js";
import { errorMessage } from "../../utils/errors.js";

export function formatChatHistory(chatHistory: ChatTurn[]): string {
  return chatHistory
    .map(([human, assistant]) => `Human: ${human}\nAssistant: ${assistant}`)
    .join("\n");
}

/**
 * Question -> (condense) -> retrieve -> answer, for one retrieval strategy
 */
export function createRagWorkflow(retriever: IRetriever, generator: ITextGenerator) {
  const workflow = createWorkflow();
  const tag = `[RAG:${retriever.name}]`;

  workflow.handle([questionEvent], async (context, event) => {
    const { sendEvent } = context;
    const { question, chatHistory } = event.data;

    if (chatHistory.length === 0) {
      sendEvent(retrieveEvent.with({ question, searchQuery: question }));
      return;
    }

    try {
      const prompt = CONDENSE_QUESTION_PROMPT.format({
        chatHistory: formatChatHistory(chatHistory),
        question,
      });
      const searchQuery = await generator.complete(prompt);
      console.log(`${tag} Condensed question: ${searchQuery}`);

      sendEvent(retrieveEvent.with({ question, searchQuery }));
    } catch (error) {
      sendEvent(
        errorEvent.with({ stage: "condense", error: errorMessage(error), cause: error, question }),
      );
    }
  });

  workflow.handle([retrieveEvent], async (context, event) => {
    const { sendEvent } = context;
    const { question, searchQuery } = event.data;

    try {
      const retrieved = await retriever.retrieve(searchQuery);
      sendEvent(answerEvent.with({ question, context: retrieved }));
    } catch (error) {
      sendEvent(
        errorEvent.with({ stage: "retrieve", error: errorMessage(error), cause: error, question }),
      );
    }
  });

  workflow.handle([answerEvent], async (context, event) => {
    const { sendEvent } = context;
    const { question, context: retrieved } = event.data;

    try {
      const answer = await generator.complete(
        ANSWER_PROMPT.format({ context: retrieved, question }),
      );
      sendEvent(completeEvent.with({ success: true, question, answer }));
    } catch (error) {
      sendEvent(
        errorEvent.with({ stage: "answer", error: errorMessage(error), cause: error, question }),
      );
    }
  });

  workflow.handle([errorEvent], async (context, event) => {
    const { stage, error, cause, question } = event.data;
    console.error(`${tag} Chain failed at ${stage} stage: ${error}`);

    context.sendEvent(
      completeEvent.with({ success: false, question, answer: "", error, cause }),
    );
  });

  return workflow;
}

export type RagWorkflow = ReturnType<typeof createRagWorkflow>;

/**
 * Run one question through a RAG workflow and wait for the answer.
 * @throws the original failure when the chain did not complete
 */
export async function runRagWorkflow(
  workflow: RagWorkflow,
  question: string,
  chatHistory: ChatTurn[] = [],
): Promise<string> {
  const { stream, sendEvent } = workflow.createContext();
  sendEvent(questionEvent.with({ question, chatHistory }));

  for await (const event of stream) {
    if (completeEvent.include(event)) {
      const { success, answer, error, cause } = event.data;
      if (success) {
        return answer;
      }
      throw cause instanceof Error ? cause : new Error(error ?? "RAG chain failed");
    }
  }

  throw new Error("RAG workflow stream ended without a completion event");
}
