import { workflowEvent } from "@llamaindex/workflow-core";
import type { ChatTurn } from "../../types/domain.js";

/** Event fired to start a RAG run with the user's question */
export const questionEvent = workflowEvent<{
  question: string;
  chatHistory: ChatTurn[];
}>();

/** Event fired once the search query is settled (condensed when there is chat history) */
export const retrieveEvent = workflowEvent<{
  question: string;
  searchQuery: string;
}>();

/** Event fired when grounding context is ready for the answer step */
export const answerEvent = workflowEvent<{
  question: string;
  context: string;
}>();

/** Event fired when the run is over, with the answer or the failure */
export const completeEvent = workflowEvent<{
  success: boolean;
  question: string;
  answer: string;
  error?: string;
  cause?: unknown;
}>();

/** Event fired on any error in the chain */
export const errorEvent = workflowEvent<{
  stage: string;
  error: string;
  cause: unknown;
  question: string;
}>();
