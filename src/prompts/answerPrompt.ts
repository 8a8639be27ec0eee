import { PromptTemplate } from "llamaindex";

export const CONDENSE_QUESTION_PROMPT = new PromptTemplate({
    template: `
Given the following conversation and a follow up question,
rephrase the follow up question to be a standalone question, in its original language.

Chat History:
{chatHistory}
Follow Up Input: {question}
Standalone question:`,
});

export const ANSWER_PROMPT = new PromptTemplate({
    template: `
Answer the question based only on the following context:
{context}

Question: {question}
Use natural language and be concise.
Answer:`,
});
