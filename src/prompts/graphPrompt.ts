import { PromptTemplate } from "llamaindex";

export const GRAPH_EXTRACTION_PROMPT = new PromptTemplate({
    template: `
You are building a knowledge graph about companies and the people who work for them.

Extract from the text below:
- nodes: every person, organization, product and job title/role that is named.
  Use the most complete name that appears in the text as the id (e.g. "Priya Nair", not "Nair").
  Give each node a short type such as Person, Organization, Product or Role.
- relationships: facts connecting two of those nodes, with a short UPPER_SNAKE_CASE type
  such as FOUNDED, CFO_OF, ACQUIRED, PARTNERS_WITH or WORKS_FOR.

Instructions:
1. Only use node ids from your nodes list as relationship source and target
2. Only extract relationships stated in the text; do not infer from general knowledge
3. Handle negation: "X did not acquire Y" -> do NOT create the relationship

Text:
{text}

Return ONLY a JSON object with two arrays:
- "nodes": objects with "id" and "type" strings
- "relationships": objects with "source", "target" and "type" strings
    `,
});
