import { PromptTemplate } from "llamaindex";

export const ENTITY_EXTRACTION_PROMPT = new PromptTemplate({
    template: `
You are extracting organization, person entities, and job titles/roles from the text.
Include specific names, company names, and roles like CEO, CFO, CTO, etc.

Use the given format to extract information from the following input: {question}

Return ONLY a JSON object with a "names" array of strings, one per entity or role.
If nothing qualifies, "names" is an empty array.
    `,
});
