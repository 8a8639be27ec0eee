import type { EntityName } from "../../types/domain.js";
import type { IEntityExtractor, ITextGenerator } from "../../types/interfaces/pipeline.js";
import { EntitiesSchema } from "../../types/zodSchemas.js";
import { ENTITY_EXTRACTION_PROMPT } from "../../prompts/entityPrompt.js";
import { ExtractionError, errorMessage } from "../../utils/errors.js";

/**
 * Parse the model's structured output into entity names.
 * @throws ExtractionError when the output is not `{ "names": string[] }`
 */
export function parseEntityNames(rawOutput: string): EntityName[] {
    let parsed: unknown;
    try {
        parsed = JSON.parse(rawOutput);
    } catch {
        throw new ExtractionError(
            `Entity extraction returned invalid JSON: ${rawOutput.substring(0, 50)}`,
        );
    }

    const result = EntitiesSchema.safeParse(parsed);
    if (!result.success) {
        throw new ExtractionError(
            `Entity extraction returned a malformed structure: ${result.error.issues.map((issue) => issue.message).join("; ")}`,
        );
    }

    return result.data.names
        .map((name) => name.trim())
        .filter((name) => name.length > 0);
}

/**
 * Extracts persons, organizations and roles from a question with one model call
 */
export class EntityExtractor implements IEntityExtractor {
    name = "EntityExtractor";

    constructor(private readonly generator: ITextGenerator) {}

    async extract(question: string): Promise<EntityName[]> {
        const prompt = ENTITY_EXTRACTION_PROMPT.format({ question });

        let rawOutput: string;
        try {
            rawOutput = await this.generator.complete(prompt, { json: true });
        } catch (llmError) {
            throw new ExtractionError(`[${this.name}] LLM error: ${errorMessage(llmError)}`, { cause: llmError });
        }

        const names = parseEntityNames(rawOutput);
        console.log(`[${this.name}] Extracted ${names.length} entities: ${names.join(", ")}`);
        return names;
    }
}
