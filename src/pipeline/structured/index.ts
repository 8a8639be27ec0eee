import type { SimilaritySearchFn } from "../../types/domain.js";
import type { IEntityExtractor } from "../../types/interfaces/pipeline.js";
import { buildFullTextQuery } from "../fuzzy/index.js";
import type { GraphNeighborResolver } from "../neighbors/index.js";
import type { RoleContextScanner } from "../roleContext/index.js";

export const ROLE_CONTEXT_HEADER = "Role-to-person context from documents:";

/** Entities resolved concurrently per batch */
const BATCH_SIZE = 5;

/**
 * Entity extraction -> fuzzy query -> graph neighbors, plus role context from the documents
 */
export class StructuredRetriever {
    name = "StructuredRetriever";

    constructor(
        private readonly extractor: IEntityExtractor,
        private readonly resolver: GraphNeighborResolver,
        private readonly roleScanner: RoleContextScanner,
        private readonly search: SimilaritySearchFn,
    ) {}

    async retrieveStructured(question: string): Promise<string> {
        const entities = await this.extractor.extract(question);

        // Fan out per entity, joined back in extraction order
        const perEntity: string[][] = [];
        for (let i = 0; i < entities.length; i += BATCH_SIZE) {
            const batch = entities.slice(i, i + BATCH_SIZE);
            const batchResults = await Promise.all(batch.map(async (entity) => {
                console.log(`[${this.name}] Getting Entity: ${entity}`);
                return this.resolver.resolve(buildFullTextQuery(entity));
            }));
            perEntity.push(...batchResults);
        }

        let result = perEntity.map((lines) => `${lines.join("\n")}\n`).join("");

        const roleContext = await this.roleScanner.scan(question, this.search);
        if (roleContext) {
            result += `\n${ROLE_CONTEXT_HEADER}\n${roleContext}`;
        }

        return result;
    }
}
