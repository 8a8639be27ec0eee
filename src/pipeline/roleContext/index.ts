import type { SimilaritySearchFn } from "../../types/domain.js";
import { NAME_STOPLIST, ROLE_INDICATORS } from "../keywords.js";

export const ROLE_SEARCH_K = 3;
export const MIN_NAME_TOKENS = 2;

export interface RoleContextScannerOptions {
    roleIndicators?: readonly string[];
    stoplist?: readonly string[];
    k?: number;
}

/**
 * Best-effort recovery of role -> person bindings from retrieved passages.
 * False positives are tolerated; the answering model does the final resolution.
 */
export class RoleContextScanner {
    name = "RoleContextScanner";
    private readonly roleIndicators: readonly string[];
    private readonly stoplist: ReadonlySet<string>;
    private readonly k: number;

    constructor(options: RoleContextScannerOptions = {}) {
        this.roleIndicators = options.roleIndicators ?? ROLE_INDICATORS;
        this.stoplist = new Set(options.stoplist ?? NAME_STOPLIST);
        this.k = options.k ?? ROLE_SEARCH_K;
    }

    /** Tokens that look like parts of a proper name */
    nameLikeTokens(sentence: string): string[] {
        return sentence
            .split(/\s+/)
            .filter((word) => /^\p{Lu}/u.test(word) && word.length > 2 && !this.stoplist.has(word));
    }

    async scan(question: string, search: SimilaritySearchFn): Promise<string> {
        const loweredQuestion = question.toLowerCase();
        let roleContext = "";

        for (const indicator of this.roleIndicators) {
            const loweredIndicator = indicator.toLowerCase();
            if (!loweredQuestion.includes(loweredIndicator)) {
                continue;
            }

            const chunks = await search(`${indicator} person name who`, this.k);
            for (const chunk of chunks) {
                for (const sentence of chunk.content.split(".")) {
                    if (!sentence.toLowerCase().includes(loweredIndicator)) {
                        continue;
                    }
                    if (this.nameLikeTokens(sentence).length >= MIN_NAME_TOKENS) {
                        roleContext += `Role context: ${sentence.trim()}\n`;
                    }
                }
            }
        }

        return roleContext;
    }
}
