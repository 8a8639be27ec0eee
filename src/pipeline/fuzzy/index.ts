/** Characters (and operators) with meaning in the full-text query syntax */
const FULL_TEXT_SPECIAL_CHARS = [
    "+", "-", "&&", "||", "!", "(", ")", "{", "}", "[", "]",
    "^", "\"", "~", "*", "?", ":", "\\", "/",
] as const;

/** Edit distance tolerated per token */
export const FUZZY_EDIT_DISTANCE = 2;

export function removeFullTextChars(text: string): string {
    let cleaned = text;
    for (const char of FULL_TEXT_SPECIAL_CHARS) {
        cleaned = cleaned.split(char).join(" ");
    }
    return cleaned.trim();
}

/**
 * Turn a free-text entity name into a fuzzy full-text query,
 * e.g. `Aurora Dynamics` -> `Aurora~2 AND Dynamics~2`.
 *
 * Returns "" when nothing searchable is left; callers must skip the search then.
 */
export function buildFullTextQuery(text: string): string {
    const words = removeFullTextChars(text).split(/\s+/).filter(Boolean);
    return words.map((word) => `${word}~${FUZZY_EDIT_DISTANCE}`).join(" AND ");
}
