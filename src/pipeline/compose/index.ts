export const CHUNK_SEPARATOR = "#Document ";

export const ROLE_RESOLUTION_INSTRUCTIONS = [
    "- When you see a role mentioned (like CFO, CTO, etc.), look through ALL the context to find who holds that role",
    "- Connect actions performed by roles to the specific people who hold those roles",
    "- If someone \"approved\" something and they're described by a role, identify the person's name",
] as const;

/**
 * Single context block handed to the answering step
 */
export function composeContext(structured: string, unstructuredChunks: readonly string[]): string {
    return [
        "Structured data (Graph relationships):",
        structured,
        "",
        "Unstructured data (Document chunks):",
        unstructuredChunks.join(CHUNK_SEPARATOR),
        "",
        "Instructions for role resolution:",
        ...ROLE_RESOLUTION_INSTRUCTIONS,
        "",
    ].join("\n");
}
