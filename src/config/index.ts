import "dotenv/config";

/**
 * Centralized configuration module
 * Single source of truth for all environment variables and app configuration
 */

export const REQUIRED_ENV_VARS = [
    "NEO4J_URI",
    "NEO4J_USERNAME",
    "NEO4J_PASSWORD",
    "DATABASE_URL",
    "GOOGLE_API_KEY",
] as const;

export const config = {
    neo4j: {
        uri: process.env.NEO4J_URI ?? "",
        username: process.env.NEO4J_USERNAME ?? "",
        password: process.env.NEO4J_PASSWORD ?? "",
        database: process.env.NEO4J_DATABASE || undefined,
    },
    postgres: {
        url: process.env.DATABASE_URL ?? "",
    },
    google: {
        apiKey: process.env.GOOGLE_API_KEY,
        model: process.env.GEMINI_MODEL,
    },
    paths: {
        corpusPath: process.env.CORPUS_PATH || "data/synthetic_data.txt",
    },
    chunking: {
        chunkSize: 256,
        chunkOverlap: 24,
        sectionSeparator: "\n________________________________________\n",
    },
    retrieval: {
        fullTextIndex: "entity",
        entityLabel: "__Entity__",
        documentLabel: "Document",
        excludedRelationType: "MENTIONS",
    },
} as const;

/**
 * Names of required environment variables that are missing or blank
 */
export function missingEnvVars(env: NodeJS.ProcessEnv = process.env): string[] {
    return REQUIRED_ENV_VARS.filter((key) => !env[key]?.trim());
}

/**
 * Validates that all required environment variables are present
 * @throws Error if required env vars are missing
 */
export function validateConfig(env: NodeJS.ProcessEnv = process.env) {
    const missing = missingEnvVars(env);

    if (missing.length > 0) {
        throw new Error(`Missing required environment variables: ${missing.join(", ")}`);
    }
}
