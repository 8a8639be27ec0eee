/**
 * Error types surfaced by the retrieval pipeline.
 * Neither is caught inside the pipeline; the top-level caller decides on retries.
 */

/** The language model call for entity extraction failed or returned a malformed structure */
export class ExtractionError extends Error {
    override name = "ExtractionError";

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
    }
}

/** A graph or vector store call failed */
export class BackendError extends Error {
    override name = "BackendError";

    constructor(
        readonly backend: "graph" | "vector",
        message: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
