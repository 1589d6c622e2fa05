import { assertPositiveInteger } from "../config/validate";

export const NO_RELEVANT_INFO = "No relevant info found.";

export const DEFAULT_MAX_CONTEXT_CHUNKS = 3;

const CHUNK_SEPARATOR = "\n\n";

export function isNoRelevantInfo(context: string): boolean {
    return context === NO_RELEVANT_INFO;
}

/**
 * Joins the best `maxChunks` chunk texts, best match first. With nothing retrieved the result is the
 * {@link NO_RELEVANT_INFO} sentinel so the answering model is told not to improvise.
 */
export function assembleContext(rankedChunks: readonly string[], maxChunks = DEFAULT_MAX_CONTEXT_CHUNKS): string {
    assertPositiveInteger("maxContextChunks", maxChunks);

    if (rankedChunks.length === 0) {
        return NO_RELEVANT_INFO;
    }

    return rankedChunks.slice(0, maxChunks).join(CHUNK_SEPARATOR);
}
