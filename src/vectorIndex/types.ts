import type { Chunk } from "../ingest/chunker";

export interface IndexEntry {
    readonly chunk: Chunk;
    readonly vector: readonly number[];
}

export interface SearchHit {
    readonly chunk: Chunk;
    /** Cosine similarity in [-1, 1]. */
    readonly score: number;
}

/**
 * Read-only once built. Implementations other than the flat scan (e.g. an approximate index) plug in here.
 */
export interface VectorIndex {
    readonly size: number;
    /** Undefined while the index holds no entries. */
    readonly dimension: number | undefined;
    entries(): readonly IndexEntry[];
    search(queryVector: readonly number[], k: number): SearchHit[];
}
