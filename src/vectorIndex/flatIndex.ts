import { EmbeddingError, InvalidConfigurationError } from "../errors";
import type { Chunk } from "../ingest/chunker";
import type { EmbedOptions, TextEmbedder } from "../llm/types";
import { cosineSimilarity } from "./similarity";
import type { IndexEntry, SearchHit, VectorIndex } from "./types";

function isUsableVector(vector: readonly number[], dimension: number): boolean {
    return vector.length === dimension && vector.every((value) => Number.isFinite(value));
}

/**
 * Exact nearest-neighbour search by linear scan over every entry.
 */
export class FlatVectorIndex implements VectorIndex {
    private readonly items: readonly IndexEntry[];

    private constructor(items: readonly IndexEntry[], readonly dimension: number | undefined) {
        this.items = Object.freeze(items);
    }

    static empty(): FlatVectorIndex {
        return new FlatVectorIndex([], undefined);
    }

    /**
     * Embeds every chunk in one batch and keeps them in chunk order. Any failure aborts the whole build;
     * no partially embedded index is ever returned.
     */
    static async build(chunks: readonly Chunk[], embedder: TextEmbedder, options?: EmbedOptions): Promise<FlatVectorIndex> {
        if (chunks.length === 0) {
            return FlatVectorIndex.empty();
        }

        const texts = chunks.map((chunk) => chunk.text);
        const details = {
            stage: "build" as const,
            textCount: texts.length,
            totalLength: texts.reduce((sum, text) => sum + text.length, 0),
        };

        let vectors: number[][];
        try {
            vectors = await embedder.embedDocuments(texts, options);
        } catch (error) {
            throw new EmbeddingError("Embedding provider failed while building the index", { ...details, cause: error });
        }

        if (vectors.length !== chunks.length) {
            throw new EmbeddingError(`Embedding provider returned ${vectors.length} vectors for ${chunks.length} chunks`, details);
        }

        const dimension = vectors[0].length;
        if (dimension === 0) {
            throw new EmbeddingError("Embedding provider returned empty vectors", details);
        }

        const entries = chunks.map((chunk, index): IndexEntry => {
            const vector = vectors[index];
            if (!isUsableVector(vector, dimension)) {
                throw new EmbeddingError(
                    `Vector for chunk ${chunk.sequence} has dimension ${vector.length} or non-finite values; expected ${dimension} finite values`,
                    details
                );
            }
            return Object.freeze({ chunk, vector: Object.freeze([...vector]) });
        });

        return new FlatVectorIndex(entries, dimension);
    }

    get size(): number {
        return this.items.length;
    }

    entries(): readonly IndexEntry[] {
        return this.items;
    }

    /**
     * Top `min(k, size)` entries by cosine similarity. Equal scores keep insertion order.
     */
    search(queryVector: readonly number[], k: number): SearchHit[] {
        if (!Number.isInteger(k) || k < 0) {
            throw new InvalidConfigurationError("k", k, "must be a non-negative integer.");
        }

        if (k === 0 || this.dimension === undefined) {
            return [];
        }

        if (!isUsableVector(queryVector, this.dimension)) {
            throw new EmbeddingError(
                `Query vector has dimension ${queryVector.length} or non-finite values; the index was built with dimension ${this.dimension}`,
                { stage: "query" }
            );
        }

        return this.items
            .map((entry, position) => ({ entry, position, score: cosineSimilarity(queryVector, entry.vector) }))
            .sort((a, b) => b.score - a.score || a.position - b.position)
            .slice(0, k)
            .map(({ entry, score }) => ({ chunk: entry.chunk, score }));
    }
}

export const EMPTY_INDEX: VectorIndex = FlatVectorIndex.empty();
