import type { Logger } from "pino";
import { EmbeddingError } from "../errors";
import { assertPositiveInteger } from "../config/validate";
import type { EmbedOptions, TextEmbedder } from "../llm/types";
import type { SearchHit, VectorIndex } from "../vectorIndex/types";

export const DEFAULT_TOP_K = 3;

export interface IndexSource {
    readonly index: VectorIndex;
}

export interface RetrieveOptions extends EmbedOptions {
    k?: number;
}

export class Retriever {
    constructor(
        private readonly embedder: TextEmbedder,
        private readonly source: IndexSource,
        private readonly logger?: Logger
    ) {}

    /**
     * Ranked chunk texts, best first. An empty index yields an empty list without calling the embedder.
     */
    async retrieve(queryText: string, k = DEFAULT_TOP_K, options?: EmbedOptions): Promise<string[]> {
        const hits = await this.retrieveRanked(queryText, { ...options, k });
        return hits.map((hit) => hit.chunk.text);
    }

    async retrieveRanked(queryText: string, options: RetrieveOptions = {}): Promise<SearchHit[]> {
        const k = options.k ?? DEFAULT_TOP_K;
        assertPositiveInteger("k", k);

        const query = queryText.trim();
        if (!query) {
            throw new Error("Query cannot be empty.");
        }

        // One snapshot per query; a rebuild swapping the index mid-query does not affect this search.
        const index = this.source.index;
        if (index.size === 0) {
            this.logger?.warn("Knowledge index is empty; nothing to retrieve.");
            return [];
        }

        let queryVector: number[];
        try {
            queryVector = await this.embedder.embedQuery(query, { signal: options.signal });
        } catch (error) {
            throw new EmbeddingError("Embedding provider failed while embedding the query", {
                stage: "query",
                textCount: 1,
                totalLength: query.length,
                cause: error,
            });
        }

        const hits = index.search(queryVector, k);
        this.logger?.debug({ k, matches: hits.length, topScore: hits[0]?.score }, "Retrieved knowledge chunks.");
        return hits;
    }
}
