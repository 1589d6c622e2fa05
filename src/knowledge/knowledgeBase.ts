import type { Logger } from "pino";
import type { AppConfig, ChunkingConfig } from "../config/types";
import { assertChunkingConfig } from "../config/validate";
import { RebuildInProgressError } from "../errors";
import { chunkDocument } from "../ingest/chunker";
import { loadDocument, type KnowledgeDocument } from "../ingest/document";
import type { EmbedOptions, TextEmbedder } from "../llm/types";
import { Retriever, type IndexSource } from "../query/retriever";
import { EMPTY_INDEX, FlatVectorIndex } from "../vectorIndex/flatIndex";
import type { VectorIndex } from "../vectorIndex/types";
import { childLogger, getLogger } from "../utils/logger";

export interface KnowledgeBaseOptions {
    documentPath: string;
    chunking: ChunkingConfig;
    embedder: TextEmbedder;
    logger?: Logger;
    loadDocument?: (documentPath: string) => Promise<KnowledgeDocument>;
}

export interface RebuildStats {
    source: string;
    documentLength: number;
    chunkCount: number;
    dimension: number | undefined;
    durationMs: number;
}

/**
 * Owns the live index. Nothing is built on construction; callers run {@link KnowledgeBase.rebuild}
 * explicitly and handle its failures.
 */
export class KnowledgeBase implements IndexSource {
    readonly retriever: Retriever;

    private current: VectorIndex = EMPTY_INDEX;
    private inFlight: Promise<RebuildStats> | null = null;
    private lastBuiltAt: Date | undefined;
    private readonly logger: Logger;
    private readonly load: (documentPath: string) => Promise<KnowledgeDocument>;

    constructor(private readonly options: KnowledgeBaseOptions) {
        assertChunkingConfig(options.chunking);
        this.logger = childLogger(options.logger ?? getLogger(), { module: "knowledge" });
        this.load = options.loadDocument ?? loadDocument;
        this.retriever = new Retriever(options.embedder, this, this.logger);
    }

    get index(): VectorIndex {
        return this.current;
    }

    get rebuilding(): boolean {
        return this.inFlight !== null;
    }

    get builtAt(): Date | undefined {
        return this.lastBuiltAt;
    }

    /**
     * Builds a fresh index off to the side and swaps it in only once it is complete. On failure the
     * previous index stays live. Concurrent rebuilds are refused with {@link RebuildInProgressError}.
     */
    async rebuild(options?: EmbedOptions): Promise<RebuildStats> {
        if (this.inFlight) {
            throw new RebuildInProgressError();
        }

        this.inFlight = this.buildNext(options);
        try {
            return await this.inFlight;
        } finally {
            this.inFlight = null;
        }
    }

    private async buildNext(options?: EmbedOptions): Promise<RebuildStats> {
        const startedAt = Date.now();
        const document = await this.load(this.options.documentPath);

        const chunks = chunkDocument(document, this.options.chunking);
        this.logger.info(
            { source: document.source, documentLength: document.content.length, chunkCount: chunks.length },
            "Chunked knowledge document."
        );

        const next = await FlatVectorIndex.build(chunks, this.options.embedder, options);
        this.current = next;
        this.lastBuiltAt = new Date();

        const stats: RebuildStats = {
            source: document.source,
            documentLength: document.content.length,
            chunkCount: next.size,
            dimension: next.dimension,
            durationMs: Date.now() - startedAt,
        };
        this.logger.info(stats, "Knowledge index ready.");
        return stats;
    }
}

export function createKnowledgeBase(config: AppConfig, embedder: TextEmbedder, logger?: Logger): KnowledgeBase {
    return new KnowledgeBase({
        documentPath: config.knowledge.documentPath,
        chunking: config.chunking,
        embedder,
        logger,
    });
}
