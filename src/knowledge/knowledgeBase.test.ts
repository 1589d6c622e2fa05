import { describe, it, expect } from "vitest";
import pino from "pino";
import { KnowledgeBase } from "./knowledgeBase";
import { DocumentLoadError, EmbeddingError, InvalidConfigurationError, RebuildInProgressError } from "../errors";
import type { KnowledgeDocument } from "../ingest/document";
import { FakeEmbedder, keywordVectorizer } from "../test-helpers/fakeEmbedder";
import { CAMPUS_LINES, CAMPUS_VOCABULARY, campusDocument, testConfig } from "../test-helpers/fixtures";

const silent = pino({ level: "silent" });

function createBase(embedder: FakeEmbedder, load: () => Promise<KnowledgeDocument> = async () => campusDocument()) {
    return new KnowledgeBase({
        documentPath: "campus.txt",
        chunking: testConfig().chunking,
        embedder,
        logger: silent,
        loadDocument: load,
    });
}

describe("KnowledgeBase", () => {
    it("starts empty until rebuilt", async () => {
        const embedder = new FakeEmbedder(keywordVectorizer(CAMPUS_VOCABULARY));
        const knowledgeBase = createBase(embedder);

        expect(knowledgeBase.index.size).toBe(0);
        expect(knowledgeBase.builtAt).toBeUndefined();
        await expect(knowledgeBase.retriever.retrieve("library")).resolves.toEqual([]);
        expect(embedder.documentCalls).toEqual([]);
    });

    it("builds the index from the document", async () => {
        const embedder = new FakeEmbedder(keywordVectorizer(CAMPUS_VOCABULARY));
        const knowledgeBase = createBase(embedder);

        const stats = await knowledgeBase.rebuild();

        expect(stats).toMatchObject({ source: "campus.txt", documentLength: 82, chunkCount: 3, dimension: 3 });
        expect(stats.durationMs).toBeGreaterThanOrEqual(0);
        expect(knowledgeBase.builtAt).toBeInstanceOf(Date);
        expect(knowledgeBase.rebuilding).toBe(false);
        await expect(knowledgeBase.retriever.retrieve("library", 1)).resolves.toEqual([CAMPUS_LINES[0]]);
    });

    it("swaps in a new index on rebuild", async () => {
        const embedder = new FakeEmbedder(keywordVectorizer(CAMPUS_VOCABULARY));
        const knowledgeBase = createBase(embedder);
        await knowledgeBase.rebuild();
        const first = knowledgeBase.index;

        await knowledgeBase.rebuild();

        const second = knowledgeBase.index;
        expect(second).not.toBe(first);
        expect(second.size).toBe(first.size);
        second.entries().forEach((entry, i) => {
            const previous = first.entries()[i];
            expect(entry.chunk).toEqual(previous.chunk);
            expect(entry.vector).toEqual(previous.vector);
        });
        expect(second.entries()).toEqual(first.entries());
    });

    it("refuses a second rebuild while one is running", async () => {
        const embedder = new FakeEmbedder(keywordVectorizer(CAMPUS_VOCABULARY));
        let release: (document: KnowledgeDocument) => void = () => undefined;
        const pending = new Promise<KnowledgeDocument>((resolve) => {
            release = resolve;
        });
        const knowledgeBase = createBase(embedder, () => pending);

        const running = knowledgeBase.rebuild();

        expect(knowledgeBase.rebuilding).toBe(true);
        await expect(knowledgeBase.rebuild()).rejects.toBeInstanceOf(RebuildInProgressError);

        release(campusDocument());
        await expect(running).resolves.toMatchObject({ chunkCount: 3 });
        expect(knowledgeBase.rebuilding).toBe(false);
    });

    it("keeps the previous index when a rebuild fails", async () => {
        const embedder = new FakeEmbedder(keywordVectorizer(CAMPUS_VOCABULARY));
        const knowledgeBase = createBase(embedder);
        await knowledgeBase.rebuild();
        const previous = knowledgeBase.index;

        embedder.failure = new Error("provider unavailable");
        await expect(knowledgeBase.rebuild()).rejects.toBeInstanceOf(EmbeddingError);

        expect(knowledgeBase.index).toBe(previous);
        expect(knowledgeBase.rebuilding).toBe(false);
    });

    it("surfaces document load failures", async () => {
        const embedder = new FakeEmbedder(keywordVectorizer(CAMPUS_VOCABULARY));
        const knowledgeBase = createBase(embedder, async () => {
            throw new DocumentLoadError("campus.txt", new Error("ENOENT"));
        });

        await expect(knowledgeBase.rebuild()).rejects.toThrow('Failed to load knowledge document from "campus.txt": ENOENT');
        expect(knowledgeBase.index.size).toBe(0);
    });

    it("rejects invalid chunking settings up front", () => {
        const embedder = new FakeEmbedder(keywordVectorizer(CAMPUS_VOCABULARY));

        expect(
            () =>
                new KnowledgeBase({
                    documentPath: "campus.txt",
                    chunking: { maxChunkSize: 10, chunkOverlap: 10, separators: ["\n"] },
                    embedder,
                    logger: silent,
                })
        ).toThrow(InvalidConfigurationError);
    });
});
