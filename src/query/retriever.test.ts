import { describe, it, expect } from "vitest";
import { Retriever } from "./retriever";
import { chunkDocument } from "../ingest/chunker";
import { EmbeddingError, InvalidConfigurationError } from "../errors";
import { EMPTY_INDEX, FlatVectorIndex } from "../vectorIndex/flatIndex";
import type { VectorIndex } from "../vectorIndex/types";
import { FakeEmbedder, keywordVectorizer } from "../test-helpers/fakeEmbedder";
import { CAMPUS_LINES, CAMPUS_VOCABULARY, campusDocument, testConfig } from "../test-helpers/fixtures";

async function campusIndex(embedder: FakeEmbedder): Promise<VectorIndex> {
    const chunks = chunkDocument(campusDocument(), testConfig().chunking);
    return FlatVectorIndex.build(chunks, embedder);
}

describe("Retriever", () => {
    it("returns chunk texts ranked by similarity", async () => {
        const embedder = new FakeEmbedder(keywordVectorizer(CAMPUS_VOCABULARY));
        const retriever = new Retriever(embedder, { index: await campusIndex(embedder) });

        const texts = await retriever.retrieve("Where is parking?", 2);

        expect(texts).toEqual(["\nParking permits cost 40 dollars.", CAMPUS_LINES[0]]);
        expect(embedder.queryCalls).toEqual(["Where is parking?"]);
    });

    it("defaults to the top three chunks", async () => {
        const embedder = new FakeEmbedder(keywordVectorizer(CAMPUS_VOCABULARY));
        const retriever = new Retriever(embedder, { index: await campusIndex(embedder) });

        const texts = await retriever.retrieve("dining");

        expect(texts).toHaveLength(3);
        expect(texts[0]).toBe("\nDining hall serves lunch.");
    });

    it("returns ranked hits with scores", async () => {
        const embedder = new FakeEmbedder(keywordVectorizer(CAMPUS_VOCABULARY));
        const retriever = new Retriever(embedder, { index: await campusIndex(embedder) });

        const [hit] = await retriever.retrieveRanked("library", { k: 1 });

        expect(hit.score).toBe(1);
        expect(hit.chunk).toMatchObject({ sequence: 0, start: 0, end: 23 });
    });

    it("returns nothing from an empty index without embedding the query", async () => {
        const embedder = new FakeEmbedder(keywordVectorizer(CAMPUS_VOCABULARY));
        const retriever = new Retriever(embedder, { index: EMPTY_INDEX });

        await expect(retriever.retrieve("library")).resolves.toEqual([]);
        expect(embedder.queryCalls).toEqual([]);
    });

    it("reads the index from its source on every query", async () => {
        const embedder = new FakeEmbedder(keywordVectorizer(CAMPUS_VOCABULARY));
        const source: { index: VectorIndex } = { index: EMPTY_INDEX };
        const retriever = new Retriever(embedder, source);

        expect(await retriever.retrieve("library", 1)).toEqual([]);

        source.index = await campusIndex(embedder);
        expect(await retriever.retrieve("library", 1)).toEqual([CAMPUS_LINES[0]]);
    });

    it("rejects a blank query", async () => {
        const embedder = new FakeEmbedder(keywordVectorizer(CAMPUS_VOCABULARY));
        const retriever = new Retriever(embedder, { index: await campusIndex(embedder) });

        await expect(retriever.retrieve("   ")).rejects.toThrow("Query cannot be empty.");
    });

    it("rejects a non-positive k", async () => {
        const embedder = new FakeEmbedder(keywordVectorizer(CAMPUS_VOCABULARY));
        const retriever = new Retriever(embedder, { index: await campusIndex(embedder) });

        await expect(retriever.retrieve("library", 0)).rejects.toBeInstanceOf(InvalidConfigurationError);
    });

    it("wraps query embedding failures", async () => {
        const embedder = new FakeEmbedder(keywordVectorizer(CAMPUS_VOCABULARY));
        const retriever = new Retriever(embedder, { index: await campusIndex(embedder) });
        embedder.failure = new Error("connection reset");

        const attempt = retriever.retrieve("library");

        await expect(attempt).rejects.toBeInstanceOf(EmbeddingError);
        await expect(attempt).rejects.toMatchObject({ stage: "query", textCount: 1, totalLength: 7 });
    });
});
