import type { Server } from "node:http";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import pino from "pino";
import { closeServer, createApp, listen } from "./server";
import type { ServerContext } from "./utils/context";
import { KnowledgeBase } from "../knowledge/knowledgeBase";
import { FakeChat } from "../test-helpers/fakeChat";
import { FakeEmbedder, keywordVectorizer } from "../test-helpers/fakeEmbedder";
import { CAMPUS_LINES, CAMPUS_VOCABULARY, campusDocument, testConfig } from "../test-helpers/fixtures";

const silent = pino({ level: "silent" });
const API_KEY = "test-secret";

describe("HTTP server", () => {
    let server: Server;
    let baseUrl: string;
    let context: ServerContext;
    let chat: FakeChat;

    beforeEach(async () => {
        const knowledgeBase = new KnowledgeBase({
            documentPath: "campus.txt",
            chunking: testConfig().chunking,
            embedder: new FakeEmbedder(keywordVectorizer(CAMPUS_VOCABULARY)),
            logger: silent,
            loadDocument: async () => campusDocument(),
        });
        await knowledgeBase.rebuild();

        chat = new FakeChat();
        context = { config: testConfig(), chat, knowledgeBase };
        server = await listen(createApp(context, silent), 0);
        const address = server.address();
        if (address === null || typeof address === "string") {
            throw new Error("Expected the server to listen on a TCP port.");
        }
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterEach(async () => {
        await closeServer(server);
    });

    function post(route: string, body: unknown, headers: Record<string, string> = { "x-api-key": API_KEY }) {
        return fetch(`${baseUrl}${route}`, {
            method: "POST",
            headers: { "content-type": "application/json", ...headers },
            body: JSON.stringify(body),
        });
    }

    it("reports health without an API key", async () => {
        const response = await fetch(`${baseUrl}/health`);
        expect(response.status).toBe(200);
        expect(await response.json()).toEqual({
            status: "ok",
            rebuilding: false,
            chunkCount: 3,
            builtAt: expect.any(String),
        });
    });

    it("rejects requests without a valid API key", async () => {
        const missing = await post("/search", { query: "library" }, {});
        const wrong = await post("/search", { query: "library" }, { "x-api-key": "wrong-key" });

        expect(missing.status).toBe(401);
        expect(await missing.json()).toEqual({ status: "error", message: "Invalid or missing API key." });
        expect(wrong.status).toBe(401);
    });

    it("searches the index", async () => {
        const response = await post("/search", { query: "library", topK: 1 });

        expect(response.status).toBe(200);
        expect(await response.json()).toEqual({
            status: "ok",
            matches: [{ sequence: 0, start: 0, end: 23, similarity: 1, content: CAMPUS_LINES[0] }],
            count: 1,
        });
    });

    it("accepts a bearer token", async () => {
        const response = await post("/search", { query: "parking" }, { authorization: `Bearer ${API_KEY}` });
        expect(response.status).toBe(200);
        expect(await response.json()).toMatchObject({
            count: 3,
            matches: [{ sequence: 1 }, { sequence: 0 }, { sequence: 2 }],
        });
    });

    it("validates the search request", async () => {
        const response = await post("/search", { query: "   " });

        expect(response.status).toBe(400);
        expect(await response.json()).toEqual({
            status: "error",
            message: "Invalid request field 'query': must be a non-empty string.",
        });
    });

    it("answers a question", async () => {
        const response = await post("/ask", { question: "When does the library open?", maxContextChunks: 1 });

        expect(response.status).toBe(200);
        expect(await response.json()).toEqual({
            status: "ok",
            answer: "The library opens at 8.",
            sources: [{ source: "campus.txt", sequence: 0, start: 0, end: 23, similarity: 1 }],
            foundContext: true,
        });
    });

    it("streams an answer as server-sent events", async () => {
        const response = await post("/ask", { question: "library", maxContextChunks: 1, stream: true });
        const text = await response.text();

        expect(response.headers.get("content-type")).toContain("text/event-stream");
        const events = text
            .split("\n")
            .filter((line) => line.startsWith("event: "))
            .map((line) => line.slice("event: ".length));
        expect(events).toEqual(["status", "token", "token", "final", "end"]);
        expect(text).toContain('data: {"text":"The library "}');
        expect(text).toContain('"answer":"The library opens at 8."');
    });

    it("sends an error event when the answer stream fails", async () => {
        chat.streamFailure = new Error("chat stream failed");

        const response = await post("/ask", { question: "library", maxContextChunks: 1 }, {
            "x-api-key": API_KEY,
            accept: "text/event-stream",
        });
        const text = await response.text();

        const events = text
            .split("\n")
            .filter((line) => line.startsWith("event: "))
            .map((line) => line.slice("event: ".length));
        expect(events).toEqual(["status", "token", "error", "end"]);
        expect(text).toContain('event: error\ndata: {"message":"chat stream failed"}\n\n');
    });

    it("answers malformed JSON with a JSON error", async () => {
        const response = await fetch(`${baseUrl}/search`, {
            method: "POST",
            headers: { "content-type": "application/json", "x-api-key": API_KEY },
            body: '{"query": "library"',
        });

        expect(response.status).toBe(400);
        expect(response.headers.get("content-type")).toContain("application/json");
        expect(await response.json()).toEqual({ status: "error", message: "Request body must be valid JSON." });
    });

    it("rebuilds the index on request", async () => {
        const previous = context.knowledgeBase.index;

        const response = await post("/reindex", {});
        expect(response.status).toBe(200);
        expect(await response.json()).toMatchObject({
            status: "ok",
            stats: { source: "campus.txt", chunkCount: 3, dimension: 3 },
        });
        expect(context.knowledgeBase.index).not.toBe(previous);
    });

    it("refuses to start without an API key", () => {
        const unprotected = { ...context, config: testConfig({ server: { port: 0 } }) };

        expect(() => createApp(unprotected, silent)).toThrow("Server configuration must include CAMPUS_RAG_SERVER_API_KEY.");
    });
});
