import type { AppConfig } from "../config/types";
import { createDocument, type KnowledgeDocument } from "../ingest/document";

export const CAMPUS_VOCABULARY = ["library", "parking", "dining"] as const;

export const CAMPUS_LINES = [
    "The library opens at 8.",
    "Parking permits cost 40 dollars.",
    "Dining hall serves lunch.",
] as const;

export function campusDocument(): KnowledgeDocument {
    return createDocument("campus.txt", CAMPUS_LINES.join("\n"));
}

/**
 * With these settings the campus document splits into one chunk per line.
 */
export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
    return {
        logging: { level: "fatal", pretty: false },
        server: { apiKey: "test-secret", port: 0 },
        knowledge: { documentPath: "campus.txt" },
        chunking: { maxChunkSize: 40, chunkOverlap: 0, separators: ["\n"] },
        retrieval: { topK: 3, maxContextChunks: 3 },
        llm: {
            embedding: { provider: "openai", model: "test-embedding" },
            chat: { provider: "openai", model: "test-chat", temperature: 0 },
        },
        ...overrides,
    };
}
