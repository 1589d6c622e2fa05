import { createOpenAI } from "@ai-sdk/openai";
import type { ProviderProfile } from "./profile";

/**
 * Also serves OpenAI-compatible endpoints (e.g. Gemini's `/v1beta/openai/`) through `baseUrl`.
 */
export const openaiProfile: ProviderProfile = {
    name: "openai",
    defaultBaseUrl: "https://api.openai.com/v1/",
    embeddingLimits: {
        batchSize: 100,
        concurrency: 4,
        maxRequestsPerMinute: 1_500,
        maxTokensPerMinute: 6_250_000,
        retries: 6,
    },
    chatLimits: {
        concurrency: 3,
        maxRequestsPerMinute: 500,
        maxTokensPerMinute: 90_000,
        retries: 5,
    },
    connect: ({ apiKey, baseURL }) => {
        const sdk = createOpenAI({ apiKey, baseURL });
        return {
            embedding: (model) => sdk.embedding(model),
            chat: (model) => sdk.chat(model),
        };
    },
};
