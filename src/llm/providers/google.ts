import { createGoogleGenerativeAI } from "@ai-sdk/google";
import type { ProviderProfile } from "./profile";

export const googleProfile: ProviderProfile = {
    name: "google",
    defaultBaseUrl: "https://generativelanguage.googleapis.com/v1beta/",
    embeddingLimits: {
        batchSize: 16,
        concurrency: 3,
        maxRequestsPerMinute: 300,
        maxTokensPerMinute: 1_000_000,
        retries: 5,
    },
    chatLimits: {
        concurrency: 2,
        maxRequestsPerMinute: 60,
        maxTokensPerMinute: 250_000,
        retries: 4,
    },
    connect: ({ apiKey, baseURL }) => {
        const sdk = createGoogleGenerativeAI({ apiKey, baseURL });
        return {
            embedding: (model) => sdk.textEmbeddingModel(model),
            chat: (model) => sdk(model),
        };
    },
};
