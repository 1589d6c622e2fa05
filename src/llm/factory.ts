import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig, LLMConfig, LLMProviderName } from "../config/types";
import { mergeLimits, resolveBaseUrl } from "../utils/providerUtils";
import { SdkChatProvider, SdkEmbeddingProvider } from "./base";
import { googleProfile } from "./providers/google";
import { openaiProfile } from "./providers/openai";
import type { ProviderModels, ProviderProfile } from "./providers/profile";
import type { ChatProvider, EmbeddingProvider, LLMClients } from "./types";

export type ProviderKind = "embedding" | "chat";

const PROFILES: Record<LLMProviderName, ProviderProfile> = {
    openai: openaiProfile,
    google: googleProfile,
};

const API_KEY_VARIABLES: Record<ProviderKind, string> = {
    embedding: "CAMPUS_RAG_LLM_EMBEDDING_API_KEY",
    chat: "CAMPUS_RAG_LLM_CHAT_API_KEY",
};

function connect(kind: ProviderKind, config: EmbeddingModelConfig, profile: ProviderProfile): ProviderModels {
    if (!config.apiKey) {
        throw new Error(`${API_KEY_VARIABLES[kind]} is required for the ${profile.name} ${kind} provider.`);
    }

    return profile.connect({
        apiKey: config.apiKey,
        baseURL: resolveBaseUrl(config.baseUrl, profile.defaultBaseUrl),
    });
}

export function createProvider(kind: "embedding", config: EmbeddingModelConfig, logger?: Logger): EmbeddingProvider;
export function createProvider(kind: "chat", config: ChatModelConfig, logger?: Logger): ChatProvider;
export function createProvider(
    kind: ProviderKind,
    config: EmbeddingModelConfig | ChatModelConfig,
    logger?: Logger
): EmbeddingProvider | ChatProvider {
    const profile = PROFILES[config.provider];
    const models = connect(kind, config, profile);
    const scoped = logger?.child({ module: "llm", kind, provider: profile.name });

    if (kind === "embedding") {
        return new SdkEmbeddingProvider(
            config,
            models.embedding(config.model),
            mergeLimits(profile.embeddingLimits, config.limits),
            scoped
        );
    }

    if (!("temperature" in config)) {
        throw new Error("Chat provider configuration is missing a temperature.");
    }

    return new SdkChatProvider(config, models.chat(config.model), mergeLimits(profile.chatLimits, config.limits), scoped);
}

export function createLLMClients(config: LLMConfig, logger?: Logger): LLMClients {
    return {
        embedder: createProvider("embedding", config.embedding, logger),
        chat: createProvider("chat", config.chat, logger),
    };
}
