import type { EmbeddingModel, LanguageModel } from "ai";
import type { LLMProviderName } from "../../config/types";
import type { ProviderRateLimits } from "../scheduler";

export interface ProviderConnection {
    apiKey: string;
    baseURL: string;
}

export interface ProviderModels {
    embedding(model: string): EmbeddingModel<string>;
    chat(model: string): LanguageModel;
}

/**
 * What differs between providers: where they live, how hard they may be driven, and how the SDK builds
 * their models. Everything else is shared by the SDK-backed providers in `llm/base.ts`.
 */
export interface ProviderProfile {
    name: LLMProviderName;
    defaultBaseUrl: string;
    embeddingLimits: ProviderRateLimits;
    chatLimits: ProviderRateLimits;
    connect(connection: ProviderConnection): ProviderModels;
}
