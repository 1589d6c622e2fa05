import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";

export interface EmbedOptions {
    signal?: AbortSignal;
}

/**
 * The embedding side the retrieval pipeline depends on. Build and query must use the same instance.
 */
export interface TextEmbedder {
    embedDocuments(texts: readonly string[], options?: EmbedOptions): Promise<number[][]>;
    embedQuery(text: string, options?: EmbedOptions): Promise<number[]>;
}

export interface EmbeddingProvider extends TextEmbedder {
    readonly config: EmbeddingModelConfig;
}

/** One question plus the retrieved context it should be answered from. */
export interface AnswerRequest {
    question: string;
    context: string;
    systemPrompt?: string;
    /** Overrides the configured temperature for this call. */
    temperature?: number;
    /** Overrides the configured output cap for this call. */
    maxTokens?: number;
    signal?: AbortSignal;
}

export interface ChatProvider {
    readonly config: ChatModelConfig;
    answer(request: AnswerRequest): Promise<string>;
    /** Resolves once the model has accepted the request; iteration throws if the model fails mid-answer. */
    streamAnswer(request: AnswerRequest): Promise<AsyncIterable<string>>;
}

export interface LLMClients {
    embedder: EmbeddingProvider;
    chat: ChatProvider;
}
