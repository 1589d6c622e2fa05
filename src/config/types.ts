export interface LoggingConfig {
    level: "fatal" | "error" | "warn" | "info" | "debug" | "trace";
    pretty: boolean;
}

export interface ServerConfig {
    apiKey?: string;
    port: number;
}

export interface KnowledgeConfig {
    documentPath: string;
}

export interface ChunkingConfig {
    maxChunkSize: number;
    chunkOverlap: number;
    separators: string[];
}

export interface RetrievalConfig {
    topK: number;
    maxContextChunks: number;
}

export const LLM_PROVIDER_NAMES = ["openai", "google"] as const;

export type LLMProviderName = (typeof LLM_PROVIDER_NAMES)[number];

export interface ProviderLimitsConfig {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
}

interface BaseModelConfig {
    provider: LLMProviderName;
    apiKey?: string;
    baseUrl?: string;
    limits?: ProviderLimitsConfig;
}

export interface EmbeddingModelConfig extends BaseModelConfig {
    model: string;
}

export interface ChatModelConfig extends BaseModelConfig {
    model: string;
    maxOutputTokens?: number;
    temperature: number;
}

export interface LLMConfig {
    embedding: EmbeddingModelConfig;
    chat: ChatModelConfig;
}

export interface AppConfig {
    logging: LoggingConfig;
    server: ServerConfig;
    knowledge: KnowledgeConfig;
    chunking: ChunkingConfig;
    retrieval: RetrievalConfig;
    llm: LLMConfig;
}
