import { config as loadDotenv } from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import {
    LLM_PROVIDER_NAMES,
    type AppConfig,
    type ChatModelConfig,
    type EmbeddingModelConfig,
    type LoggingConfig,
    type ProviderLimitsConfig,
} from "./types";
import { assertChunkingConfig, assertRetrievalConfig } from "./validate";
import { describeError } from "../errors";

const PACKAGE_ROOT = fileURLToPath(new URL("../..", import.meta.url));

const LOG_LEVELS: ReadonlyArray<LoggingConfig["level"]> = ["fatal", "error", "warn", "info", "debug", "trace"];

const TRUE_VALUES = new Set(["true", "1", "yes"]);

export const DEFAULT_SEPARATORS = ["\n\n", "\n", ".", " "];

/**
 * Reads `CAMPUS_RAG_*` variables. Empty values count as unset.
 */
class EnvReader {
    constructor(
        private readonly env: NodeJS.ProcessEnv,
        private readonly prefix = "CAMPUS_RAG_"
    ) {}

    private key(name: string): string {
        return `${this.prefix}${name}`;
    }

    optional(name: string): string | undefined {
        return this.env[this.key(name)] || undefined;
    }

    required(name: string): string {
        const value = this.optional(name);
        if (value === undefined) {
            throw new Error(`Missing required environment variable: ${this.key(name)}`);
        }
        return value;
    }

    number(name: string): number | undefined;
    number(name: string, fallback: number): number;
    number(name: string, fallback?: number): number | undefined {
        const raw = this.optional(name);
        if (raw === undefined) {
            return fallback;
        }
        const parsed = Number.parseFloat(raw);
        if (Number.isNaN(parsed)) {
            throw new Error(`Environment variable ${this.key(name)} must be a valid number, got: ${raw}`);
        }
        return parsed;
    }

    flag(name: string, fallback: boolean): boolean {
        const raw = this.optional(name);
        return raw === undefined ? fallback : TRUE_VALUES.has(raw.trim().toLowerCase());
    }

    oneOf<T extends string>(name: string, choices: readonly T[], fallback?: T): T {
        const raw = fallback === undefined ? this.required(name) : (this.optional(name) ?? fallback);
        const wanted = raw.trim().toLowerCase();
        const match = choices.find((choice) => choice === wanted);
        if (!match) {
            throw new Error(`Environment variable ${this.key(name)} must be one of ${choices.join(", ")}, got: ${wanted}`);
        }
        return match;
    }

    limits(scope: string, withBatchSize: boolean): ProviderLimitsConfig {
        return {
            ...(withBatchSize ? { batchSize: this.number(`${scope}_LIMITS_BATCH_SIZE`) } : {}),
            concurrency: this.number(`${scope}_LIMITS_CONCURRENCY`),
            maxRequestsPerMinute: this.number(`${scope}_LIMITS_MAX_REQUESTS_PER_MINUTE`),
            maxTokensPerMinute: this.number(`${scope}_LIMITS_MAX_TOKENS_PER_MINUTE`),
            retries: this.number(`${scope}_LIMITS_RETRIES`),
        };
    }
}

/**
 * Separators are given as a JSON array so that "\n\n" and " " survive the .env format.
 */
export function parseSeparators(raw: string | undefined, key = "CAMPUS_RAG_CHUNK_SEPARATORS"): string[] {
    if (!raw) {
        return [...DEFAULT_SEPARATORS];
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new Error(`Environment variable ${key} must be a JSON array of strings: ${describeError(error)}`);
    }

    if (!Array.isArray(parsed) || !parsed.every((item): item is string => typeof item === "string")) {
        throw new Error(`Environment variable ${key} must be a JSON array of strings, got: ${raw}`);
    }

    return parsed;
}

export function resolveConfigPath(providedPath?: string): string {
    const candidate = providedPath ?? process.env.CAMPUS_RAG_CONFIG_PATH;
    return candidate ? path.resolve(process.cwd(), candidate) : path.join(PACKAGE_ROOT, ".env");
}

function readEmbeddingConfig(env: EnvReader): EmbeddingModelConfig {
    return {
        provider: env.oneOf("LLM_EMBEDDING_PROVIDER", LLM_PROVIDER_NAMES),
        model: env.required("LLM_EMBEDDING_MODEL"),
        apiKey: env.optional("LLM_EMBEDDING_API_KEY"),
        baseUrl: env.optional("LLM_EMBEDDING_BASE_URL"),
        limits: env.limits("LLM_EMBEDDING", true),
    };
}

function readChatConfig(env: EnvReader): ChatModelConfig {
    return {
        provider: env.oneOf("LLM_CHAT_PROVIDER", LLM_PROVIDER_NAMES),
        model: env.required("LLM_CHAT_MODEL"),
        apiKey: env.optional("LLM_CHAT_API_KEY"),
        baseUrl: env.optional("LLM_CHAT_BASE_URL"),
        temperature: env.number("LLM_CHAT_TEMPERATURE", 0),
        maxOutputTokens: env.number("LLM_CHAT_MAX_OUTPUT_TOKENS", 1024),
        limits: env.limits("LLM_CHAT", false),
    };
}

export async function loadAppConfig(configPath?: string): Promise<AppConfig> {
    const result = loadDotenv({ path: configPath ?? resolveConfigPath() });

    // A missing default .env is fine when the variables come from the environment.
    if (result.error && configPath) {
        throw new Error(`Failed to load environment file from "${configPath}": ${result.error.message}`);
    }

    const env = new EnvReader(process.env);

    const config: AppConfig = {
        logging: {
            level: env.oneOf("LOGGING_LEVEL", LOG_LEVELS, "info"),
            pretty: env.flag("LOGGING_PRETTY", true),
        },
        server: {
            apiKey: env.optional("SERVER_API_KEY"),
            port: env.number("SERVER_PORT", Number(process.env.PORT || 3000)),
        },
        knowledge: {
            documentPath: path.resolve(PACKAGE_ROOT, env.optional("KNOWLEDGE_DOCUMENT_PATH") ?? "data/campus.txt"),
        },
        chunking: {
            maxChunkSize: env.number("CHUNK_MAX_SIZE", 800),
            chunkOverlap: env.number("CHUNK_OVERLAP", 100),
            separators: parseSeparators(env.optional("CHUNK_SEPARATORS")),
        },
        retrieval: {
            topK: env.number("RETRIEVAL_TOP_K", 3),
            maxContextChunks: env.number("RETRIEVAL_MAX_CONTEXT_CHUNKS", 3),
        },
        llm: {
            embedding: readEmbeddingConfig(env),
            chat: readChatConfig(env),
        },
    };

    assertChunkingConfig(config.chunking);
    assertRetrievalConfig(config.retrieval);

    return config;
}
