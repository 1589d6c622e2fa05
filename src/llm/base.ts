import pLimit from "p-limit";
import { embedMany, generateText, streamText, type EmbeddingModel, type LanguageModel } from "ai";
import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";
import { describeError } from "../errors";
import { countTokens, countTokensInBatch } from "../utils/tokenEncoder";
import { buildPromptMessages } from "./prompt";
import { ProviderScheduler, type ProviderRateLimits } from "./scheduler";
import type { AnswerRequest, ChatProvider, EmbedOptions, EmbeddingProvider } from "./types";

const DEFAULT_BATCH_SIZE = 50;
const DEFAULT_OUTPUT_TOKENS = 1024;

function toBatches<T>(items: readonly T[], size: number): T[][] {
    const count = Math.ceil(items.length / size);
    return Array.from({ length: count }, (_, index) => items.slice(index * size, (index + 1) * size));
}

function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(describeError(value));
}

/**
 * Embeds through an AI SDK embedding model. Batches run in parallel up to the scheduler's concurrency and
 * come back in input order. Retries belong to the scheduler, so the SDK's own retry loop is switched off.
 */
export class SdkEmbeddingProvider implements EmbeddingProvider {
    private readonly scheduler: ProviderScheduler;
    private readonly batchSize: number;

    constructor(
        readonly config: EmbeddingModelConfig,
        private readonly model: EmbeddingModel<string>,
        limits: ProviderRateLimits,
        logger?: Logger
    ) {
        this.batchSize = Math.max(1, limits.batchSize ?? DEFAULT_BATCH_SIZE);
        this.scheduler = new ProviderScheduler(limits, `${config.provider}:embed`, logger);
    }

    async embedDocuments(texts: readonly string[], options?: EmbedOptions): Promise<number[][]> {
        const limit = pLimit(this.scheduler.concurrency);
        const batches = toBatches(texts, this.batchSize);
        const vectors = await Promise.all(batches.map((batch) => limit(() => this.embedBatch(batch, options?.signal))));
        return vectors.flat();
    }

    async embedQuery(text: string, options?: EmbedOptions): Promise<number[]> {
        const [vector] = await this.embedDocuments([text], options);
        return vector;
    }

    private embedBatch(batch: string[], signal?: AbortSignal): Promise<number[][]> {
        const tokens = countTokensInBatch(batch, this.config.model);

        return this.scheduler.run(
            tokens,
            async () => {
                const { embeddings } = await embedMany({
                    model: this.model,
                    values: batch,
                    abortSignal: signal,
                    maxRetries: 0,
                });

                if (embeddings.length !== batch.length) {
                    throw new Error(
                        `${this.config.provider}:embed returned ${embeddings.length} vectors for ${batch.length} inputs.`
                    );
                }
                return embeddings;
            },
            signal
        );
    }
}

/**
 * Answers through an AI SDK language model, either in one piece or as text deltas.
 */
export class SdkChatProvider implements ChatProvider {
    private readonly scheduler: ProviderScheduler;

    constructor(
        readonly config: ChatModelConfig,
        private readonly model: LanguageModel,
        limits: ProviderRateLimits,
        private readonly logger?: Logger
    ) {
        this.scheduler = new ProviderScheduler(limits, `${config.provider}:chat`, logger);
    }

    answer(request: AnswerRequest): Promise<string> {
        return this.scheduler.run(
            this.estimateTokens(request),
            async () => {
                const { text } = await generateText(this.callSettings(request));
                return text.trim();
            },
            request.signal
        );
    }

    /**
     * Provider failures arrive as `error` parts on the full stream; they are rethrown to whoever iterates,
     * so a failed answer never looks like an empty one.
     */
    streamAnswer(request: AnswerRequest): Promise<AsyncIterable<string>> {
        return this.scheduler.run(
            this.estimateTokens(request),
            async () => {
                const { fullStream } = streamText({
                    ...this.callSettings(request),
                    onError: ({ error }) => {
                        this.logger?.warn({ err: error }, "Chat stream reported an error.");
                    },
                });

                return (async function* () {
                    for await (const part of fullStream) {
                        if (part.type === "text-delta") {
                            yield part.textDelta;
                        } else if (part.type === "error") {
                            throw toError(part.error);
                        }
                    }
                })();
            },
            request.signal
        );
    }

    private callSettings(request: AnswerRequest) {
        const { system, user } = buildPromptMessages(request);
        return {
            model: this.model,
            system,
            prompt: user,
            temperature: request.temperature ?? this.config.temperature,
            maxTokens: request.maxTokens ?? this.config.maxOutputTokens,
            abortSignal: request.signal,
            maxRetries: 0,
        };
    }

    private estimateTokens(request: AnswerRequest): number {
        const { system, user } = buildPromptMessages(request);
        const outputCap = request.maxTokens ?? this.config.maxOutputTokens ?? DEFAULT_OUTPUT_TOKENS;
        return countTokens(system, this.config.model) + countTokens(user, this.config.model) + outputCap;
    }
}
