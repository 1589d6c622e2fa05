import type { Logger } from "pino";
import type { RetrievalConfig } from "../config/types";
import type { KnowledgeBase } from "../knowledge/knowledgeBase";
import type { AnswerRequest, ChatProvider } from "../llm/types";
import type { SearchHit } from "../vectorIndex/types";
import { getLogger } from "../utils/logger";
import { DEFAULT_TOP_K } from "./retriever";
import { assembleContext, DEFAULT_MAX_CONTEXT_CHUNKS, isNoRelevantInfo } from "./contextAssembler";

export interface AskAiOptions {
    question: string;
    topK?: number;
    maxContextChunks?: number;
    systemPrompt?: string;
    stream?: boolean;
    signal?: AbortSignal;
}

/** Where one piece of the context came from. */
export interface AskAiSource {
    source: string;
    sequence: number;
    start: number;
    end: number;
    similarity: number;
}

interface Grounding {
    sources: AskAiSource[];
    /** False when the model was handed the no-relevant-info sentinel. */
    foundContext: boolean;
}

export interface AskAiResult extends Grounding {
    answer: string;
}

export interface AskAiStreamResult extends Grounding {
    stream: AsyncIterable<string>;
}

export interface AskAiEnvironment {
    logger?: Logger;
    config?: { retrieval: RetrievalConfig };
}

function toSource({ chunk, score }: SearchHit): AskAiSource {
    return {
        source: chunk.source,
        sequence: chunk.sequence,
        start: chunk.start,
        end: chunk.end,
        similarity: score,
    };
}

async function prepare(
    knowledgeBase: KnowledgeBase,
    options: AskAiOptions,
    environment: AskAiEnvironment
): Promise<{ request: AnswerRequest; grounding: Grounding }> {
    const logger = environment.logger ?? getLogger();
    const question = options.question.trim();
    if (!question) {
        throw new Error("Question cannot be empty.");
    }

    const retrieval = environment.config?.retrieval;
    const topK = options.topK ?? retrieval?.topK ?? DEFAULT_TOP_K;
    const maxContextChunks = options.maxContextChunks ?? retrieval?.maxContextChunks ?? DEFAULT_MAX_CONTEXT_CHUNKS;

    const hits = await knowledgeBase.retriever.retrieveRanked(question, { k: topK, signal: options.signal });
    const used = hits.slice(0, maxContextChunks);
    const context = assembleContext(
        used.map((hit) => hit.chunk.text),
        maxContextChunks
    );
    const foundContext = !isNoRelevantInfo(context);

    logger.info({ topK, retrieved: hits.length, used: used.length, foundContext }, "Prepared context for question.");

    return {
        request: { question, context, systemPrompt: options.systemPrompt, signal: options.signal },
        grounding: { sources: used.map(toSource), foundContext },
    };
}

export async function askAi(
    chat: ChatProvider,
    knowledgeBase: KnowledgeBase,
    options: AskAiOptions & { stream?: false },
    environment?: AskAiEnvironment
): Promise<AskAiResult>;

export async function askAi(
    chat: ChatProvider,
    knowledgeBase: KnowledgeBase,
    options: AskAiOptions & { stream: true },
    environment?: AskAiEnvironment
): Promise<AskAiStreamResult>;

/**
 * Retrieves context for the question and hands it to the chat model. When nothing is retrieved the model
 * still runs, with the no-relevant-info sentinel as its context, so it can say it does not know.
 */
export async function askAi(
    chat: ChatProvider,
    knowledgeBase: KnowledgeBase,
    options: AskAiOptions,
    environment: AskAiEnvironment = {}
): Promise<AskAiResult | AskAiStreamResult> {
    const { request, grounding } = await prepare(knowledgeBase, options, environment);

    if (options.stream) {
        return { stream: await chat.streamAnswer(request), ...grounding };
    }

    return { answer: await chat.answer(request), ...grounding };
}
