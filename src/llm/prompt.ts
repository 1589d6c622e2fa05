import { NO_RELEVANT_INFO } from "../query/contextAssembler";
import type { AnswerRequest } from "./types";

export const DEFAULT_SYSTEM_PROMPT = [
    "You are a retrieval-augmented campus assistant.",
    "Answer questions about the campus using only the knowledge base context you are given.",
    "Always ground your answer in the retrieved context.",
    `If the context is "${NO_RELEVANT_INFO}" or does not cover the question, say clearly that you do not know.`,
    "Do not make up answers.",
    "Be concise, accurate, and professional.",
].join(" ");

export function buildPromptMessages(options: Pick<AnswerRequest, "question" | "context" | "systemPrompt">): { system: string; user: string } {
    const system = options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT;

    const userSections = [
        "Knowledge base context:",
        options.context.trim(),
        `Question: ${options.question.trim()}`,
        "Answer:",
    ];

    return { system, user: userSections.join("\n\n") };
}
