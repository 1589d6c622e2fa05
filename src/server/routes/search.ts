import type { Request, Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import type { ServerContext } from "../utils/context";
import { sendError, sendValidationError } from "../utils/errors";

export const searchRequestSchema = z.object({
    query: z.string().trim().min(1, "must be a non-empty string"),
    topK: z.number().int().positive().optional(),
});

interface SearchMatch {
    sequence: number;
    start: number;
    end: number;
    similarity: number;
    content: string;
}

export async function handleSearchRequest(
    req: Request,
    res: Response,
    context: Pick<ServerContext, "config" | "knowledgeBase">,
    logger: Logger
): Promise<void> {
    const parsed = searchRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
        sendValidationError(res, parsed.error);
        return;
    }

    const { query, topK } = parsed.data;

    try {
        const hits = await context.knowledgeBase.retriever.retrieveRanked(query, {
            k: topK ?? context.config.retrieval.topK,
        });

        const matches: SearchMatch[] = hits.map(({ chunk, score }) => ({
            sequence: chunk.sequence,
            start: chunk.start,
            end: chunk.end,
            similarity: score,
            content: chunk.text,
        }));

        res.json({
            status: "ok",
            matches,
            count: matches.length,
        });
    } catch (error) {
        sendError(res, logger, error, "Search endpoint failed.");
    }
}
