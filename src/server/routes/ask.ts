import type { Request, Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import { describeError } from "../../errors";
import { askAi, type AskAiOptions } from "../../query/askAi";
import type { ServerContext } from "../utils/context";
import { sendError, sendValidationError } from "../utils/errors";
import { EventStream } from "../utils/eventStream";

const TRUTHY_FLAGS = new Set(["1", "true", "yes", "on"]);

const flag = z.union([z.boolean(), z.string().transform((value) => TRUTHY_FLAGS.has(value.trim().toLowerCase()))]);

export const askRequestSchema = z.object({
    question: z.string().trim().min(1, "must be a non-empty string"),
    topK: z.number().int().positive().optional(),
    maxContextChunks: z.number().int().positive().optional(),
    systemPrompt: z.string().optional(),
    stream: flag.optional(),
});

type AskRequestBody = z.infer<typeof askRequestSchema>;

/**
 * Streaming is chosen by an `Accept: text/event-stream` header, a `?stream=` query flag, or `stream` in
 * the body.
 */
export function wantsEventStream(req: Request, body: AskRequestBody): boolean {
    if (req.get("accept")?.toLowerCase().includes("text/event-stream")) {
        return true;
    }

    const queryFlag = flag.safeParse(req.query.stream);
    return (queryFlag.success && queryFlag.data) || body.stream === true;
}

function toAskOptions(body: AskRequestBody): AskAiOptions & { stream?: false } {
    return {
        question: body.question,
        topK: body.topK,
        maxContextChunks: body.maxContextChunks,
        systemPrompt: body.systemPrompt,
    };
}

async function streamAnswer(res: Response, context: ServerContext, logger: Logger, body: AskRequestBody): Promise<void> {
    const events = new EventStream(res);
    events.send("status", { state: "started" });

    try {
        const { stream, sources, foundContext } = await askAi(
            context.chat,
            context.knowledgeBase,
            { ...toAskOptions(body), stream: true, signal: events.signal },
            { logger, config: context.config }
        );

        const pieces: string[] = [];
        for await (const text of stream) {
            pieces.push(text);
            events.send("token", { text });
        }

        events.send("final", { answer: pieces.join("").trim(), sources, foundContext });
    } catch (error) {
        if (events.signal.aborted) {
            logger.warn("Client closed the /ask stream early.");
        } else {
            logger.error({ err: error }, "Streaming /ask failed.");
            events.send("error", { message: describeError(error) });
        }
    } finally {
        events.send("end", {});
        events.end();
    }
}

export async function handleAskRequest(req: Request, res: Response, context: ServerContext, logger: Logger): Promise<void> {
    const parsed = askRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
        sendValidationError(res, parsed.error);
        return;
    }

    if (wantsEventStream(req, parsed.data)) {
        await streamAnswer(res, context, logger, parsed.data);
        return;
    }

    try {
        const result = await askAi(context.chat, context.knowledgeBase, toAskOptions(parsed.data), {
            logger,
            config: context.config,
        });
        res.json({ status: "ok", ...result });
    } catch (error) {
        sendError(res, logger, error, "/ask failed.");
    }
}
