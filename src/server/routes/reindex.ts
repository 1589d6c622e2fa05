import type { Request, Response } from "express";
import type { Logger } from "pino";
import type { ServerContext } from "../utils/context";
import { sendError } from "../utils/errors";

/**
 * Rebuilds from the knowledge document. Queries keep hitting the previous index until the new one is
 * swapped in; a failed rebuild leaves the previous index live.
 */
export async function handleReindexRequest(
    _req: Request,
    res: Response,
    context: Pick<ServerContext, "knowledgeBase">,
    logger: Logger
): Promise<void> {
    if (context.knowledgeBase.rebuilding) {
        res.status(409).json({
            status: "error",
            message: "Reindex already running.",
        });
        return;
    }

    try {
        logger.info("Starting knowledge reindex.");
        const stats = await context.knowledgeBase.rebuild();
        res.json({ status: "ok", stats });
    } catch (error) {
        sendError(res, logger, error, "Reindex failed.");
    }
}
