import { Router } from "express";
import type { Logger } from "pino";
import type { ServerContext } from "../utils/context";
import { handleAskRequest } from "../routes/ask";
import { handleReindexRequest } from "../routes/reindex";
import { handleSearchRequest } from "../routes/search";

export function createApiRouter(context: ServerContext, logger: Logger): Router {
    const router = Router();

    router.post("/search", async (req, res) => {
        await handleSearchRequest(req, res, context, logger);
    });

    router.post("/ask", async (req, res) => {
        await handleAskRequest(req, res, context, logger);
    });

    router.post("/reindex", async (req, res) => {
        await handleReindexRequest(req, res, context, logger);
    });

    return router;
}
