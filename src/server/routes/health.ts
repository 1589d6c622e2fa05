import type { Request, Response } from "express";
import type { ServerContext } from "../utils/context";

export function handleHealthRequest(_req: Request, res: Response, context: Pick<ServerContext, "knowledgeBase">): void {
    const { knowledgeBase } = context;
    res.json({
        status: "ok",
        rebuilding: knowledgeBase.rebuilding,
        chunkCount: knowledgeBase.index.size,
        builtAt: knowledgeBase.builtAt?.toISOString() ?? null,
    });
}
