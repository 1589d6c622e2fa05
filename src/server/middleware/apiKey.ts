import { createHash, timingSafeEqual } from "node:crypto";
import type { Request, RequestHandler } from "express";

const BEARER_PREFIX = /^bearer\s+/i;

/**
 * The key from `x-api-key`, or else from an `Authorization: Bearer` header.
 */
export function readApiKey(req: Request): string | undefined {
    const direct = req.get("x-api-key")?.trim();
    if (direct) {
        return direct;
    }

    const authorization = req.get("authorization")?.trim();
    if (authorization && BEARER_PREFIX.test(authorization)) {
        return authorization.replace(BEARER_PREFIX, "").trim() || undefined;
    }

    return undefined;
}

function digest(value: string): Buffer {
    return createHash("sha256").update(value).digest();
}

export function createApiKeyMiddleware(expectedKey: string): RequestHandler {
    const expected = digest(expectedKey);

    return (req, res, next) => {
        const provided = readApiKey(req);

        // Comparing fixed-length digests keeps the check constant-time whatever the key length.
        if (provided === undefined || !timingSafeEqual(digest(provided), expected)) {
            res.status(401).json({ status: "error", message: "Invalid or missing API key." });
            return;
        }

        next();
    };
}
