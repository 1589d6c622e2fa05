import type { ErrorRequestHandler, Response } from "express";
import type { Logger } from "pino";
import type { ZodError } from "zod";
import { InvalidConfigurationError, RebuildInProgressError, describeError } from "../../errors";

function statusForError(error: unknown): number {
    if (error instanceof InvalidConfigurationError) {
        return 400;
    }
    if (error instanceof RebuildInProgressError) {
        return 409;
    }
    return 500;
}

export function sendError(res: Response, logger: Logger, error: unknown, message: string): void {
    const status = statusForError(error);
    if (status >= 500) {
        logger.error({ err: error }, message);
    } else {
        logger.warn({ err: error }, message);
    }
    res.status(status).json({ status: "error", message: describeError(error) });
}

export function sendValidationError(res: Response, error: ZodError): void {
    const issue = error.issues[0];
    const field = issue?.path.join(".") || "body";
    res.status(400).json({
        status: "error",
        message: `Invalid request field '${field}': ${issue?.message ?? "invalid value"}.`,
    });
}

/** body-parser marks bodies it could not parse with this type. */
function isBodyParseError(error: unknown): boolean {
    return error instanceof SyntaxError && "type" in error && error.type === "entity.parse.failed";
}

/**
 * Last middleware in the chain: keeps errors raised by express itself, such as unparseable JSON bodies,
 * in the same `{ status, message }` shape the routes use.
 */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
    return (error: unknown, _req, res, next) => {
        if (res.headersSent) {
            next(error);
            return;
        }

        if (isBodyParseError(error)) {
            res.status(400).json({ status: "error", message: "Request body must be valid JSON." });
            return;
        }

        sendError(res, logger, error, "Unhandled request error.");
    };
}
