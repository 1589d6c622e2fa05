import type { Response } from "express";

/**
 * Server-sent events over an express response. Writes after the response has ended are dropped.
 */
export class EventStream {
    private readonly controller = new AbortController();

    constructor(private readonly res: Response) {
        res.status(200);
        res.set({
            "Content-Type": "text/event-stream",
            "Cache-Control": "no-cache, no-transform",
            Connection: "keep-alive",
        });
        res.flushHeaders();

        res.on("close", this.onClose);
    }

    /** Aborted when the client goes away before {@link EventStream.end}. */
    get signal(): AbortSignal {
        return this.controller.signal;
    }

    send(event: string, payload: unknown): void {
        if (this.res.writableEnded) {
            return;
        }
        this.res.write(`event: ${event}\ndata: ${JSON.stringify(payload)}\n\n`);
    }

    end(): void {
        this.res.off("close", this.onClose);
        if (!this.res.writableEnded) {
            this.res.end();
        }
    }

    private readonly onClose = (): void => {
        if (!this.res.writableEnded) {
            this.controller.abort();
        }
    };
}
