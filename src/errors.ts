/**
 * Raised when chunking or retrieval parameters are unusable. Values are never
 * clamped into range; the caller has to fix the configuration.
 */
export class InvalidConfigurationError extends Error {
    constructor(
        public readonly parameter: string,
        public readonly value: unknown,
        reason: string
    ) {
        super(`Invalid configuration for "${parameter}" (${JSON.stringify(value)}): ${reason}`);
        this.name = "InvalidConfigurationError";
    }
}

export type EmbeddingStage = "build" | "query";

export interface EmbeddingErrorDetails {
    stage: EmbeddingStage;
    textCount?: number;
    totalLength?: number;
    cause?: unknown;
}

function describeEmbeddingDetails(details: EmbeddingErrorDetails): string {
    const parts = [`stage: ${details.stage}`];
    if (details.textCount !== undefined) {
        parts.push(`texts: ${details.textCount}`);
    }
    if (details.totalLength !== undefined) {
        parts.push(`characters: ${details.totalLength}`);
    }
    return parts.join(", ");
}

/**
 * The embedding collaborator failed or returned vectors that cannot be indexed.
 * Not retried here; providers apply their own retry policy before this surfaces.
 */
export class EmbeddingError extends Error {
    public readonly stage: EmbeddingStage;
    public readonly textCount?: number;
    public readonly totalLength?: number;

    constructor(message: string, details: EmbeddingErrorDetails) {
        super(
            `${message} (${describeEmbeddingDetails(details)})`,
            details.cause === undefined ? undefined : { cause: details.cause }
        );
        this.name = "EmbeddingError";
        this.stage = details.stage;
        this.textCount = details.textCount;
        this.totalLength = details.totalLength;
    }
}

export class DocumentLoadError extends Error {
    constructor(
        public readonly documentPath: string,
        cause: unknown
    ) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(`Failed to load knowledge document from "${documentPath}": ${reason}`, { cause });
        this.name = "DocumentLoadError";
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export class RebuildInProgressError extends Error {
    constructor() {
        super("A knowledge index rebuild is already running.");
        this.name = "RebuildInProgressError";
    }
}
