import { InvalidConfigurationError } from "../errors";
import type { ChunkingConfig, RetrievalConfig } from "./types";

export function assertPositiveInteger(parameter: string, value: number): void {
    if (!Number.isInteger(value) || value < 1) {
        throw new InvalidConfigurationError(parameter, value, "must be a positive integer.");
    }
}

export function assertNonNegativeInteger(parameter: string, value: number): void {
    if (!Number.isInteger(value) || value < 0) {
        throw new InvalidConfigurationError(parameter, value, "must be a non-negative integer.");
    }
}

export function assertChunkingConfig(config: ChunkingConfig): void {
    assertPositiveInteger("maxChunkSize", config.maxChunkSize);
    assertNonNegativeInteger("chunkOverlap", config.chunkOverlap);

    if (config.chunkOverlap >= config.maxChunkSize) {
        throw new InvalidConfigurationError(
            "chunkOverlap",
            config.chunkOverlap,
            `must be smaller than maxChunkSize (${config.maxChunkSize}).`
        );
    }

    config.separators.forEach((separator, index) => {
        if (separator.length === 0) {
            throw new InvalidConfigurationError(`separators[${index}]`, separator, "separators cannot be empty.");
        }
    });
}

export function assertRetrievalConfig(config: RetrievalConfig): void {
    assertPositiveInteger("topK", config.topK);
    assertPositiveInteger("maxContextChunks", config.maxContextChunks);
}
