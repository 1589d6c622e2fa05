import type { ChunkingConfig } from "../config/types";
import { assertChunkingConfig } from "../config/validate";
import type { KnowledgeDocument } from "./document";

export interface Chunk {
    readonly sequence: number;
    readonly source: string;
    readonly text: string;
    /** Offset of the first character in the source document. */
    readonly start: number;
    /** Offset one past the last character. */
    readonly end: number;
}

/**
 * Picks where the window starting at `start` should end. Separators are tried in priority order and the
 * latest occurrence that fits wins. The non-whitespace part of a separator stays with the chunk it closes,
 * so ". " cuts right after the period and "\n\n" cuts before the blank line.
 *
 * A cut must land past `start + chunkOverlap`, otherwise the next chunk would not advance.
 */
function findCut(content: string, start: number, options: ChunkingConfig): number | undefined {
    const limit = start + options.maxChunkSize;

    for (const separator of options.separators) {
        const kept = separator.trimEnd().length;
        const searchFrom = limit - kept;
        if (searchFrom < start) {
            continue;
        }

        const position = content.lastIndexOf(separator, searchFrom);
        if (position < start) {
            continue;
        }

        const cut = position + kept;
        if (cut > start + options.chunkOverlap) {
            return cut;
        }
    }

    return undefined;
}

export function chunkDocument(document: KnowledgeDocument, options: ChunkingConfig): Chunk[] {
    assertChunkingConfig(options);

    const { content, source } = document;
    const chunks: Chunk[] = [];

    const pushChunk = (start: number, end: number) => {
        chunks.push(Object.freeze({
            sequence: chunks.length,
            source,
            text: content.slice(start, end),
            start,
            end,
        }));
    };

    let start = 0;
    while (start < content.length) {
        if (content.length - start <= options.maxChunkSize) {
            pushChunk(start, content.length);
            break;
        }

        const cut = findCut(content, start, options);
        if (cut === undefined) {
            // No separator inside the window: hard split, and the next chunk starts without overlap.
            const hardEnd = start + options.maxChunkSize;
            pushChunk(start, hardEnd);
            start = hardEnd;
            continue;
        }

        pushChunk(start, cut);
        start = cut - options.chunkOverlap;
    }

    return chunks;
}

/**
 * Joins the part of each chunk that the previous one does not already cover.
 */
export function reconstructDocument(chunks: readonly Chunk[]): string {
    let text = "";
    let coveredUntil = 0;

    for (const chunk of chunks) {
        text += chunk.text.slice(Math.max(0, coveredUntil - chunk.start));
        coveredUntil = chunk.end;
    }

    return text;
}
