import fs from "node:fs/promises";
import path from "node:path";
import { DocumentLoadError } from "../errors";

export interface KnowledgeDocument {
    readonly source: string;
    readonly content: string;
}

export function createDocument(source: string, content: string): KnowledgeDocument {
    return Object.freeze({ source, content });
}

/**
 * Reads the whole knowledge file. Line endings are normalised so offsets do not depend on the platform
 * that wrote the file.
 */
export async function loadDocument(documentPath: string): Promise<KnowledgeDocument> {
    let raw: string;
    try {
        raw = await fs.readFile(documentPath, "utf8");
    } catch (error) {
        throw new DocumentLoadError(documentPath, error);
    }

    return createDocument(path.basename(documentPath), raw.replace(/\r\n?/g, "\n"));
}
