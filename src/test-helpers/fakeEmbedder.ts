import type { EmbedOptions, TextEmbedder } from "../llm/types";

export type Vectorize = (text: string) => number[];

/**
 * One dimension per vocabulary word, counting whole-word occurrences. Texts sharing no vocabulary map to
 * the zero vector.
 */
export function keywordVectorizer(vocabulary: readonly string[]): Vectorize {
    return (text) => {
        const words = text.toLowerCase().split(/[^a-z]+/);
        return vocabulary.map((term) => words.filter((word) => word === term).length);
    };
}

export function tableVectorizer(table: ReadonlyMap<string, number[]>): Vectorize {
    return (text) => {
        const vector = table.get(text);
        if (!vector) {
            throw new Error(`No test vector for "${text}".`);
        }
        return vector;
    };
}

/**
 * In-process embedder for tests. Records every call and fails on demand.
 */
export class FakeEmbedder implements TextEmbedder {
    readonly documentCalls: string[][] = [];
    readonly queryCalls: string[] = [];
    failure: Error | undefined;

    constructor(private readonly vectorize: Vectorize) {}

    async embedDocuments(texts: readonly string[], _options?: EmbedOptions): Promise<number[][]> {
        this.documentCalls.push([...texts]);
        if (this.failure) {
            throw this.failure;
        }
        return texts.map((text) => this.vectorize(text));
    }

    async embedQuery(text: string, _options?: EmbedOptions): Promise<number[]> {
        this.queryCalls.push(text);
        if (this.failure) {
            throw this.failure;
        }
        return this.vectorize(text);
    }
}
