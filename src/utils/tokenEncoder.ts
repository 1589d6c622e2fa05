import { encoding_for_model, get_encoding, type Tiktoken, type TiktokenModel } from "tiktoken";

const FALLBACK_ENCODING = "cl100k_base";
const encoders = new Map<string, Tiktoken>();

function loadEncoder(model: string): Tiktoken {
    try {
        // tiktoken throws for model names it does not know, which covers every non-OpenAI model.
        return encoding_for_model(model as TiktokenModel);
    } catch {
        return get_encoding(FALLBACK_ENCODING);
    }
}

function encoderFor(model: string | undefined): Tiktoken {
    const key = (model ?? FALLBACK_ENCODING).toLowerCase();
    let encoder = encoders.get(key);
    if (!encoder) {
        encoder = loadEncoder(key);
        encoders.set(key, encoder);
    }
    return encoder;
}

/**
 * Token estimate used to reserve provider rate-limit budget. Special-token markup such as
 * `<|endoftext|>` in a document is counted as plain text.
 */
export function countTokens(text: string, model?: string): number {
    if (!text) {
        return 0;
    }
    return encoderFor(model).encode(text, [], []).length;
}

export function countTokensInBatch(texts: readonly string[], model?: string): number {
    let total = 0;
    for (const text of texts) {
        total += countTokens(text, model);
    }
    return total;
}
