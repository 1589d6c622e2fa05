import type { ChatModelConfig } from "../config/types";
import type { AnswerRequest, ChatProvider } from "../llm/types";

/**
 * Answers with fixed pieces. With `streamFailure` set, a stream yields its first piece and then fails.
 */
export class FakeChat implements ChatProvider {
    readonly config: ChatModelConfig = { provider: "openai", model: "test-chat", temperature: 0 };
    readonly requests: AnswerRequest[] = [];
    streamFailure: Error | undefined;

    constructor(private readonly pieces: readonly string[] = ["The library ", "opens at 8."]) {}

    async answer(request: AnswerRequest): Promise<string> {
        this.requests.push(request);
        return this.pieces.join("");
    }

    async streamAnswer(request: AnswerRequest): Promise<AsyncIterable<string>> {
        this.requests.push(request);
        const { pieces, streamFailure } = this;

        return (async function* () {
            for (const piece of pieces) {
                yield piece;
                if (streamFailure) {
                    throw streamFailure;
                }
            }
        })();
    }
}
