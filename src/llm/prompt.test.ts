import { describe, it, expect } from "vitest";
import { buildPromptMessages, DEFAULT_SYSTEM_PROMPT } from "./prompt";

describe("buildPromptMessages", () => {
    it("places the context before the question", () => {
        const { system, user } = buildPromptMessages({ question: " Where can I park? ", context: "Lot B is open.\n" });

        expect(system).toBe(DEFAULT_SYSTEM_PROMPT);
        expect(user).toBe("Knowledge base context:\n\nLot B is open.\n\nQuestion: Where can I park?\n\nAnswer:");
    });

    it("tells the model how to treat missing context", () => {
        expect(DEFAULT_SYSTEM_PROMPT).toContain('If the context is "No relevant info found."');
    });

    it("uses a custom system prompt", () => {
        const { system } = buildPromptMessages({ question: "q", context: "c", systemPrompt: "Answer in French." });

        expect(system).toBe("Answer in French.");
    });
});
