import { describe, it, expect } from "vitest";
import type { ChatMessage, ChatResponse, LLMChatParamsNonStreaming } from "llamaindex";
import { LlamaIndexTextGenerator, messageContentToText, stripCodeFences, type ChatModel } from "../llm.js";

describe("stripCodeFences", () => {
    it("removes a json fence", () => {
        expect(stripCodeFences('```json\n{"names": []}\n```')).toBe('{"names": []}');
    });

    it("removes a bare fence", () => {
        expect(stripCodeFences('```\n{"names": ["CFO"]}\n```')).toBe('{"names": ["CFO"]}');
    });

    it("leaves unfenced output trimmed", () => {
        expect(stripCodeFences('  {"names": []}  ')).toBe('{"names": []}');
    });
});

describe("messageContentToText", () => {
    it("passes strings through", () => {
        expect(messageContentToText("Priya Nair")).toBe("Priya Nair");
    });

    it("joins text parts", () => {
        expect(
            messageContentToText([
                { type: "text", text: "Priya " },
                { type: "text", text: "Nair" },
            ]),
        ).toBe("Priya Nair");
    });
});

describe("LlamaIndexTextGenerator", () => {
    function fakeLLM(reply: string, seen: LLMChatParamsNonStreaming[]): ChatModel {
        return {
            async chat(params: LLMChatParamsNonStreaming): Promise<ChatResponse> {
                seen.push(params);
                const message: ChatMessage = { role: "assistant", content: reply };
                return { message, raw: null };
            },
        };
    }

    it("requests JSON output and strips fences", async () => {
        const seen: LLMChatParamsNonStreaming[] = [];
        const llm = fakeLLM('```json\n{"names": ["SolarOptima"]}\n```', seen);
        const generator = new LlamaIndexTextGenerator(llm);

        const text = await generator.complete("extract", { json: true });

        expect(text).toBe('{"names": ["SolarOptima"]}');
        expect(seen[0]?.messages).toEqual([{ role: "user", content: "extract" }]);
        expect(seen[0]?.additionalChatOptions).toEqual({ response_format: { type: "json_object" } });
    });

    it("returns trimmed plain text otherwise", async () => {
        const seen: LLMChatParamsNonStreaming[] = [];
        const generator = new LlamaIndexTextGenerator(fakeLLM("  Priya Nair \n", seen));

        expect(await generator.complete("answer")).toBe("Priya Nair");
        expect(seen[0]?.additionalChatOptions).toBeUndefined();
    });
});
