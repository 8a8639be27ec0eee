import { Gemini, GEMINI_MODEL } from "@llamaindex/google";
import { Settings, type ChatResponse, type LLMChatParamsNonStreaming, type MessageContent } from "llamaindex";
import { config } from "../config/index.js";
import type { CompletionOptions, ITextGenerator } from "../types/interfaces/pipeline.js";

function resolveGeminiModel(): GEMINI_MODEL {
  const configured = Object.values(GEMINI_MODEL).find((model) => model === config.google.model);
  return configured ?? GEMINI_MODEL.GEMINI_2_5_FLASH_LATEST;
}

export const initLLM = () => {
  Settings.llm = new Gemini({
    model: resolveGeminiModel(),
    temperature: 0,
  });
};

export const getLLM = () => {
  return Settings.llm;
};

export function messageContentToText(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }
  return content
    .map((part) => (part.type === "text" ? part.text : ""))
    .join("");
}

/**
 * Removes a surrounding markdown code fence, which models add around JSON even in JSON mode
 */
export function stripCodeFences(raw: string): string {
  return raw
    .trim()
    .replace(/^```json\s*/, "")
    .replace(/^```\s*/, "")
    .replace(/\s*```$/, "")
    .trim();
}

/** The non-streaming chat surface of a llamaindex LLM */
export interface ChatModel {
  chat(params: LLMChatParamsNonStreaming): Promise<ChatResponse>;
}

/**
 * ITextGenerator over a llamaindex chat model
 */
export class LlamaIndexTextGenerator implements ITextGenerator {
  constructor(private readonly llm: ChatModel = getLLM()) {}

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const response = await this.llm.chat({
      messages: [{ role: "user", content: prompt }],
      ...(options.json
        ? { additionalChatOptions: { response_format: { type: "json_object" } } }
        : {}),
    });

    const text = messageContentToText(response.message.content);
    return options.json ? stripCodeFences(text) : text.trim();
  }
}
