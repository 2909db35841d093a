import { HumanMessage, SystemMessage } from "@langchain/core/messages";
import { ChatGoogleGenerativeAI } from "@langchain/google-genai";

import { requireGoogleApiKey, type Settings } from "../../config/settings.js";

export type CompletionRequest = {
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  maxTokens: number;
};

export type TokenUsage = {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
};

export type Completion = {
  text: string;
  usage: TokenUsage;
  model: string;
};

/** Opaque text-completion service. */
export interface GenerationService {
  complete(request: CompletionRequest): Promise<Completion>;
}

export function createChatModel(
  settings: Settings,
  overrides: { temperature?: number; maxTokens?: number } = {}
): ChatGoogleGenerativeAI {
  return new ChatGoogleGenerativeAI({
    apiKey: requireGoogleApiKey(settings),
    model: settings.chatModel,
    temperature: overrides.temperature ?? settings.temperature,
    maxOutputTokens: overrides.maxTokens ?? settings.maxTokens
  });
}

export class GeminiGenerationService implements GenerationService {
  constructor(private readonly settings: Settings) {}

  async complete(request: CompletionRequest): Promise<Completion> {
    const llm = createChatModel(this.settings, {
      temperature: request.temperature,
      maxTokens: request.maxTokens
    });

    const result = await llm.invoke([
      new SystemMessage(request.systemPrompt),
      new HumanMessage(request.userPrompt)
    ]);

    const usage = result.usage_metadata;
    return {
      text: result.text,
      usage: {
        inputTokens: usage?.input_tokens ?? 0,
        outputTokens: usage?.output_tokens ?? 0,
        totalTokens: usage?.total_tokens ?? 0
      },
      model: this.settings.chatModel
    };
  }
}
