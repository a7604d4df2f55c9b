import fetch from "node-fetch";
import { Logger } from "../config/logger";
import { VERIFICATION_SYSTEM_PROMPT } from "./system/verification.system";

export const DEFAULT_CHAT_MODEL = "gpt-4o-mini";
const CHAT_COMPLETIONS_URL = "https://api.openai.com/v1/chat/completions";

const EXECUTION_SYSTEM_PROMPT = [
  "Universal execution rules.",
  "If output requires strict JSON, return JSON only and follow schema exactly.",
  "Never invent facts that are not present in the provided input.",
  "Keep generated prose professional and concise.",
].join(" ");

export interface ChatCompletionsRequestBody {
  model: string;
  temperature: number;
  messages: Array<{
    role: "system" | "user";
    content: string;
  }>;
  response_format?: { type: "json_object" };
  max_tokens?: number;
  max_completion_tokens?: number;
}

interface ChatCompletionsResponse {
  choices: Array<{
    message: {
      content?: string | null;
    };
  }>;
}

export interface LlmCallOptions {
  promptName?: string;
}

/**
 * Minimal surface the prompt services need. Tests pass plain objects that
 * implement it instead of a live client.
 */
export interface JsonLlmClient {
  generateStructuredJson(prompt: string, maxTokens: number, options?: LlmCallOptions): Promise<string>;
  getModelName?(): string;
}

export class LlmClient implements JsonLlmClient {
  private readonly chatModel: string;

  constructor(
    private readonly apiKey: string,
    private readonly logger: Logger,
    modelOverride?: string,
  ) {
    this.chatModel = modelOverride || DEFAULT_CHAT_MODEL;
  }

  getModelName(): string {
    return this.chatModel;
  }

  async generateStructuredJson(
    prompt: string,
    maxTokens: number,
    options?: LlmCallOptions,
  ): Promise<string> {
    const startedAt = Date.now();
    const promptName = options?.promptName ?? "structured_json";
    const requestBody = this.buildJsonRequestBody(prompt, maxTokens);
    try {
      const response = await fetch(CHAT_COMPLETIONS_URL, {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.apiKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify(requestBody),
      });

      if (!response.ok) {
        const body = await response.text();
        throw new Error(`OpenAI API error: HTTP ${response.status} - ${body}`);
      }

      const body = (await response.json()) as ChatCompletionsResponse;
      const content = body.choices[0]?.message?.content;
      if (!content) {
        throw new Error("OpenAI response does not contain message content");
      }

      this.logger.info("llm.call.completed", {
        promptName,
        modelName: this.chatModel,
        latencyMs: Date.now() - startedAt,
        maxTokens,
        tokenEstimate: estimateTokenCount(prompt, content),
      });
      return content;
    } catch (error) {
      this.logger.warn("llm.call.failed", {
        promptName,
        modelName: this.chatModel,
        latencyMs: Date.now() - startedAt,
        maxTokens,
        error: error instanceof Error ? error.message : "Unknown error",
      });
      throw error;
    }
  }

  buildJsonRequestBody(prompt: string, maxTokens: number): ChatCompletionsRequestBody {
    const body: ChatCompletionsRequestBody = {
      model: this.chatModel,
      temperature: 0.2,
      response_format: { type: "json_object" },
      messages: [
        {
          role: "system",
          content: VERIFICATION_SYSTEM_PROMPT,
        },
        {
          role: "system",
          content: EXECUTION_SYSTEM_PROMPT,
        },
        {
          role: "user",
          content: prompt,
        },
      ],
    };
    if (usesMaxCompletionTokens(this.chatModel)) {
      body.max_completion_tokens = maxTokens;
    } else {
      body.max_tokens = maxTokens;
    }
    return body;
  }
}

function estimateTokenCount(prompt: string, output: string): number {
  const totalChars = prompt.length + output.length;
  return Math.max(1, Math.round(totalChars / 4));
}

function usesMaxCompletionTokens(model: string): boolean {
  const normalized = model.trim().toLowerCase();
  return normalized.startsWith("gpt-5") || /^o\d/.test(normalized);
}
