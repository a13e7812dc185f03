import fetch, { type RequestInit, type Response } from "node-fetch";
import type { Logger } from "../config/logger";
import { describeError, ServiceError } from "../shared/errors";
import type { CompletionService } from "./completion.service";

export const DEFAULT_CHAT_MODEL = "gpt-4o-mini";
export const DEFAULT_BASE_URL = "https://api.openai.com/v1";

export interface ChatCompletionsRequestBody {
  model: string;
  temperature: number;
  messages: Array<{
    role: "system" | "user";
    content: string;
  }>;
  max_tokens?: number;
  max_completion_tokens?: number;
}

interface ChatCompletionsResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface LlmClientOptions {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  maxTokens?: number;
  fetchImpl?: FetchLike;
}

export class LlmClient implements CompletionService {
  private readonly chatModel: string;
  private readonly baseUrl: string;
  private readonly maxTokens: number;
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly options: LlmClientOptions,
    private readonly logger: Logger,
  ) {
    if (!options.apiKey.trim()) {
      throw new Error("OpenAI API key is empty.");
    }
    this.chatModel = options.model || DEFAULT_CHAT_MODEL;
    this.baseUrl = options.baseUrl || DEFAULT_BASE_URL;
    this.maxTokens = options.maxTokens ?? 1024;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  getModelName(): string {
    return this.chatModel;
  }

  async complete(systemInstruction: string, userInstruction: string, temperature: number): Promise<string> {
    const startedAt = Date.now();
    const requestBody = this.buildRequestBody(systemInstruction, userInstruction, temperature);
    try {
      const content = await this.send(requestBody);
      this.logger.info("llm.call.completed", {
        modelName: this.chatModel,
        latencyMs: Date.now() - startedAt,
        temperature,
        tokenEstimate: estimateTokenCount(systemInstruction + userInstruction, content),
      });
      return content;
    } catch (error) {
      this.logger.warn("llm.call.failed", {
        modelName: this.chatModel,
        latencyMs: Date.now() - startedAt,
        error: describeError(error),
      });
      throw error;
    }
  }

  buildRequestBody(
    systemInstruction: string,
    userInstruction: string,
    temperature: number,
  ): ChatCompletionsRequestBody {
    const body: ChatCompletionsRequestBody = {
      model: this.chatModel,
      temperature,
      messages: [
        {
          role: "system",
          content: systemInstruction,
        },
        {
          role: "user",
          content: userInstruction,
        },
      ],
    };
    if (usesMaxCompletionTokens(this.chatModel)) {
      body.max_completion_tokens = this.maxTokens;
    } else {
      body.max_tokens = this.maxTokens;
    }
    return body;
  }

  private async send(requestBody: ChatCompletionsRequestBody): Promise<string> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          authorization: `Bearer ${this.options.apiKey}`,
          "content-type": "application/json",
        },
        body: JSON.stringify(requestBody),
      });
    } catch (error) {
      throw new ServiceError(`OpenAI request failed: ${describeError(error)}`, {
        retryable: true,
        cause: error,
      });
    }

    if (!response.ok) {
      const body = await response.text();
      throw new ServiceError(`OpenAI API error: HTTP ${response.status} - ${body}`, {
        status: response.status,
        retryable: isRetryableStatus(response.status),
      });
    }

    let body: ChatCompletionsResponse;
    try {
      body = (await response.json()) as ChatCompletionsResponse;
    } catch (error) {
      throw new ServiceError("OpenAI response is not valid JSON", {
        status: response.status,
        retryable: false,
        cause: error,
      });
    }

    const choice = body.choices?.[0];
    if (!choice?.message) {
      throw new ServiceError("OpenAI response does not contain a message", {
        status: response.status,
        retryable: false,
      });
    }
    return (choice.message.content ?? "").trim();
  }
}

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

function estimateTokenCount(prompt: string, output: string): number {
  const totalChars = prompt.length + output.length;
  return Math.max(1, Math.round(totalChars / 4));
}

function usesMaxCompletionTokens(model: string): boolean {
  const normalized = model.trim().toLowerCase();
  return normalized.startsWith("gpt-5") || normalized.startsWith("o1") || normalized.startsWith("o3");
}
