import OpenAI from "openai";
import { CompletionError, errorMessage } from "./errors.js";

export interface CompletionRequest {
  prompt: string;
  /** System message describing the calling agent's role. */
  role: string;
  temperature: number;
  maxTokens: number;
}

/** What the engine needs from an LLM: prompt in, text out. */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<string>;
}

/** Raw call to a chat endpoint. Returns the message content, if any. */
export type ChatTransport = (model: string, request: CompletionRequest) => Promise<string | null | undefined>;

export interface OpenAICompletionConfig {
  /** Any OpenAI-compatible endpoint; LM Studio listens on :1234 by default. */
  baseURL?: string;
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
}

function openAITransport(config: OpenAICompletionConfig): ChatTransport {
  const client = new OpenAI({
    baseURL: config.baseURL ?? "http://localhost:1234/v1",
    apiKey: config.apiKey ?? "lm-studio",
    timeout: config.timeoutMs ?? 30_000,
    // Retrying is the caller's decision.
    maxRetries: 0,
  });

  return async (model, request) => {
    const response = await client.chat.completions.create({
      model,
      temperature: request.temperature,
      max_tokens: request.maxTokens,
      messages: [
        { role: "system", content: request.role },
        { role: "user", content: request.prompt },
      ],
    });
    return response.choices[0]?.message?.content;
  };
}

/**
 * Chat-completions client for OpenAI-compatible servers. Every failure
 * surfaces as a CompletionError; nothing is retried here.
 */
export class OpenAICompletionClient implements CompletionClient {
  private readonly model: string;
  private readonly transport: ChatTransport;

  constructor(config: OpenAICompletionConfig = {}, transport?: ChatTransport) {
    this.model = config.model ?? "local-model";
    this.transport = transport ?? openAITransport(config);
  }

  async complete(request: CompletionRequest): Promise<string> {
    let content: string | null | undefined;
    try {
      content = await this.transport(this.model, request);
    } catch (error) {
      if (error instanceof OpenAI.APIConnectionTimeoutError) {
        throw new CompletionError("Completion request timed out", { cause: error });
      }
      if (error instanceof OpenAI.APIError) {
        throw new CompletionError(`Completion endpoint returned ${error.status ?? "an error"}: ${error.message}`, {
          cause: error,
          status: error.status,
        });
      }
      throw new CompletionError(`Completion request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (typeof content !== "string" || content.trim() === "") {
      throw new CompletionError("Completion response had no message content");
    }
    return content;
  }
}
