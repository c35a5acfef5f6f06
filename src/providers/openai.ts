// OpenAI provider using the official openai SDK

import type OpenAI from "openai";
import { log } from "../logger";
import { ChatMessage, CompletionRequest } from "../types";
import {
  ClientOptions,
  CompletionClient,
  Provider,
  SdkNotLoadedError,
} from "./provider";

type OpenAIConstructor = typeof OpenAI;

class OpenAICompletionClient implements CompletionClient {
  readonly provider = "openai";

  constructor(private readonly client: OpenAI) {}

  async complete(request: CompletionRequest): Promise<string> {
    log("debug", "OpenAI complete request", {
      model: request.model,
      message_count: request.messages.length,
    });

    const response = await this.client.chat.completions.create(
      buildParams(request),
      { timeout: request.timeout_ms }
    );

    return response.choices[0]?.message?.content ?? "";
  }
}

function buildParams(
  request: CompletionRequest
): OpenAI.ChatCompletionCreateParamsNonStreaming {
  const messages: OpenAI.ChatCompletionMessageParam[] = request.messages.map(
    (msg: ChatMessage) => ({ role: msg.role, content: msg.content })
  );

  return {
    model: request.model,
    messages,
    temperature: request.temperature,
    max_tokens: request.max_tokens,
  };
}

export class OpenAIProvider implements Provider {
  readonly name = "openai";
  readonly credentialEnvVar = "OPENAI_API_KEY";
  private sdk: OpenAIConstructor | null = null;

  async loadSdk(): Promise<boolean> {
    try {
      const mod = await import("openai");
      this.sdk = mod.default;
      return true;
    } catch (err) {
      log("warn", "OpenAI SDK not installed in this environment", {
        error: err instanceof Error ? err.message : String(err),
      });
      this.sdk = null;
      return false;
    }
  }

  sdkLoaded(): boolean {
    return this.sdk !== null;
  }

  createClient(options: ClientOptions): CompletionClient {
    if (!this.sdk) throw new SdkNotLoadedError(this.name);

    const client = new this.sdk({
      apiKey: options.apiKey,
      baseURL: options.baseUrl || undefined,
      timeout: options.timeoutMs,
      // One attempt per chat message; a failure falls back to canned text.
      maxRetries: 0,
    });
    return new OpenAICompletionClient(client);
  }
}
