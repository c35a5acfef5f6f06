// Anthropic provider using the official @anthropic-ai/sdk

import type Anthropic from "@anthropic-ai/sdk";
import { log } from "../logger";
import { CompletionRequest } from "../types";
import {
  ClientOptions,
  CompletionClient,
  Provider,
  SdkNotLoadedError,
} from "./provider";

type AnthropicConstructor = typeof Anthropic;

class AnthropicCompletionClient implements CompletionClient {
  readonly provider = "anthropic";

  constructor(private readonly client: Anthropic) {}

  async complete(request: CompletionRequest): Promise<string> {
    log("debug", "Anthropic complete request", {
      model: request.model,
      message_count: request.messages.length,
    });

    const response = await this.client.messages.create(buildParams(request), {
      timeout: request.timeout_ms,
    });

    let content = "";
    for (const block of response.content) {
      if (block.type === "text") {
        content += block.text;
      }
    }
    return content;
  }
}

function buildParams(
  request: CompletionRequest
): Anthropic.MessageCreateParamsNonStreaming {
  // Anthropic takes the system prompt as a top-level field, not a message.
  const system = request.messages
    .filter((m) => m.role === "system")
    .map((m) => m.content)
    .join("\n\n");

  const messages: Anthropic.MessageParam[] = [];
  for (const msg of request.messages) {
    if (msg.role === "user" || msg.role === "assistant") {
      messages.push({ role: msg.role, content: msg.content });
    }
  }

  const params: Anthropic.MessageCreateParamsNonStreaming = {
    model: request.model,
    max_tokens: request.max_tokens,
    temperature: request.temperature,
    messages,
  };
  if (system) params.system = system;
  return params;
}

export class AnthropicProvider implements Provider {
  readonly name = "anthropic";
  readonly credentialEnvVar = "ANTHROPIC_API_KEY";
  private sdk: AnthropicConstructor | null = null;

  async loadSdk(): Promise<boolean> {
    try {
      const mod = await import("@anthropic-ai/sdk");
      this.sdk = mod.default;
      return true;
    } catch (err) {
      log("warn", "Anthropic SDK not installed in this environment", {
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
      maxRetries: 0,
    });
    return new AnthropicCompletionClient(client);
  }
}
