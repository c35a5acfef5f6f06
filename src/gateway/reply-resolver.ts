// Turns a chat message into a reply, falling back to canned text whenever the
// completion API is unconfigured or the call fails.

import { errorFields, log } from "../logger";
import { CompletionRequest } from "../types";
import { CompletionClientCache } from "./client-cache";

export const OFFLINE_REPLY =
  "Got it. I don't have my full AI brain connected yet. " +
  "Share your main channel (IG/TikTok/LinkedIn), audience, and desired outcome, " +
  "and I'll sketch a quick plan.";

export const BLANK_REPLY =
  "I blanked for a sec. Mind asking that one more time?";

export const SNAG_REPLY =
  "I hit a snag reaching my brain. " +
  "Want to try again, or tell me the short version and I'll help?";

export interface ReplyOptions {
  systemPrompt: string;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  /**
   * Append the raw error to failure replies. Leaks internal detail to end
   * users; only for local debugging.
   */
  exposeErrorDetail: boolean;
}

export class ReplyResolver {
  constructor(
    private readonly cache: CompletionClientCache,
    private readonly options: ReplyOptions
  ) {}

  async getReply(userMessage: string): Promise<string> {
    const message = userMessage.trim();

    const client = this.cache.getClient();
    if (!client) {
      return OFFLINE_REPLY;
    }

    const request: CompletionRequest = {
      model: this.options.model,
      messages: [
        { role: "system", content: this.options.systemPrompt },
        { role: "user", content: message },
      ],
      temperature: this.options.temperature,
      max_tokens: this.options.maxTokens,
      timeout_ms: this.options.timeoutMs,
    };

    const start = Date.now();
    try {
      const reply = (await client.complete(request)).trim();
      log("info", "Completion done", {
        provider: client.provider,
        model: request.model,
        elapsed_ms: Date.now() - start,
        empty: reply.length === 0,
      });
      return reply || BLANK_REPLY;
    } catch (err) {
      log("error", "Completion call failed", {
        provider: client.provider,
        model: request.model,
        elapsed_ms: Date.now() - start,
        ...errorFields(err),
      });
      if (this.options.exposeErrorDetail) {
        const detail = err instanceof Error ? err.message : String(err);
        return `(DEBUG) ${client.provider} error: ${detail}`;
      }
      return SNAG_REPLY;
    }
  }
}
