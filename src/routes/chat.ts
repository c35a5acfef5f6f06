// Chat endpoints: /chat (and its old widget alias), the legacy start/send pair,
// and the health probe.

import { randomUUID } from "crypto";
import { CompletionClientCache } from "../gateway/client-cache";
import {
  CredentialSources,
  credentialFromEnv,
  credentialFromSettings,
  maskCredential,
  resolveCredential,
} from "../gateway/credentials";
import { HttpResult, json, text } from "../http";
import { log } from "../logger";
import { Provider } from "../providers";
import { Session } from "../session";
import { ChatHealthReport, ChatReply, ChatStartResponse } from "../types";

export const EMPTY_MESSAGE_REPLY = "What's on your mind?";

/** Anything that can answer a chat message. */
export interface ReplySource {
  getReply(userMessage: string): Promise<string>;
}

export interface HealthDeps {
  provider: Provider;
  cache: CompletionClientCache;
  credentials: CredentialSources;
  debug: boolean;
}

type ParsedMessage = { ok: true; message: string } | { ok: false };

/**
 * Pull the trimmed "message" field out of a JSON body. A missing or non-string
 * field reads as empty; only unparseable JSON is an error.
 */
export function parseChatMessage(body: string): ParsedMessage {
  let data: unknown;
  try {
    data = JSON.parse(body);
  } catch {
    return { ok: false };
  }

  if (typeof data === "object" && data !== null && "message" in data) {
    const { message } = data;
    if (typeof message === "string") {
      return { ok: true, message: message.trim() };
    }
  }
  return { ok: true, message: "" };
}

export async function handleChat(
  body: string,
  replies: ReplySource
): Promise<HttpResult> {
  const parsed = parseChatMessage(body);
  if (!parsed.ok) {
    log("warn", "Chat request rejected: invalid JSON", {
      body_length: body.length,
    });
    return text(400, "Invalid JSON");
  }

  if (!parsed.message) {
    const nudge: ChatReply = { reply: EMPTY_MESSAGE_REPLY };
    return json(200, nudge);
  }

  const reply: ChatReply = { reply: await replies.getReply(parsed.message) };
  return json(200, reply);
}

/** Legacy widget send: same parsing as /chat but no empty-message nudge. */
export async function handleChatSend(
  body: string,
  replies: ReplySource
): Promise<HttpResult> {
  const parsed = parseChatMessage(body);
  if (!parsed.ok) {
    log("warn", "Chat send rejected: invalid JSON", {
      body_length: body.length,
    });
    return text(400, "Invalid JSON");
  }

  const reply: ChatReply = { reply: await replies.getReply(parsed.message) };
  return json(200, reply);
}

/** Legacy widget handshake: one conversation id per session. */
export function handleChatStart(session: Session): HttpResult {
  let cid = session.data.get("chat_cid");
  if (!cid) {
    cid = randomUUID();
    session.data.set("chat_cid", cid);
  }
  const payload: ChatStartResponse = { conversation_id: cid };
  return json(200, payload);
}

export function handleChatHealth(deps: HealthDeps): HttpResult {
  const { credentials } = deps;
  const report: ChatHealthReport = {
    sdk_installed: deps.provider.sdkLoaded(),
    has_key_in_settings: credentialFromSettings(credentials) !== undefined,
    has_key_in_env: credentialFromEnv(credentials) !== undefined,
    key_seen: maskCredential(resolveCredential(credentials)),
    client_initialized: deps.cache.getClient() !== null,
    debug: deps.debug,
  };
  return json(200, report);
}
