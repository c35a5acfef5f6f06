// Shared wire and gateway types.

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
  timeout_ms: number;
}

// HTTP payloads

export interface ChatReply {
  reply: string;
}

export interface ChatStartResponse {
  conversation_id: string;
}

export interface ChatHealthReport {
  sdk_installed: boolean;
  has_key_in_settings: boolean;
  has_key_in_env: boolean;
  key_seen: string;
  client_initialized: boolean;
  debug: boolean;
}
