// Configuration loaded from the environment plus an optional JSON settings file.
//
// The settings file is the application-level layer: values there win over the
// environment wherever both can supply the same thing (notably the API key).

import * as fs from "fs";
import * as path from "path";
import { z } from "zod";

export const PROJECT_ROOT = path.resolve(__dirname, "..");

export type ChatProviderName = "openai" | "anthropic";

const DEFAULT_MODELS: Record<ChatProviderName, string> = {
  openai: "gpt-4o-mini",
  anthropic: "claude-3-5-haiku-latest",
};

const DEFAULT_SETTINGS_FILE = "config/settings.json";

export const SettingsSchema = z
  .object({
    apiKey: z.string().optional(),
    debug: z.boolean().optional(),
    chatProvider: z.enum(["openai", "anthropic"]).optional(),
    chatModel: z.string().min(1).optional(),
    fromEmail: z.string().min(1).optional(),
    contactRecipient: z.string().email().optional(),
  })
  .strict();

export type AppSettings = z.infer<typeof SettingsSchema>;

export interface CompletionConfig {
  provider: ChatProviderName;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  baseUrl?: string;
}

export interface MailConfig {
  transport: "console" | "smtp";
  host: string;
  port: number;
  useTls: boolean;
  user: string;
  password: string;
  from: string;
  contactRecipient: string;
}

export interface SiteConfig {
  port: number;
  /** Also turns on error detail in chat replies; never enable on a public deployment. */
  debug: boolean;
  settingsFile?: string;
  settings: AppSettings;
  completion: CompletionConfig;
  mail: MailConfig;
  systemPromptPath: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Parse a duration string (e.g. "30s", "1m30s", "500ms", "1h") into milliseconds.
 * Returns the fallback when nothing parses.
 */
export function parseDuration(duration: string, fallback: number): number {
  let total = 0;
  const hourMatch = duration.match(/(\d+)h/);
  const minMatch = duration.match(/(\d+)m(?!s)/);
  const secMatch = duration.match(/([\d.]+)s/);
  const msMatch = duration.match(/(\d+)ms/);

  if (hourMatch) total += parseInt(hourMatch[1], 10) * 3600000;
  if (minMatch) total += parseInt(minMatch[1], 10) * 60000;
  if (secMatch) total += parseFloat(secMatch[1]) * 1000;
  if (msMatch) total += parseInt(msMatch[1], 10);

  return total || fallback;
}

function parseBool(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

function parseNumber(
  name: string,
  value: string | undefined,
  fallback: number
): number {
  if (value === undefined || value === "") return fallback;
  const n = Number(value);
  if (!Number.isFinite(n)) {
    throw new ConfigError(`${name} must be a number, got "${value}"`);
  }
  return n;
}

/**
 * Read and validate the settings file. A missing file is only an error when the
 * path was given explicitly.
 */
export function loadSettings(
  file: string,
  explicit: boolean
): AppSettings {
  if (!fs.existsSync(file)) {
    if (explicit) {
      throw new ConfigError(`Settings file not found: ${file}`);
    }
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Settings file ${file} is not valid JSON: ${reason}`);
  }

  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Settings file ${file} is invalid: ${issues}`);
  }
  return parsed.data;
}

function resolveProvider(
  env: NodeJS.ProcessEnv,
  settings: AppSettings
): ChatProviderName {
  const name = settings.chatProvider ?? env.CHAT_PROVIDER ?? "openai";
  if (name !== "openai" && name !== "anthropic") {
    throw new ConfigError(`Unsupported CHAT_PROVIDER "${name}"`);
  }
  return name;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SiteConfig {
  const settingsFile = path.resolve(
    PROJECT_ROOT,
    env.SITE_SETTINGS_FILE || DEFAULT_SETTINGS_FILE
  );
  const settings = loadSettings(settingsFile, Boolean(env.SITE_SETTINGS_FILE));

  const debug = settings.debug ?? parseBool(env.DEBUG) ?? false;
  const provider = resolveProvider(env, settings);
  const baseUrl =
    provider === "openai" ? env.OPENAI_BASE_URL : env.ANTHROPIC_BASE_URL;

  const transport = env.EMAIL_TRANSPORT || (debug ? "console" : "smtp");
  if (transport !== "console" && transport !== "smtp") {
    throw new ConfigError(`Unsupported EMAIL_TRANSPORT "${transport}"`);
  }

  return {
    port: parseNumber("PORT", env.PORT, 8000),
    debug,
    settingsFile: fs.existsSync(settingsFile) ? settingsFile : undefined,
    settings,
    completion: {
      provider,
      model: settings.chatModel ?? env.CHAT_MODEL ?? DEFAULT_MODELS[provider],
      temperature: parseNumber("CHAT_TEMPERATURE", env.CHAT_TEMPERATURE, 0.7),
      maxTokens: parseNumber("CHAT_MAX_TOKENS", env.CHAT_MAX_TOKENS, 600),
      timeoutMs: parseDuration(env.CHAT_TIMEOUT || "30s", 30000),
      baseUrl: baseUrl || undefined,
    },
    mail: {
      transport,
      host: env.EMAIL_HOST || "smtp.gmail.com",
      port: parseNumber("EMAIL_PORT", env.EMAIL_PORT, 587),
      useTls: parseBool(env.EMAIL_USE_TLS) ?? true,
      user: env.EMAIL_HOST_USER || "no-reply@liorae.co",
      password: env.EMAIL_HOST_PASSWORD || "",
      from:
        settings.fromEmail ??
        (env.DEFAULT_FROM_EMAIL || "Lioraè Co. <no-reply@liorae.co>"),
      contactRecipient:
        settings.contactRecipient ??
        (env.CONTACT_RECIPIENT || "hello@liorae.co"),
    },
    systemPromptPath: path.resolve(
      PROJECT_ROOT,
      env.SYSTEM_PROMPT_PATH || "prompts/system-prompt.txt"
    ),
  };
}
