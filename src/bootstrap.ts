// bootstrap.ts - Wires configuration, assets and services into a SiteServer.

import * as path from "path";
import { PROJECT_ROOT, SiteConfig } from "./config";
import { loadHomeContent } from "./content/home";
import { CompletionClientCache } from "./gateway/client-cache";
import { CredentialSources } from "./gateway/credentials";
import { ReplyResolver } from "./gateway/reply-resolver";
import { loadSystemPrompt } from "./gateway/system-prompt";
import { log } from "./logger";
import { Mailer, NodemailerMailer } from "./mail/mailer";
import { Provider, createProvider } from "./providers";
import { TemplateRenderer } from "./render/templates";
import { SiteDeps, SiteServer } from "./server";
import { SessionStore } from "./session";

export interface BootstrapOverrides {
  provider?: Provider;
  mailer?: Mailer;
  env?: NodeJS.ProcessEnv;
}

export interface Site {
  server: SiteServer;
  deps: SiteDeps;
}

export async function bootstrap(
  config: SiteConfig,
  overrides: BootstrapOverrides = {}
): Promise<Site> {
  const prompt = loadSystemPrompt(config.systemPromptPath);
  log("info", "System prompt loaded", {
    path: config.systemPromptPath,
    version: prompt.version,
    chars: prompt.text.length,
  });

  const provider = overrides.provider ?? createProvider(config.completion.provider);
  const sdkInstalled = await provider.loadSdk();
  log(sdkInstalled ? "info" : "warn", "Completion SDK detection finished", {
    provider: provider.name,
    sdk_installed: sdkInstalled,
  });

  const credentials: CredentialSources = {
    settingsKey: config.settings.apiKey,
    envVar: provider.credentialEnvVar,
    env: overrides.env ?? process.env,
  };

  const cache = new CompletionClientCache({
    provider,
    credentials,
    baseUrl: config.completion.baseUrl,
    timeoutMs: config.completion.timeoutMs,
  });

  if (config.debug) {
    log("warn", "Debug mode is on: chat replies include raw provider errors. Do not run publicly like this.");
  }

  const replies = new ReplyResolver(cache, {
    systemPrompt: prompt.text,
    model: config.completion.model,
    temperature: config.completion.temperature,
    maxTokens: config.completion.maxTokens,
    timeoutMs: config.completion.timeoutMs,
    exposeErrorDetail: config.debug,
  });

  const deps: SiteDeps = {
    config,
    provider,
    cache,
    credentials,
    replies,
    renderer: new TemplateRenderer(path.join(PROJECT_ROOT, "templates")),
    homeContent: loadHomeContent(path.join(PROJECT_ROOT, "content", "home.json")),
    mailer: overrides.mailer ?? NodemailerMailer.fromConfig(config.mail),
    sessions: new SessionStore(),
  };

  return { server: new SiteServer(deps), deps };
}
