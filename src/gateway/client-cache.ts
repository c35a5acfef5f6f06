// Process-wide, lazily built completion client.
//
// The first getClient() call decides the outcome and every later call reuses it,
// including a failure. Only reset() (wired to SIGHUP) or a restart tries again.

import { errorFields, log } from "../logger";
import { CompletionClient, Provider } from "../providers";
import {
  CredentialSources,
  maskCredential,
  resolveCredential,
} from "./credentials";

/**
 * ClientState is the build state of the cached client
 */
export enum ClientState {
  /**
   * No build attempted yet
   */
  UNBUILT = "unbuilt",

  /**
   * Client built and cached
   */
  READY = "ready",

  /**
   * Build attempted and failed; stays failed until reset
   */
  FAILED = "failed",
}

export interface ClientCacheOptions {
  provider: Provider;
  credentials: CredentialSources;
  baseUrl?: string;
  timeoutMs: number;
}

export class CompletionClientCache {
  private state: ClientState = ClientState.UNBUILT;
  private client: CompletionClient | null = null;

  constructor(private readonly options: ClientCacheOptions) {}

  /**
   * Returns the cached client, building it on first use. Never throws; null
   * means the completion API is unavailable for this process.
   */
  getClient(): CompletionClient | null {
    if (this.state === ClientState.UNBUILT) {
      this.build();
    }
    return this.client;
  }

  getState(): ClientState {
    return this.state;
  }

  /** Forget the cached outcome so the next getClient() builds again. */
  reset(): void {
    log("info", "Completion client cache reset", { previous_state: this.state });
    this.state = ClientState.UNBUILT;
    this.client = null;
  }

  // The whole transition runs synchronously, so concurrent first callers on the
  // event loop cannot interleave and construction happens once.
  private build(): void {
    const { provider } = this.options;

    if (!provider.sdkLoaded()) {
      this.fail(`${provider.name} SDK not installed in this environment`);
      return;
    }

    const apiKey = resolveCredential(this.options.credentials);
    if (!apiKey) {
      this.fail(
        `${this.options.credentials.envVar} not found (settings and env both empty)`
      );
      return;
    }

    try {
      this.client = provider.createClient({
        apiKey,
        baseUrl: this.options.baseUrl,
        timeoutMs: this.options.timeoutMs,
      });
      this.state = ClientState.READY;
      log("info", "Completion client initialized", {
        provider: provider.name,
        key: maskCredential(apiKey),
      });
    } catch (err) {
      log("error", "Failed to create completion client", {
        provider: provider.name,
        ...errorFields(err),
      });
      this.client = null;
      this.state = ClientState.FAILED;
    }
  }

  private fail(reason: string): void {
    log("warn", reason, { provider: this.options.provider.name });
    this.client = null;
    this.state = ClientState.FAILED;
  }
}
