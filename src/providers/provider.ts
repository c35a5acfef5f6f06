// Provider interface - each remote completion backend implements this.

import { CompletionRequest } from "../types";

/** An authenticated, reusable handle to a completion API. */
export interface CompletionClient {
  readonly provider: string;

  /** One non-streaming completion; resolves to the raw reply text. */
  complete(request: CompletionRequest): Promise<string>;
}

export interface ClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs: number;
}

export interface Provider {
  readonly name: string;

  /** Environment variable the provider's credential is read from. */
  readonly credentialEnvVar: string;

  /**
   * Load the SDK module. Called once at startup; resolves to false when the
   * package cannot be loaded in this runtime.
   */
  loadSdk(): Promise<boolean>;

  /** Whether loadSdk() succeeded. */
  sdkLoaded(): boolean;

  /** Build a client handle. May throw; callers decide what a failure means. */
  createClient(options: ClientOptions): CompletionClient;
}

export class SdkNotLoadedError extends Error {
  constructor(provider: string) {
    super(`${provider} SDK is not loaded`);
    this.name = "SdkNotLoadedError";
  }
}
