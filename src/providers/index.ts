import { ChatProviderName } from "../config";
import { AnthropicProvider } from "./anthropic";
import { OpenAIProvider } from "./openai";
import { Provider } from "./provider";

export { Provider, CompletionClient, ClientOptions, SdkNotLoadedError } from "./provider";
export { AnthropicProvider } from "./anthropic";
export { OpenAIProvider } from "./openai";

export function createProvider(name: ChatProviderName): Provider {
  switch (name) {
    case "anthropic":
      return new AnthropicProvider();
    case "openai":
      return new OpenAIProvider();
  }
}
