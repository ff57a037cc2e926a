import { ProviderConfigError, UnsupportedModelError } from "../core/errors.js";

export const SYSTEM_PROMPT =
  "You write Vitest unit tests in the language of the module under test. Reply with the test file only.";

export interface GenerationOptions {
  temperature?: number;
  maxTokens?: number;
  stopSequences?: string[];
}

/**
 * Text-generation backend. Each provider adapts one LLM API to this interface.
 */
export interface LLMProvider {
  readonly name: string;
  readonly defaultModel: string;
  /** When set, only these model IDs are accepted by `resolveModel` */
  readonly supportedModels?: readonly string[];
  generateText(prompt: string, model: string, options?: GenerationOptions): Promise<string>;
}

/**
 * For cloud providers `credential` is the API key; for ollama it is the optional host URL.
 */
export type ProviderFactory = (credential?: string) => LLMProvider | Promise<LLMProvider>;

const registry = new Map<string, ProviderFactory>();

export function registerProvider(name: string, factory: ProviderFactory): void {
  registry.set(name, factory);
}

export function listProviders(): string[] {
  return [...registry.keys()].sort();
}

function requireKey(provider: string, credential?: string): string {
  if (!credential) {
    throw new ProviderConfigError(`No API key found for provider ${provider}. Set it in the environment or .env.local`);
  }
  return credential;
}

registerProvider("anthropic", async (credential) => {
  const { AnthropicProvider } = await import("./anthropic.js");
  return new AnthropicProvider(requireKey("anthropic", credential));
});
registerProvider("openai", async (credential) => {
  const { OpenAIProvider } = await import("./openai.js");
  return new OpenAIProvider(requireKey("openai", credential));
});
registerProvider("google", async (credential) => {
  const { GoogleProvider } = await import("./google.js");
  return new GoogleProvider(requireKey("google", credential));
});
registerProvider("ollama", async (credential) => {
  const { OllamaProvider } = await import("./ollama.js");
  return new OllamaProvider(credential);
});

export async function createProvider(name: string, credential?: string): Promise<LLMProvider> {
  const factory = registry.get(name);
  if (!factory) {
    throw new ProviderConfigError(`Unknown provider: ${name}. Available: ${listProviders().join(", ")}`);
  }
  return factory(credential);
}

/**
 * Pick the model for a call: the explicit one, else the provider default,
 * checked against `supportedModels` when the provider declares them.
 */
export function resolveModel(provider: LLMProvider, model?: string): string {
  const chosen = model || provider.defaultModel;
  const supported = provider.supportedModels;
  if (supported && supported.length > 0 && !supported.includes(chosen)) {
    throw new UnsupportedModelError(provider.name, chosen, [...supported].sort());
  }
  return chosen;
}
