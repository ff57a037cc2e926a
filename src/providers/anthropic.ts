import Anthropic from "@anthropic-ai/sdk";
import { SYSTEM_PROMPT, type GenerationOptions, type LLMProvider } from "./index.js";

export class AnthropicProvider implements LLMProvider {
  readonly name = "anthropic";
  readonly defaultModel = "claude-3-5-haiku-latest";
  private client: Anthropic;

  constructor(apiKey: string) {
    this.client = new Anthropic({ apiKey });
  }

  async generateText(prompt: string, model: string, options: GenerationOptions = {}): Promise<string> {
    const response = await this.client.messages.create({
      model,
      max_tokens: options.maxTokens ?? 4096,
      temperature: options.temperature,
      stop_sequences: options.stopSequences,
      system: SYSTEM_PROMPT,
      messages: [{ role: "user", content: prompt }],
    });

    for (const block of response.content) {
      if (block.type === "text") return block.text;
    }
    throw new Error("Unexpected response type from Anthropic");
  }
}
