import OpenAI from "openai";
import { SYSTEM_PROMPT, type GenerationOptions, type LLMProvider } from "./index.js";

export class OpenAIProvider implements LLMProvider {
  readonly name = "openai";
  readonly defaultModel = "gpt-4o-mini";
  private client: OpenAI;

  constructor(apiKey: string) {
    this.client = new OpenAI({ apiKey });
  }

  async generateText(prompt: string, model: string, options: GenerationOptions = {}): Promise<string> {
    const response = await this.client.chat.completions.create({
      model,
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: prompt },
      ],
      temperature: options.temperature,
      max_tokens: options.maxTokens ?? 4096,
      stop: options.stopSequences,
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error("Empty response from OpenAI");
    }
    return content;
  }
}
