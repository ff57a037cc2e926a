import { SYSTEM_PROMPT, type GenerationOptions, type LLMProvider } from "./index.js";

export class OllamaProvider implements LLMProvider {
  readonly name = "ollama";
  readonly defaultModel = "llama3.1";
  private baseUrl: string;

  constructor(host = "http://localhost:11434") {
    this.baseUrl = host.replace(/\/$/, "");
  }

  async generateText(prompt: string, model: string, options: GenerationOptions = {}): Promise<string> {
    const response = await fetch(`${this.baseUrl}/api/chat`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({
        model,
        messages: [
          { role: "system", content: SYSTEM_PROMPT },
          { role: "user", content: prompt },
        ],
        options: {
          temperature: options.temperature,
          num_predict: options.maxTokens,
          stop: options.stopSequences,
        },
        stream: false,
      }),
    });

    if (!response.ok) {
      throw new Error(`Ollama error: ${response.status} ${response.statusText}`);
    }

    const data = await response.json() as { message?: { content?: string } };
    const text = data.message?.content;

    if (!text) {
      throw new Error("Empty response from Ollama");
    }
    return text;
  }
}
