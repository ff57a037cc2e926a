import { describe, it, expect, vi, afterEach } from "vitest";
import { ProviderConfigError, UnsupportedModelError } from "../src/core/errors.js";
import {
  SYSTEM_PROMPT,
  createProvider,
  listProviders,
  registerProvider,
  resolveModel,
} from "../src/providers/index.js";
import { GoogleProvider } from "../src/providers/google.js";
import { OllamaProvider } from "../src/providers/ollama.js";
import { StubBackend } from "./helpers.js";

afterEach(() => {
  vi.unstubAllGlobals();
});

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function mockFetch(reply: () => Response) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => reply());
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function requestBody(init: RequestInit | undefined): unknown {
  if (typeof init?.body !== "string") throw new Error("fetch was not called with a JSON body");
  return JSON.parse(init.body);
}

describe("createProvider", () => {
  it.each([
    ["anthropic", "claude-3-5-haiku-latest"],
    ["openai", "gpt-4o-mini"],
    ["google", "gemini-2.0-flash"],
    ["ollama", "llama3.1"],
  ])("creates the %s provider", async (name, defaultModel) => {
    const provider = await createProvider(name, name === "ollama" ? undefined : "test-key");
    expect(provider.name).toBe(name);
    expect(provider.defaultModel).toBe(defaultModel);
    expect(typeof provider.generateText).toBe("function");
  });

  it("throws for an unknown provider name", async () => {
    await expect(createProvider("mistral", "test-key")).rejects.toThrow(
      "Unknown provider: mistral. Available: anthropic, google, ollama, openai",
    );
  });

  it("requires a key for cloud providers", async () => {
    const error = await createProvider("openai").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ProviderConfigError);
    expect(error instanceof Error ? error.message : "").toBe(
      "No API key found for provider openai. Set it in the environment or .env.local",
    );
  });

  it("accepts registered providers", async () => {
    registerProvider("stub", () => new StubBackend(["ok"]));
    expect(listProviders()).toContain("stub");
    expect((await createProvider("stub")).name).toBe("stub");
  });
});

describe("resolveModel", () => {
  it("falls back to the default model", () => {
    expect(resolveModel(new StubBackend([]))).toBe("stub-model");
    expect(resolveModel(new StubBackend([]), "")).toBe("stub-model");
    expect(resolveModel(new StubBackend([]), "anything")).toBe("anything");
  });

  it("rejects models outside the declared list, listing them sorted", () => {
    const backend = new StubBackend([], ["stub-model", "alpha"]);
    expect(resolveModel(backend, "alpha")).toBe("alpha");

    const error = (() => {
      try {
        resolveModel(backend, "omega");
      } catch (err) {
        return err;
      }
    })();
    expect(error).toBeInstanceOf(UnsupportedModelError);
    expect(error instanceof UnsupportedModelError ? error.supported : []).toEqual(["alpha", "stub-model"]);
    expect(error instanceof Error ? error.message : "").toBe(
      "Model 'omega' not supported by provider stub. Supported models: alpha, stub-model",
    );
  });
});

describe("OllamaProvider", () => {
  it("posts a non-streaming chat request", async () => {
    const fetchMock = mockFetch(() => jsonResponse({ message: { content: "test code" } }));

    const provider = new OllamaProvider("http://ollama.local:11434/");
    const text = await provider.generateText("prompt", "llama3.1", { temperature: 0.2, maxTokens: 100 });

    expect(text).toBe("test code");
    expect(fetchMock.mock.calls[0][0]).toBe("http://ollama.local:11434/api/chat");
    expect(requestBody(fetchMock.mock.calls[0][1])).toEqual({
      model: "llama3.1",
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: "prompt" },
      ],
      options: { temperature: 0.2, num_predict: 100 },
      stream: false,
    });
  });

  it("raises on an HTTP error", async () => {
    mockFetch(() => new Response("nope", { status: 500, statusText: "Internal Server Error" }));
    await expect(new OllamaProvider().generateText("p", "m")).rejects.toThrow("Ollama error: 500 Internal Server Error");
  });

  it("raises on an empty reply", async () => {
    mockFetch(() => jsonResponse({ message: {} }));
    await expect(new OllamaProvider().generateText("p", "m")).rejects.toThrow("Empty response from Ollama");
  });
});

describe("GoogleProvider", () => {
  it("reads the first candidate's text", async () => {
    const fetchMock = mockFetch(() => jsonResponse({ candidates: [{ content: { parts: [{ text: "tests" }] } }] }));

    const text = await new GoogleProvider("test-key").generateText("prompt", "gemini-2.0-flash", { stopSequences: ["END"] });
    expect(text).toBe("tests");
    expect(fetchMock.mock.calls[0][0]).toBe(
      "https://generativelanguage.googleapis.com/v1beta/models/gemini-2.0-flash:generateContent?key=test-key",
    );
    expect(requestBody(fetchMock.mock.calls[0][1])).toMatchObject({
      contents: [{ parts: [{ text: "prompt" }] }],
      generationConfig: { maxOutputTokens: 4096, stopSequences: ["END"] },
    });
  });

  it("raises when no candidate carries text", async () => {
    mockFetch(() => jsonResponse({ candidates: [] }));
    await expect(new GoogleProvider("test-key").generateText("p", "m")).rejects.toThrow("Empty response from Google");
  });
});
