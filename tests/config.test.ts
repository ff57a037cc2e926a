import { describe, it, expect, afterEach } from "vitest";
import { getDefaultEnvVar, resolveApiKey } from "../src/utils/config.js";

afterEach(() => {
  delete process.env.ANTHROPIC_API_KEY;
  delete process.env.TESTSMITH_CUSTOM_KEY;
});

describe("resolveApiKey", () => {
  it("reads the provider's conventional variable", () => {
    process.env.ANTHROPIC_API_KEY = "test-secret";
    expect(resolveApiKey("anthropic")).toBe("test-secret");
  });

  it("prefers the configured variable name", () => {
    process.env.ANTHROPIC_API_KEY = "test-secret";
    process.env.TESTSMITH_CUSTOM_KEY = "custom-secret";
    expect(resolveApiKey("anthropic", "TESTSMITH_CUSTOM_KEY")).toBe("custom-secret");
  });

  it("returns undefined for an unknown provider", () => {
    expect(resolveApiKey("mistral")).toBeUndefined();
  });
});

describe("getDefaultEnvVar", () => {
  it("maps providers to variables", () => {
    expect(getDefaultEnvVar("openai")).toBe("OPENAI_API_KEY");
    expect(getDefaultEnvVar("google")).toBe("GOOGLE_API_KEY");
    expect(getDefaultEnvVar("ollama")).toBe("OLLAMA_HOST");
    expect(getDefaultEnvVar("other")).toBe("");
  });
});
