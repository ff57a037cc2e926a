import { z } from "zod";

// --- Config file schema (.testsmith.yaml) ---

export const PROVIDER_NAMES = ["anthropic", "openai", "google", "ollama"] as const;

export const configSchema = z.object({
  provider: z.enum(PROVIDER_NAMES).describe("LLM provider"),
  model: z.string().optional().describe("Model ID override"),
  api_key_env: z.string().optional().describe("Env var name for API key"),
  temperature: z.number().min(0).max(2).optional(),
  max_tokens: z.number().int().positive().optional(),
  max_attempts: z.number().int().min(1).optional()
    .describe("Generation attempts before falling back to the best candidate (default: 3)"),
  quality_threshold: z.number().min(0).max(1).optional()
    .describe("Aggregate score at which a candidate is accepted (default: 0.8)"),
  timeout_ms: z.number().int().positive().optional()
    .describe("Wall-clock budget for one test run (default: 30000)"),
  backend_timeout_ms: z.number().int().positive().optional()
    .describe("Wall-clock budget for one backend call (default: 120000)"),
  runner: z.array(z.string()).min(1).optional()
    .describe("Test runner command; {file} is replaced with the candidate path"),
  template_file: z.string().optional().describe("Prompt template YAML file"),
  template_name: z.string().optional().describe("Named template inside template_file"),
  parallel: z.number().int().min(1).optional().describe("Files processed concurrently"),
  cache: z.boolean().optional().describe("Reuse results for unchanged sources (default: true)"),
});

// --- Cached generation result ---

export const cacheEntrySchema = z.object({
  key: z.string(),
  provider: z.string(),
  model: z.string(),
  test_code: z.string(),
  quality_score: z.number().nullable(),
  accepted: z.boolean(),
  created_at: z.string().describe("ISO 8601 timestamp"),
  last_accessed: z.string().describe("ISO 8601 timestamp"),
});

// --- Types ---

export type ConfigFile = z.infer<typeof configSchema>;
export type CacheEntry = z.infer<typeof cacheEntrySchema>;
export type ProviderName = (typeof PROVIDER_NAMES)[number];

// --- Constants ---

export const CONFIG_FILENAME = ".testsmith.yaml";
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_QUALITY_THRESHOLD = 0.8;
export const DEFAULT_RUN_TIMEOUT_MS = 30_000;
export const DEFAULT_BACKEND_TIMEOUT_MS = 120_000;
export const DEFAULT_RUNNER_COMMAND = ["npx", "vitest", "run", "{file}"];
