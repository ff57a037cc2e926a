import { resolve } from "node:path";
import { loadConfig, saveConfig } from "../utils/config.js";
import { heading, errorMsg, successMsg } from "../utils/display.js";
import { CONFIG_FILENAME, PROVIDER_NAMES, type ConfigFile, type ProviderName } from "../core/schema.js";

export interface ConfigCommandOptions {
  path?: string;
  provider?: string;
  model?: string;
  apiKeyEnv?: string;
  qualityThreshold?: string;
  maxAttempts?: string;
  timeout?: string;
  runner?: string[];
  templateFile?: string;
  templateName?: string;
  parallel?: string;
}

function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

function positiveInt(value: string): number | null {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 1 ? parsed : null;
}

function printConfig(config: ConfigFile): void {
  console.log(heading("\nCurrent configuration:\n"));
  for (const [key, value] of Object.entries(config)) {
    if (value === undefined) continue;
    console.log(`  ${key}: ${Array.isArray(value) ? value.join(" ") : String(value)}`);
  }
  console.log("");
}

export async function configCommand(options: ConfigCommandOptions): Promise<void> {
  const rootPath = resolve(options.path ?? ".");
  const existing = await loadConfig(rootPath);

  const hasUpdates = Object.entries(options).some(([key, value]) => key !== "path" && value !== undefined);

  // If no flags, show current config
  if (!hasUpdates) {
    if (!existing) {
      console.log(errorMsg(`No ${CONFIG_FILENAME} found. Run \`testsmith config --provider <name>\` first.`));
      return;
    }
    printConfig(existing);
    return;
  }

  const updated: ConfigFile = existing ?? { provider: "anthropic" };

  if (options.provider) {
    if (!isProviderName(options.provider)) {
      console.log(errorMsg(`Invalid provider: ${options.provider}. Must be one of: ${PROVIDER_NAMES.join(", ")}`));
      return;
    }
    updated.provider = options.provider;
  }

  if (options.model) updated.model = options.model;
  if (options.apiKeyEnv) updated.api_key_env = options.apiKeyEnv;
  if (options.templateFile) updated.template_file = options.templateFile;
  if (options.templateName) updated.template_name = options.templateName;

  if (options.qualityThreshold !== undefined) {
    const threshold = Number(options.qualityThreshold);
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
      console.log(errorMsg("quality_threshold must be a number between 0 and 1"));
      return;
    }
    updated.quality_threshold = threshold;
  }

  const integers = [
    ["maxAttempts", "max_attempts"],
    ["timeout", "timeout_ms"],
    ["parallel", "parallel"],
  ] as const;
  for (const [flag, field] of integers) {
    const raw = options[flag];
    if (raw === undefined) continue;
    const value = positiveInt(raw);
    if (value === null) {
      console.log(errorMsg(`${field} must be a positive integer`));
      return;
    }
    updated[field] = value;
  }

  if (options.runner) {
    if (options.runner.length === 0) {
      console.log(errorMsg("runner must name a command"));
      return;
    }
    updated.runner = options.runner;
  }

  await saveConfig(rootPath, updated);
  console.log(successMsg("Configuration updated."));
}
