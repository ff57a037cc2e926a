import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { parse } from "yaml";
import { TemplateError, describeError } from "../core/errors.js";

export const SOURCE_PLACEHOLDER = "{{source_code}}";
export const DEFAULT_TEMPLATE_NAME = "default";

export function defaultTemplatePath(): string {
  return fileURLToPath(new URL("../../templates/prompts.yaml", import.meta.url));
}

export interface TemplateOptions {
  /** YAML file holding a bare template string or a name → template mapping */
  templateFile?: string;
  /** Entry to select when the file is a mapping (default: "default") */
  templateName?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function countPlaceholders(template: string): number {
  return template.split(SOURCE_PLACEHOLDER).length - 1;
}

/**
 * Resolve a prompt template. Content that is not valid YAML is used as raw text.
 */
export async function loadPromptTemplate(options: TemplateOptions = {}): Promise<string> {
  const file = options.templateFile ?? defaultTemplatePath();

  let raw: string;
  try {
    raw = await readFile(file, "utf-8");
  } catch (err) {
    throw new TemplateError(`Cannot read prompt template ${file}: ${describeError(err)}`, file);
  }

  let data: unknown;
  try {
    data = parse(raw);
  } catch {
    data = raw;
  }

  let template: string;
  if (typeof data === "string") {
    template = data;
  } else if (isRecord(data)) {
    const key = options.templateName ?? DEFAULT_TEMPLATE_NAME;
    if (!(key in data)) {
      throw new TemplateError(`Prompt name '${key}' not found in template file.`, file);
    }
    const entry = data[key];
    if (typeof entry !== "string") {
      throw new TemplateError(`Prompt '${key}' must be a string.`, file);
    }
    template = entry;
  } else {
    throw new TemplateError("Prompt YAML must be a string or mapping of name → template.", file);
  }

  const count = countPlaceholders(template);
  if (count !== 1) {
    throw new TemplateError(
      `Prompt template must contain exactly one ${SOURCE_PLACEHOLDER} placeholder (found ${count}).`,
      file,
    );
  }
  return template;
}

/**
 * Replace the single placeholder with `insertion`, verbatim. The inserted text
 * is never scanned again, so placeholder-like text inside it survives as written.
 */
export function renderTemplate(template: string, insertion: string): string {
  const index = template.indexOf(SOURCE_PLACEHOLDER);
  if (index === -1) {
    throw new TemplateError(`Prompt template has no ${SOURCE_PLACEHOLDER} placeholder.`);
  }
  return template.slice(0, index) + insertion + template.slice(index + SOURCE_PLACEHOLDER.length);
}
