import { readFile, writeFile, appendFile, access } from "node:fs/promises";
import { basename, dirname, extname, join } from "node:path";
import { stringify, parse } from "yaml";
import { configSchema, CONFIG_FILENAME } from "./schema.js";
import type { ConfigFile } from "./schema.js";

/**
 * Write config file to disk
 */
export async function writeConfig(rootPath: string, data: ConfigFile): Promise<void> {
  configSchema.parse(data);

  const yamlContent = stringify(data, {
    lineWidth: 120,
    defaultStringType: "PLAIN",
    defaultKeyType: "PLAIN",
  });

  await writeFile(join(rootPath, CONFIG_FILENAME), yamlContent, "utf-8");
}

/**
 * Read config file from disk. Missing or invalid config reads as null.
 */
export async function readConfig(rootPath: string): Promise<ConfigFile | null> {
  try {
    const content = await readFile(join(rootPath, CONFIG_FILENAME), "utf-8");
    const parsed = parse(content);
    return configSchema.parse(parsed);
  } catch {
    return null;
  }
}

/**
 * `<dir>/<stem>.test<ext>` for a source file, e.g. `src/math.ts` gives `src/math.test.ts`.
 */
export function defaultTestPath(sourceFile: string): string {
  const ext = extname(sourceFile);
  return join(dirname(sourceFile), `${basename(sourceFile, ext)}.test${ext}`);
}

export type WriteMode = "create" | "overwrite" | "append";

export class OutputExistsError extends Error {
  constructor(public outputPath: string) {
    super(`${outputPath} already exists. Use --overwrite or --append`);
    this.name = "OutputExistsError";
  }
}

/**
 * Write an accepted test body. `create` refuses to replace an existing file;
 * `append` separates the new body from existing content with a blank line.
 */
export async function writeTestFile(outputPath: string, body: string, mode: WriteMode): Promise<void> {
  const exists = await access(outputPath).then(() => true, () => false);

  if (exists && mode === "create") {
    throw new OutputExistsError(outputPath);
  }

  const content = body.endsWith("\n") ? body : `${body}\n`;
  if (exists && mode === "append") {
    await appendFile(outputPath, `\n\n${content}`, "utf-8");
    return;
  }
  await writeFile(outputPath, content, "utf-8");
}
