import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";

/** Earlier files win; variables already in the environment win over both */
export const ENV_FILENAMES = [".env.local", ".env"] as const;

/**
 * Load env files from the working directory and from the `--path` root, if one
 * was passed, before any command reads credentials.
 */
export async function loadEnvForCli(argv: string[]): Promise<string[]> {
  const roots = [process.cwd()];
  const argvRoot = resolvePathFromArgv(argv);
  if (argvRoot && !roots.includes(argvRoot)) roots.push(argvRoot);

  const loaded: string[] = [];
  for (const rootPath of roots) {
    loaded.push(...await loadEnvFiles(rootPath));
  }
  return loaded;
}

export function resolvePathFromArgv(argv: string[]): string | undefined {
  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (token === "--path" || token === "-p") {
      const value = argv[index + 1];
      if (!value || value.startsWith("-")) return undefined;
      return resolve(value);
    }
    if (token.startsWith("--path=")) {
      const value = token.slice("--path=".length);
      return value ? resolve(value) : undefined;
    }
  }
  return undefined;
}

/**
 * Apply every env file in `rootPath` without overriding variables already set.
 * Returns the names of the variables this call set.
 */
export async function loadEnvFiles(rootPath: string): Promise<string[]> {
  const applied: string[] = [];
  for (const filename of ENV_FILENAMES) {
    const content = await readFile(join(rootPath, filename), "utf-8").catch(() => null);
    if (content === null) continue;

    for (const line of content.split(/\r?\n/u)) {
      const parsed = parseEnvLine(line);
      if (!parsed || process.env[parsed.key] !== undefined) continue;
      process.env[parsed.key] = parsed.value;
      applied.push(parsed.key);
    }
  }
  return applied;
}

const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/u;

function unquote(raw: string): string {
  const quote = raw[0];
  if ((quote === "\"" || quote === "'") && raw.length >= 2 && raw.endsWith(quote)) {
    return raw.slice(1, -1);
  }
  const comment = raw.indexOf(" #");
  return comment >= 0 ? raw.slice(0, comment).trim() : raw;
}

/**
 * `KEY=value`, optionally prefixed by `export`. Quoted values are taken
 * verbatim; unquoted ones lose a trailing ` # comment`.
 */
export function parseEnvLine(line: string): { key: string; value: string } | null {
  let text = line.trim();
  if (!text || text.startsWith("#")) return null;
  if (text.startsWith("export ")) text = text.slice("export ".length).trim();

  const equals = text.indexOf("=");
  if (equals <= 0) return null;

  const key = text.slice(0, equals).trim();
  if (!KEY_PATTERN.test(key)) return null;

  return { key, value: unquote(text.slice(equals + 1).trim()) };
}
