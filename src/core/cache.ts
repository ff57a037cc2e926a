import { createHash } from "node:crypto";
import { mkdir, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { cacheEntrySchema, type CacheEntry } from "./schema.js";
import { describeError } from "./errors.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CacheKeyParts {
  sourceText: string;
  renderedPrompt: string;
  provider: string;
  model: string;
  validate: boolean;
}

export function cacheKey(parts: CacheKeyParts): string {
  return createHash("sha256")
    .update(parts.sourceText)
    .update("\0")
    .update(parts.renderedPrompt)
    .update("\0")
    .update(parts.provider)
    .update("\0")
    .update(parts.model)
    .update("\0")
    .update(parts.validate ? "validated" : "raw")
    .digest("hex");
}

export interface CacheStats {
  entries: number;
  accepted: number;
  /** Mean quality score over entries that carry one; null when none do */
  averageScore: number | null;
}

export function defaultCacheDir(): string {
  return join(tmpdir(), "testsmith-cache");
}

/**
 * Generated tests keyed by `cacheKey`, one JSON file per entry.
 */
export class FileResultCache {
  private pending = new Map<string, Promise<void>>();

  constructor(readonly dir: string = defaultCacheDir()) {}

  private pathFor(key: string): string {
    return join(this.dir, `${key}.json`);
  }

  /** Chain work for one key behind any earlier write to it */
  private serialize(key: string, work: () => Promise<void>): Promise<void> {
    const previous = this.pending.get(key) ?? Promise.resolve();
    const next = previous.then(work, work);
    this.pending.set(key, next);
    return next.finally(() => {
      if (this.pending.get(key) === next) this.pending.delete(key);
    });
  }

  private async readEntry(path: string): Promise<CacheEntry | null> {
    let raw: string;
    try {
      raw = await readFile(path, "utf-8");
    } catch {
      return null;
    }
    try {
      const parsed = cacheEntrySchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data;
    } catch {
      // fall through to the warning below
    }
    console.warn(`Warning: ignoring corrupt cache entry ${path}`);
    return null;
  }

  async get(key: string): Promise<CacheEntry | null> {
    await this.pending.get(key)?.catch(() => undefined);
    const entry = await this.readEntry(this.pathFor(key));
    if (!entry) return null;

    const touched: CacheEntry = { ...entry, last_accessed: new Date().toISOString() };
    await this.serialize(key, () => writeFile(this.pathFor(key), JSON.stringify(touched, null, 2), "utf-8"))
      .catch((err) => console.warn(`Warning: could not update cache entry ${key}: ${describeError(err)}`));
    return touched;
  }

  async set(
    key: string,
    value: Pick<CacheEntry, "provider" | "model" | "test_code" | "quality_score" | "accepted">,
  ): Promise<void> {
    const now = new Date().toISOString();
    const entry: CacheEntry = { key, ...value, created_at: now, last_accessed: now };
    await this.serialize(key, async () => {
      await mkdir(this.dir, { recursive: true });
      await writeFile(this.pathFor(key), JSON.stringify(entry, null, 2), "utf-8");
    });
  }

  private async entries(): Promise<Array<{ path: string; entry: CacheEntry | null }>> {
    const names = await readdir(this.dir).catch(() => null);
    if (!names) return [];
    const files = names.filter((name) => name.endsWith(".json")).sort();
    const result: Array<{ path: string; entry: CacheEntry | null }> = [];
    for (const name of files) {
      const path = join(this.dir, name);
      result.push({ path, entry: await this.readEntry(path) });
    }
    return result;
  }

  async stats(): Promise<CacheStats> {
    const valid = (await this.entries()).flatMap(({ entry }) => (entry ? [entry] : []));
    const scores = valid.flatMap((e) => (e.quality_score === null ? [] : [e.quality_score]));
    return {
      entries: valid.length,
      accepted: valid.filter((e) => e.accepted).length,
      averageScore: scores.length > 0 ? scores.reduce((a, b) => a + b, 0) / scores.length : null,
    };
  }

  /**
   * Remove entries not accessed for `olderThanDays` days; 0 removes everything.
   * Corrupt entries are always removed. Returns the number of files deleted.
   */
  async clear(olderThanDays = 0): Promise<number> {
    const cutoff = Date.now() - olderThanDays * DAY_MS;
    let removed = 0;
    for (const { path, entry } of await this.entries()) {
      const stale = olderThanDays <= 0 || !entry || Date.parse(entry.last_accessed) < cutoff;
      if (!stale) continue;
      await rm(path, { force: true });
      removed++;
    }
    return removed;
  }
}
