import { FileResultCache } from "../core/cache.js";
import { dim, errorMsg, heading, successMsg } from "../utils/display.js";

export interface CacheCommandOptions {
  stats?: boolean;
  /** `true` for a bare `--clear`; otherwise the day count as typed */
  clear?: string | boolean;
  dir?: string;
  json?: boolean;
}

export async function cacheCommand(options: CacheCommandOptions): Promise<void> {
  const cache = new FileResultCache(options.dir);

  if (options.clear !== undefined && options.clear !== false) {
    const days = options.clear === true ? 0 : Number(options.clear);
    if (!Number.isInteger(days) || days < 0) {
      console.log(errorMsg("--clear takes a non-negative number of days"));
      process.exitCode = 1;
      return;
    }
    const removed = await cache.clear(days);
    const scope = days === 0 ? "" : ` not used in ${days} day${days === 1 ? "" : "s"}`;
    console.log(successMsg(`Removed ${removed} cache entr${removed === 1 ? "y" : "ies"}${scope}.`));
    return;
  }

  const stats = await cache.stats();
  if (options.json) {
    console.log(JSON.stringify({ dir: cache.dir, ...stats }, null, 2));
    return;
  }

  console.log(heading("\nResult cache\n"));
  console.log(`  location: ${cache.dir}`);
  console.log(`  entries: ${stats.entries}`);
  console.log(`  accepted: ${stats.accepted}`);
  console.log(`  average score: ${stats.averageScore === null ? dim("n/a") : stats.averageScore.toFixed(2)}`);
  console.log("");
}
