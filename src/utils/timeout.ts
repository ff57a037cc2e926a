export class TimeoutError extends Error {
  constructor(public timeoutMs: number, context?: string) {
    super(context ? `Timed out after ${timeoutMs}ms: ${context}` : `Operation timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/**
 * Race `promise` against a timer. A missing or non-positive timeout returns the promise as-is.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs?: number, context?: string): Promise<T> {
  if (!timeoutMs || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  try {
    return await Promise.race([
      promise,
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(timeoutMs, context)), timeoutMs);
      }),
    ]);
  } finally {
    clearTimeout(timer);
  }
}
