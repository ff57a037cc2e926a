export interface MetricsReport {
  totalRequests: number;
  cacheHits: number;
  cacheMisses: number;
  cacheHitRate: number;
  averageGenerationMs: number;
  averageValidationMs: number;
  averageContextMs: number;
}

const SLOW_GENERATION_MS = 30_000;
const SLOW_VALIDATION_MS = 10_000;
const LOW_CACHE_HIT_RATE = 0.3;

function mean(values: number[]): number {
  return values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : 0;
}

/**
 * Durations and cache counters for one CLI run. Passed to the orchestrator explicitly.
 */
export class GenerationMetrics {
  readonly generationTimes: number[] = [];
  readonly validationTimes: number[] = [];
  readonly contextTimes: number[] = [];
  cacheHits = 0;
  cacheMisses = 0;

  /** Each recorded generation counts as one backend request */
  get totalRequests(): number {
    return this.generationTimes.length;
  }

  recordGeneration(ms: number): void {
    this.generationTimes.push(ms);
  }

  recordValidation(ms: number): void {
    this.validationTimes.push(ms);
  }

  recordContext(ms: number): void {
    this.contextTimes.push(ms);
  }

  recordCacheHit(): void {
    this.cacheHits++;
  }

  recordCacheMiss(): void {
    this.cacheMisses++;
  }

  /** Time an async step and record its duration with `record` */
  async time<T>(record: (ms: number) => void, work: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      return await work();
    } finally {
      record(performance.now() - start);
    }
  }

  report(): MetricsReport {
    const lookups = this.cacheHits + this.cacheMisses;
    return {
      totalRequests: this.totalRequests,
      cacheHits: this.cacheHits,
      cacheMisses: this.cacheMisses,
      cacheHitRate: lookups > 0 ? this.cacheHits / lookups : 0,
      averageGenerationMs: mean(this.generationTimes),
      averageValidationMs: mean(this.validationTimes),
      averageContextMs: mean(this.contextTimes),
    };
  }

  recommendations(): string[] {
    const report = this.report();
    const tips: string[] = [];

    if (report.cacheHitRate < LOW_CACHE_HIT_RATE) {
      tips.push("Low cache hit rate: keep prompts and templates stable between runs");
    }
    if (report.averageGenerationMs > SLOW_GENERATION_MS) {
      tips.push("Generation times are high: consider a faster model or local inference");
    }
    if (report.averageValidationMs > SLOW_VALIDATION_MS) {
      tips.push("Validation is slow: check the test runner command and its startup time");
    }
    return tips.length > 0 ? tips : ["Performance is optimal"];
  }
}
