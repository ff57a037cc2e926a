import { basename, dirname, extname, resolve } from "node:path";
import { CodebaseAnalyzer } from "../analyzer/codebase.js";
import { analyzeSource, readSourceFile } from "../analyzer/source.js";
import type { ProjectConventions, SourceAnalysis } from "../analyzer/types.js";
import { cacheKey, type FileResultCache } from "../core/cache.js";
import { BackendError, describeError } from "../core/errors.js";
import type { GenerationMetrics } from "../core/metrics.js";
import { defaultTestPath } from "../core/writer.js";
import {
  DEFAULT_BACKEND_TIMEOUT_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_QUALITY_THRESHOLD,
} from "../core/schema.js";
import { resolveModel, type GenerationOptions, type LLMProvider } from "../providers/index.js";
import { poolSettled } from "../utils/pool.js";
import { withTimeout } from "../utils/timeout.js";
import { combinedOutput, type ExecutionResult, type TestRunner } from "../validator/runner.js";
import { describeValidationIssue, QualityValidator, type ValidationResult } from "../validator/validator.js";
import { buildFeedback, composePrompt, type GenerationRequest } from "./prompts.js";
import { loadPromptTemplate } from "./templates.js";

export type ProgressEvent =
  | { kind: "cache-hit"; file: string }
  | { kind: "attempt"; file: string; attempt: number; maxAttempts: number }
  | { kind: "backend-error"; file: string; attempt: number; message: string }
  | { kind: "validated"; file: string; attempt: number; score: number; executed: boolean };

export interface GenerateOptions {
  /** Model ID; the provider default when omitted */
  model?: string;
  generation?: GenerationOptions;
  maxAttempts?: number;
  qualityThreshold?: number;
  /** When false the first candidate is returned unchecked */
  validate?: boolean;
  /** Include the Project Context block in the prompt */
  useContext?: boolean;
  templateFile?: string;
  templateName?: string;
  /** Already-loaded template text; skips template resolution */
  template?: string;
  backendTimeoutMs?: number;
  maxSourceChars?: number;
  /** Root for convention detection and the runner's working directory (default: cwd) */
  projectRoot?: string;
  runTimeoutMs?: number;
  runner?: TestRunner;
  analyzer?: CodebaseAnalyzer;
  validator?: QualityValidator;
  cache?: FileResultCache;
  metrics?: GenerationMetrics;
  onProgress?: (event: ProgressEvent) => void;
}

export interface GenerationOutcome {
  testBody: string;
  /** True when a candidate met the threshold, or validation was off */
  accepted: boolean;
  /** Backend calls made; 0 for a cache hit */
  attempts: number;
  score?: number;
  validation?: ValidationResult;
  fromCache: boolean;
  /** Prompt sent on each attempt, in order */
  prompts: string[];
}

export interface ExecutableOutcome {
  testBody: string;
  executable: boolean;
  attempts: number;
  execution?: ExecutionResult;
  prompts: string[];
}

const FENCED_BLOCK = /```[\w-]*[ \t]*\r?\n([\s\S]*?)```/;
const OPEN_FENCE = /^```[\w-]*[ \t]*\r?\n/;

/**
 * Strip a Markdown code fence from a backend reply. The first fenced block wins;
 * an unterminated opening fence is dropped.
 */
export function extractCode(reply: string): string {
  const fenced = FENCED_BLOCK.exec(reply);
  if (fenced) return fenced[1].trim();
  return reply.trim().replace(OPEN_FENCE, "").trim();
}

/** Failure traces worth regenerating for: the file never got as far as running its tests */
export const RETRYABLE_SIGNATURES = [
  "SyntaxError",
  "Cannot find module",
  "Cannot find package",
  "ERR_MODULE_NOT_FOUND",
  "Failed to resolve import",
  "Failed to load url",
  "Transform failed",
  "Unexpected token",
  'Expected "',
] as const;

export function isRetryableFailure(trace: string): boolean {
  return RETRYABLE_SIGNATURES.some((signature) => trace.includes(signature));
}

type MetricRecorder = "recordGeneration" | "recordValidation" | "recordContext";

function timed<T>(metrics: GenerationMetrics | undefined, record: MetricRecorder, work: () => Promise<T>): Promise<T> {
  return metrics ? metrics.time((ms) => metrics[record](ms), work) : work();
}

interface Prepared {
  sourcePath: string;
  sourceText: string;
  analysis: SourceAnalysis;
  request: GenerationRequest;
  model: string;
}

async function prepare(sourceFile: string, backend: LLMProvider, options: GenerateOptions): Promise<Prepared> {
  const sourcePath = resolve(sourceFile);
  const sourceText = await readSourceFile(sourcePath);
  const template = options.template
    ?? await loadPromptTemplate({ templateFile: options.templateFile, templateName: options.templateName });
  const model = resolveModel(backend, options.model);
  const fileName = basename(sourcePath);

  if (options.useContext === false) {
    const request = composePrompt({ sourceText, template, maxSourceChars: options.maxSourceChars });
    return { sourcePath, sourceText, analysis: analyzeSource(sourceText, fileName), request, model };
  }

  const analyzer = options.analyzer ?? new CodebaseAnalyzer(options.projectRoot ?? process.cwd());
  const { analysis, conventions } = await timed(options.metrics, "recordContext", async () => {
    const conventions: ProjectConventions = await analyzer.getConventions();
    return { analysis: analyzer.analyze(sourceText, fileName), conventions };
  });

  const request = composePrompt({
    sourceText,
    template,
    analysis,
    conventions,
    modulePath: `./${basename(sourcePath, extname(sourcePath))}`,
    testFileName: basename(defaultTestPath(sourcePath)),
    maxSourceChars: options.maxSourceChars,
  });
  return { sourcePath, sourceText, analysis, request, model };
}

/**
 * Validator writing candidates beside the source, named like its final test file,
 * so relative imports resolve the same way.
 */
function defaultValidator(sourcePath: string, options: GenerateOptions): QualityValidator {
  const ext = extname(sourcePath);
  return new QualityValidator({
    runner: options.runner,
    timeoutMs: options.runTimeoutMs,
    workDir: dirname(sourcePath),
    cwd: options.projectRoot,
    candidateStem: basename(sourcePath, ext),
    candidateExtension: `.test${ext}`,
  });
}

async function callBackend(
  backend: LLMProvider,
  prompt: string,
  model: string,
  options: GenerateOptions,
): Promise<string> {
  const reply = await timed(options.metrics, "recordGeneration", () =>
    withTimeout(
      backend.generateText(prompt, model, options.generation ?? {}),
      options.backendTimeoutMs ?? DEFAULT_BACKEND_TIMEOUT_MS,
      `${backend.name} generation`,
    ));
  return extractCode(reply);
}

/**
 * Generate a test body for `sourceFile`, validating each candidate and retrying
 * with accumulated feedback until one scores at or above the threshold. When none
 * does, the highest-scoring candidate is returned (earliest on ties).
 *
 * Backend failures consume an attempt. If no attempt produced a candidate the
 * last failure is raised as a BackendError.
 */
export async function generateValidated(
  sourceFile: string,
  backend: LLMProvider,
  options: GenerateOptions = {},
): Promise<GenerationOutcome> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const threshold = options.qualityThreshold ?? DEFAULT_QUALITY_THRESHOLD;
  const validate = options.validate ?? true;
  const { metrics, cache } = options;

  const prepared = await prepare(sourceFile, backend, options);
  const file = prepared.sourcePath;
  const report = (event: ProgressEvent) => options.onProgress?.(event);

  const key = cache
    ? cacheKey({
      sourceText: prepared.sourceText,
      renderedPrompt: prepared.request.renderedPrompt,
      provider: backend.name,
      model: prepared.model,
      validate,
    })
    : undefined;

  if (cache && key) {
    const hit = await cache.get(key);
    if (hit) {
      metrics?.recordCacheHit();
      report({ kind: "cache-hit", file });
      return {
        testBody: hit.test_code,
        accepted: hit.accepted,
        attempts: 0,
        score: hit.quality_score ?? undefined,
        fromCache: true,
        prompts: [],
      };
    }
    metrics?.recordCacheMiss();
  }

  const finish = async (outcome: GenerationOutcome): Promise<GenerationOutcome> => {
    if (cache && key) {
      await cache.set(key, {
        provider: backend.name,
        model: prepared.model,
        test_code: outcome.testBody,
        quality_score: outcome.score ?? null,
        accepted: outcome.accepted,
      }).catch((err) => console.warn(`Warning: could not cache result for ${file}: ${describeError(err)}`));
    }
    return outcome;
  };

  const validator = options.validator ?? defaultValidator(file, options);
  const prompts: string[] = [];
  let prompt = prepared.request.renderedPrompt;
  let best: { body: string; validation: ValidationResult } | undefined;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    report({ kind: "attempt", file, attempt, maxAttempts });
    prompts.push(prompt);

    let body: string;
    try {
      body = await callBackend(backend, prompt, prepared.model, options);
    } catch (err) {
      lastError = err;
      report({ kind: "backend-error", file, attempt, message: describeError(err) });
      continue;
    }

    if (!validate) {
      return finish({ testBody: body, accepted: true, attempts: attempt, fromCache: false, prompts });
    }

    const validation = await timed(metrics, "recordValidation", () => validator.validate(body, prepared.analysis));
    const score = validation.aggregateQualityScore;
    report({ kind: "validated", file, attempt, score, executed: validation.execution.succeeded });

    if (!best || score > best.validation.aggregateQualityScore) {
      best = { body, validation };
    }

    if (score >= threshold) {
      return finish({ testBody: body, accepted: true, attempts: attempt, score, validation, fromCache: false, prompts });
    }

    if (!validation.syntaxValid || !validation.execution.succeeded) {
      prompt += buildFeedback(describeValidationIssue(validation));
    }
  }

  if (!best) {
    throw new BackendError(
      `${backend.name} failed on all ${maxAttempts} attempts: ${describeError(lastError)}`,
      maxAttempts,
      { cause: lastError },
    );
  }

  return finish({
    testBody: best.body,
    accepted: false,
    attempts: maxAttempts,
    score: best.validation.aggregateQualityScore,
    validation: best.validation,
    fromCache: false,
    prompts,
  });
}

/**
 * Regenerate from the same prompt until the test file runs. Only failures that
 * stop the file from running (syntax errors, unresolved imports) trigger another
 * attempt; a file whose assertions fail is returned as final.
 */
export async function generateUntilExecutable(
  sourceFile: string,
  backend: LLMProvider,
  options: GenerateOptions & { maxRetries?: number } = {},
): Promise<ExecutableOutcome> {
  const maxAttempts = Math.max(0, options.maxRetries ?? DEFAULT_MAX_ATTEMPTS) + 1;
  const prepared = await prepare(sourceFile, backend, options);
  const file = prepared.sourcePath;
  const validator = options.validator ?? defaultValidator(file, options);
  const prompt = prepared.request.renderedPrompt;
  const prompts: string[] = [];

  let last: { body: string; execution: ExecutionResult } | undefined;
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    options.onProgress?.({ kind: "attempt", file, attempt, maxAttempts });
    prompts.push(prompt);

    let body: string;
    try {
      body = await callBackend(backend, prompt, prepared.model, options);
    } catch (err) {
      lastError = err;
      options.onProgress?.({ kind: "backend-error", file, attempt, message: describeError(err) });
      continue;
    }

    const syntax = validator.checkSyntax(body);
    const execution = await timed(options.metrics, "recordValidation", () => validator.execute(body));
    last = { body, execution };

    if (execution.succeeded) {
      return { testBody: body, executable: true, attempts: attempt, execution, prompts };
    }
    if (syntax.valid && !isRetryableFailure(combinedOutput(execution))) {
      return { testBody: body, executable: false, attempts: attempt, execution, prompts };
    }
  }

  if (!last) {
    throw new BackendError(
      `${backend.name} failed on all ${maxAttempts} attempts: ${describeError(lastError)}`,
      maxAttempts,
      { cause: lastError },
    );
  }
  return { testBody: last.body, executable: false, attempts: maxAttempts, execution: last.execution, prompts };
}

export type BatchResult = { outcome: GenerationOutcome } | { error: Error };

/**
 * One independent pipeline per file over a bounded pool. Results are keyed by
 * the file path as given; one file failing never affects the others.
 */
export async function generateBatch(
  files: string[],
  backend: LLMProvider,
  options: GenerateOptions & { concurrency?: number } = {},
): Promise<Map<string, BatchResult>> {
  const results = new Map<string, BatchResult>();
  const analyzer = options.useContext === false
    ? options.analyzer
    : options.analyzer ?? new CodebaseAnalyzer(options.projectRoot ?? process.cwd());

  const settled = await poolSettled(
    files,
    (file) => generateValidated(file, backend, { ...options, analyzer }),
    options.concurrency ?? 4,
  );

  settled.forEach((result, index) => {
    if (result.status === "fulfilled") {
      results.set(files[index], { outcome: result.value });
    } else {
      const error = result.reason instanceof Error ? result.reason : new Error(String(result.reason));
      results.set(files[index], { error });
    }
  });

  return results;
}
