import { relative, resolve } from "node:path";
import { CodebaseAnalyzer } from "../analyzer/codebase.js";
import { FileResultCache } from "../core/cache.js";
import { describeError } from "../core/errors.js";
import { GenerationMetrics } from "../core/metrics.js";
import { DEFAULT_MAX_ATTEMPTS, DEFAULT_QUALITY_THRESHOLD, DEFAULT_RUNNER_COMMAND, type ConfigFile } from "../core/schema.js";
import { defaultTestPath, writeTestFile, type WriteMode } from "../core/writer.js";
import {
  generateBatch,
  generateUntilExecutable,
  type GenerateOptions,
  type GenerationOutcome,
  type ProgressEvent,
} from "../generator/orchestrator.js";
import { loadPromptTemplate } from "../generator/templates.js";
import { createProvider, resolveModel, type LLMProvider } from "../providers/index.js";
import { loadConfig, resolveApiKey } from "../utils/config.js";
import { dim, errorMsg, heading, scoreBar, successMsg, warnMsg } from "../utils/display.js";
import { combinedOutput, CommandTestRunner, runTestFile } from "../validator/runner.js";
import { formatAnalysis } from "./analyze.js";

export interface GenerateCommandOptions {
  path?: string;
  provider?: string;
  model?: string;
  temperature?: number;
  maxTokens?: number;
  stop?: string[];
  noContext?: boolean;
  noValidate?: boolean;
  qualityThreshold?: number;
  maxAttempts?: number;
  untilExecutable?: boolean;
  promptFile?: string;
  promptName?: string;
  output?: string;
  overwrite?: boolean;
  append?: boolean;
  run?: boolean;
  quiet?: boolean;
  showAnalysis?: boolean;
  showValidation?: boolean;
  parallel?: number;
  noCache?: boolean;
}

function writeModeOf(options: GenerateCommandOptions): WriteMode {
  if (options.overwrite) return "overwrite";
  if (options.append) return "append";
  return "create";
}

function progressPrinter(rootPath: string): (event: ProgressEvent) => void {
  return (event) => {
    const file = relative(rootPath, event.file);
    switch (event.kind) {
      case "cache-hit":
        console.log(dim(`  ${file}: cached result`));
        break;
      case "attempt":
        console.log(dim(`  ${file}: attempt ${event.attempt}/${event.maxAttempts}`));
        break;
      case "backend-error":
        console.log(warnMsg(`${file}: backend failed on attempt ${event.attempt}: ${event.message}`));
        break;
      case "validated":
        console.log(dim(`  ${file}: score ${event.score.toFixed(2)}${event.executed ? "" : " (tests did not pass)"}`));
        break;
    }
  };
}

function printValidation(outcome: GenerationOutcome): void {
  const validation = outcome.validation;
  if (!validation) {
    console.log(dim("    validation: none"));
    return;
  }
  console.log(dim(`    syntax: ${validation.syntaxValid ? "ok" : validation.syntaxError ?? "invalid"}`));
  const execution = validation.execution;
  const runState = execution.timedOut ? "timed out" : execution.succeeded ? "passed" : `failed (exit ${execution.exitStatus})`;
  console.log(dim(`    execution: ${runState}`));
  const referenced = validation.coverage.functionsReferenced;
  console.log(dim(`    coverage: ${validation.coverage.score.toFixed(2)} (${referenced.join(", ") || "no functions referenced"})`));
}

async function runWritten(testFile: string, config: ConfigFile | null, rootPath: string): Promise<void> {
  const result = await runTestFile(testFile, {
    command: config?.runner,
    timeoutMs: config?.timeout_ms,
    cwd: rootPath,
  });
  const output = combinedOutput(result).trim();
  if (output) console.log(output);
  if (result.succeeded) {
    console.log(successMsg(`Tests passed: ${testFile}`));
  } else {
    console.log(errorMsg(`Tests failed: ${testFile}`));
    process.exitCode = 1;
  }
}

export async function generateCommand(
  sources: string[],
  options: GenerateCommandOptions,
): Promise<void> {
  const rootPath = resolve(options.path ?? ".");
  const config = await loadConfig(rootPath);

  if (options.overwrite && options.append) {
    console.log(errorMsg("--overwrite and --append cannot be used together"));
    process.exitCode = 1;
    return;
  }
  if (options.output && sources.length > 1) {
    console.log(errorMsg("--output can only be used with a single source file"));
    process.exitCode = 1;
    return;
  }

  const providerName = options.provider ?? config?.provider;
  if (!providerName) {
    console.log(errorMsg("No provider configured. Use --provider or run `testsmith config --provider <name>`"));
    process.exitCode = 1;
    return;
  }

  let backend: LLMProvider;
  let template: string;
  try {
    const apiKeyEnv = config && providerName === config.provider ? config.api_key_env : undefined;
    backend = await createProvider(providerName, resolveApiKey(providerName, apiKeyEnv));
    resolveModel(backend, options.model ?? config?.model);
    template = await loadPromptTemplate({
      templateFile: options.promptFile ?? config?.template_file,
      templateName: options.promptName ?? config?.template_name,
    });
  } catch (err) {
    console.log(errorMsg(describeError(err)));
    process.exitCode = 1;
    return;
  }

  const threshold = options.qualityThreshold ?? config?.quality_threshold ?? DEFAULT_QUALITY_THRESHOLD;
  const metrics = new GenerationMetrics();
  const analyzer = new CodebaseAnalyzer(rootPath);
  const useCache = !options.noCache && config?.cache !== false;

  const generateOptions: GenerateOptions = {
    model: options.model ?? config?.model,
    generation: {
      temperature: options.temperature ?? config?.temperature,
      maxTokens: options.maxTokens ?? config?.max_tokens,
      stopSequences: options.stop,
    },
    maxAttempts: options.maxAttempts ?? config?.max_attempts,
    qualityThreshold: threshold,
    validate: !options.noValidate,
    useContext: !options.noContext,
    template,
    backendTimeoutMs: config?.backend_timeout_ms,
    projectRoot: rootPath,
    runTimeoutMs: config?.timeout_ms,
    runner: new CommandTestRunner(config?.runner ?? DEFAULT_RUNNER_COMMAND),
    analyzer,
    cache: useCache ? new FileResultCache() : undefined,
    metrics,
    onProgress: options.quiet ? undefined : progressPrinter(rootPath),
  };

  const mode = writeModeOf(options);
  const files = sources.map((source) => resolve(source));

  if (!options.quiet) {
    console.log(heading(`\nGenerating tests for ${files.length} file${files.length === 1 ? "" : "s"} with ${backend.name}\n`));
  }

  if (options.showAnalysis) {
    for (const file of files) {
      console.log(heading(`  ${relative(rootPath, file)}`));
      const analysis = await analyzer.analyzeFile(file).catch(() => null);
      for (const line of analysis ? formatAnalysis(analysis) : [warnMsg("unreadable")]) console.log(line);
    }
  }

  const written: string[] = [];

  if (options.untilExecutable) {
    for (const file of files) {
      const rel = relative(rootPath, file);
      try {
        // --max-attempts counts generations in this mode too
        const maxRetries = (generateOptions.maxAttempts ?? DEFAULT_MAX_ATTEMPTS) - 1;
        const outcome = await generateUntilExecutable(file, backend, { ...generateOptions, maxRetries });
        const outputPath = options.output ? resolve(options.output) : defaultTestPath(file);
        await writeTestFile(outputPath, outcome.testBody, mode);
        written.push(outputPath);
        const message = `${rel} → ${relative(rootPath, outputPath)} after ${outcome.attempts} attempt(s)`;
        console.log(outcome.executable ? successMsg(message) : warnMsg(`${message} (still failing)`));
      } catch (err) {
        console.log(errorMsg(`${rel}: ${describeError(err)}`));
        process.exitCode = 1;
      }
    }
  } else {
    const results = await generateBatch(files, backend, {
      ...generateOptions,
      concurrency: options.parallel ?? config?.parallel ?? 1,
    });

    for (const file of files) {
      const rel = relative(rootPath, file);
      const result = results.get(file);
      if (!result) continue;
      if ("error" in result) {
        console.log(errorMsg(`${rel}: ${result.error.message}`));
        process.exitCode = 1;
        continue;
      }

      const { outcome } = result;
      const outputPath = options.output ? resolve(options.output) : defaultTestPath(file);
      try {
        await writeTestFile(outputPath, outcome.testBody, mode);
      } catch (err) {
        console.log(errorMsg(describeError(err)));
        process.exitCode = 1;
        continue;
      }
      written.push(outputPath);

      const target = relative(rootPath, outputPath);
      const score = outcome.score === undefined ? dim("not validated") : scoreBar(outcome.score, threshold);
      const source = outcome.fromCache ? dim(" (cached)") : "";
      if (outcome.accepted) {
        console.log(successMsg(`${rel} → ${target} ${score}${source}`));
      } else {
        console.log(warnMsg(`${rel} → ${target} ${score} below threshold ${threshold}, kept best of ${outcome.attempts} attempts`));
      }
      if (options.showValidation) printValidation(outcome);
    }
  }

  if (options.run) {
    for (const testFile of written) {
      await runWritten(testFile, config, rootPath);
    }
  }

  if (!options.quiet && metrics.totalRequests + metrics.cacheHits > 0) {
    const report = metrics.report();
    console.log(dim(`\n  ${report.totalRequests} backend call(s), avg ${(report.averageGenerationMs / 1000).toFixed(1)}s`
      + `, cache hit rate ${(report.cacheHitRate * 100).toFixed(0)}%`));
    for (const tip of metrics.recommendations()) console.log(dim(`  ${tip}`));
  }
}
