#!/usr/bin/env node

import { resolve } from "node:path";
import { realpathSync } from "node:fs";
import { fileURLToPath, pathToFileURL } from "node:url";
import { Command } from "commander";
import { generateCommand } from "./commands/generate.js";
import { runCommand } from "./commands/run.js";
import { analyzeCommand } from "./commands/analyze.js";
import { configCommand } from "./commands/config.js";
import { cacheCommand } from "./commands/cache.js";
import { startMcpServer } from "./mcp/server.js";
import { loadEnvForCli } from "./utils/env.js";
import { errorMsg } from "./utils/display.js";

export interface CommandHandlers {
  generateCommand: typeof generateCommand;
  runCommand: typeof runCommand;
  analyzeCommand: typeof analyzeCommand;
  configCommand: typeof configCommand;
  cacheCommand: typeof cacheCommand;
  startMcpServer: typeof startMcpServer;
}

const defaultHandlers: CommandHandlers = {
  generateCommand,
  runCommand,
  analyzeCommand,
  configCommand,
  cacheCommand,
  startMcpServer,
};

function isInvokedDirectly(argv1: string | undefined): boolean {
  if (typeof argv1 !== "string") return false;

  // npm/yarn often invoke package bins through symlinks in node_modules/.bin.
  // Compare real paths so symlinked execution still triggers the CLI entrypoint.
  try {
    const invokedPath = realpathSync(argv1);
    const thisModulePath = realpathSync(fileURLToPath(import.meta.url));
    if (invokedPath === thisModulePath) return true;
  } catch {
    // Fall through to URL equality check below.
  }

  try {
    return import.meta.url === pathToFileURL(argv1).href;
  } catch {
    return false;
  }
}

function invalidPositiveInt(value: unknown): boolean {
  return value !== undefined && (typeof value !== "number" || !Number.isInteger(value) || value < 1);
}

export function createProgram(handlers: CommandHandlers = defaultHandlers): Command {
  const program = new Command();

  program
    .name("testsmith")
    .description("Generate, validate and refine unit tests for TypeScript and JavaScript modules")
    .version("0.1.0");

  program
    .command("generate <sources...>")
    .description("Generate a test file for each source file")
    .option("--provider <provider>", "LLM provider (anthropic, openai, google, ollama)")
    .option("--model <model>", "Model ID")
    .option("--temperature <t>", "Sampling temperature", parseFloat)
    .option("--max-tokens <n>", "Maximum tokens per reply", parseInt)
    .option("--stop <sequences...>", "Stop sequences")
    .option("--no-context", "Leave the project context block out of the prompt")
    .option("--no-validate", "Accept the first candidate without validation")
    .option("--quality-threshold <score>", "Score at which a candidate is accepted (0-1)", parseFloat)
    .option("--max-attempts <n>", "Generation attempts per file", parseInt)
    .option("--until-executable", "Regenerate only until the test file runs")
    .option("--prompt-file <file>", "Prompt template YAML file")
    .option("--prompt-name <name>", "Named template inside the prompt file")
    .option("-o, --output <file>", "Output path (single source only)")
    .option("--overwrite", "Replace an existing test file")
    .option("--append", "Append to an existing test file")
    .option("--run", "Run the written test files")
    .option("-q, --quiet", "Only print results")
    .option("--show-analysis", "Print the structural analysis of each source")
    .option("--show-validation", "Print validation details for each result")
    .option("--parallel <n>", "Process files in parallel (n = concurrency)", parseInt)
    .option("--no-cache", "Ignore and skip the result cache")
    .option("-p, --path <path>", "Project root path")
    .action(async (sources: string[], opts) => {
      if (invalidPositiveInt(opts.parallel)) {
        console.error(errorMsg("--parallel must be a positive integer"));
        process.exitCode = 1;
        return;
      }
      if (invalidPositiveInt(opts.maxAttempts)) {
        console.error(errorMsg("--max-attempts must be a positive integer"));
        process.exitCode = 1;
        return;
      }
      await handlers.generateCommand(sources, {
        path: opts.path,
        provider: opts.provider,
        model: opts.model,
        temperature: opts.temperature,
        maxTokens: opts.maxTokens,
        stop: opts.stop,
        noContext: opts.context === false,
        noValidate: opts.validate === false,
        qualityThreshold: opts.qualityThreshold,
        maxAttempts: opts.maxAttempts,
        untilExecutable: opts.untilExecutable,
        promptFile: opts.promptFile,
        promptName: opts.promptName,
        output: opts.output,
        overwrite: opts.overwrite,
        append: opts.append,
        run: opts.run,
        quiet: opts.quiet,
        showAnalysis: opts.showAnalysis,
        showValidation: opts.showValidation,
        parallel: opts.parallel,
        noCache: opts.cache === false,
      });
    });

  program
    .command("run <testFile>")
    .description("Run a test file with the configured runner")
    .option("--timeout <ms>", "Wall-clock budget for the run", parseInt)
    .option("--create-issue", "Open a GitHub issue when the run fails (uses GITHUB_TOKEN)")
    .option("--repo <owner/name>", "Repository for --create-issue")
    .option("--title <title>", "Issue title")
    .option("--gist", "Upload the failing test file as a gist and link it from the issue")
    .option("-p, --path <path>", "Project root path")
    .action(async (testFile: string, opts) => {
      await handlers.runCommand(testFile, {
        path: opts.path,
        timeout: opts.timeout,
        createIssue: opts.createIssue,
        repo: opts.repo,
        title: opts.title,
        gist: opts.gist,
      });
    });

  program
    .command("analyze <source>")
    .description("Show the structural analysis, related files and project test conventions")
    .option("--json", "Output machine-readable JSON")
    .option("-p, --path <path>", "Project root path")
    .action(async (source: string, opts) => {
      await handlers.analyzeCommand(source, { path: opts.path, json: opts.json });
    });

  program
    .command("config")
    .description("View or edit .testsmith.yaml")
    .option("--provider <provider>", "Set LLM provider (anthropic, openai, google, ollama)")
    .option("--model <model>", "Set model ID")
    .option("--api-key-env <var>", "Set environment variable name for API key")
    .option("--quality-threshold <score>", "Set acceptance threshold (0-1)")
    .option("--max-attempts <n>", "Set generation attempts per file")
    .option("--timeout <ms>", "Set wall-clock budget for one test run")
    .option("--runner <command...>", "Set test runner command ({file} is the test path)")
    .option("--template-file <file>", "Set prompt template YAML file")
    .option("--template-name <name>", "Set named template inside the template file")
    .option("--parallel <n>", "Set files processed concurrently")
    .option("-p, --path <path>", "Project root path")
    .action(async (opts) => {
      await handlers.configCommand({
        path: opts.path,
        provider: opts.provider,
        model: opts.model,
        apiKeyEnv: opts.apiKeyEnv,
        qualityThreshold: opts.qualityThreshold,
        maxAttempts: opts.maxAttempts,
        timeout: opts.timeout,
        runner: opts.runner,
        templateFile: opts.templateFile,
        templateName: opts.templateName,
        parallel: opts.parallel,
      });
    });

  program
    .command("cache")
    .description("Inspect or clear the generated-test cache")
    .option("--stats", "Show cache statistics (default)")
    .option("--clear [days]", "Remove entries unused for the given days (all when omitted)")
    .option("--dir <dir>", "Cache directory")
    .option("--json", "Output machine-readable JSON")
    .action(async (opts) => {
      await handlers.cacheCommand({ stats: opts.stats, clear: opts.clear, dir: opts.dir, json: opts.json });
    });

  program
    .command("serve")
    .description("Start MCP server for LLM tool integration (stdio transport)")
    .option("-p, --path <path>", "Project root path")
    .action(async (opts) => {
      const rootPath = resolve(opts.path ?? ".");
      await handlers.startMcpServer(rootPath);
    });

  return program;
}

export async function runCli(
  argv: string[] = process.argv,
  handlers: CommandHandlers = defaultHandlers,
): Promise<void> {
  await loadEnvForCli(argv);
  const program = createProgram(handlers);
  await program.parseAsync(argv);
}

const invokedDirectly = isInvokedDirectly(process.argv[1]);

if (invokedDirectly) {
  runCli().catch((err) => {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(msg);
    process.exit(1);
  });
}
