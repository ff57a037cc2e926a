import { resolve, relative, isAbsolute, extname, basename, dirname } from "node:path";
import { z } from "zod";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CodebaseAnalyzer } from "../analyzer/codebase.js";
import type { ProjectConventions, SourceAnalysis } from "../analyzer/types.js";
import { describeError } from "../core/errors.js";
import { DEFAULT_RUNNER_COMMAND } from "../core/schema.js";
import { loadConfig } from "../utils/config.js";
import { CommandTestRunner, type TestRunner } from "../validator/runner.js";
import { QualityValidator, type ValidationResult } from "../validator/validator.js";

/**
 * Resolve a file path against root and reject anything outside it.
 * Returns null if path traversal is detected.
 */
function resolveInsideRoot(root: string, target: string): string | null {
  const rootResolved = resolve(root);
  const resolved = resolve(rootResolved, target.replace(/\\/g, "/"));
  const rel = relative(rootResolved, resolved);
  if (rel === "" || rel.startsWith("..") || isAbsolute(rel)) return null;
  return resolved;
}

// --- Handler interfaces ---

export interface AnalyzeSourceInput {
  file: string;
  path?: string;
}

export interface AnalyzeSourceResult {
  file: string;
  analysis?: SourceAnalysis;
  related_files?: string[];
  error?: string;
}

export interface DetectConventionsInput {
  path?: string;
}

export interface DetectConventionsResult {
  root: string;
  conventions: ProjectConventions;
}

export interface ValidateTestsInput {
  file: string;
  test_code: string;
  path?: string;
}

export interface ValidateTestsResult {
  file: string;
  validation?: ValidationResult;
  error?: string;
}

// --- Handlers ---

export async function handleAnalyzeSource(
  input: AnalyzeSourceInput,
  defaultRoot: string,
): Promise<AnalyzeSourceResult> {
  const rootPath = resolve(input.path ?? defaultRoot);
  const target = resolveInsideRoot(rootPath, input.file);
  if (!target) {
    return { file: input.file, error: "Invalid file: path traversal detected" };
  }

  try {
    const context = await new CodebaseAnalyzer(rootPath).getProjectContext(target);
    return {
      file: input.file,
      analysis: context.targetAnalysis,
      related_files: context.relatedFiles.map((f) => relative(rootPath, f)),
    };
  } catch (err) {
    return { file: input.file, error: `Failed to read "${input.file}": ${describeError(err)}` };
  }
}

export async function handleDetectConventions(
  input: DetectConventionsInput,
  defaultRoot: string,
): Promise<DetectConventionsResult> {
  const rootPath = resolve(input.path ?? defaultRoot);
  return { root: rootPath, conventions: await new CodebaseAnalyzer(rootPath).getConventions() };
}

export async function handleValidateTests(
  input: ValidateTestsInput,
  defaultRoot: string,
  runner?: TestRunner,
): Promise<ValidateTestsResult> {
  const rootPath = resolve(input.path ?? defaultRoot);
  const target = resolveInsideRoot(rootPath, input.file);
  if (!target) {
    return { file: input.file, error: "Invalid file: path traversal detected" };
  }

  let analysis: SourceAnalysis;
  try {
    analysis = await new CodebaseAnalyzer(rootPath).analyzeFile(target);
  } catch (err) {
    return { file: input.file, error: `Failed to read "${input.file}": ${describeError(err)}` };
  }

  const config = await loadConfig(rootPath);
  const ext = extname(target);
  const validator = new QualityValidator({
    runner: runner ?? new CommandTestRunner(config?.runner ?? DEFAULT_RUNNER_COMMAND),
    timeoutMs: config?.timeout_ms,
    workDir: dirname(target),
    cwd: rootPath,
    candidateStem: basename(target, ext),
    candidateExtension: `.test${ext}`,
  });
  return { file: input.file, validation: await validator.validate(input.test_code, analysis) };
}

// --- MCP tool registration ---

/**
 * `runner` serves `validate_tests` calls against the default root; a call with
 * a root override uses that root's configured runner instead.
 */
export function registerTools(server: McpServer, defaultRoot: string, runner?: TestRunner): void {
  server.registerTool(
    "analyze_source",
    {
      title: "Analyze Source",
      description:
        "Structural analysis of a TypeScript or JavaScript file: functions, classes, " +
        "imports, dependencies and signals such as async code or thrown errors. " +
        "Also lists sibling sources and existing test files.",
      inputSchema: {
        file: z.string().describe('Path relative to the project root, e.g. "src/math.ts"'),
        path: z.string().optional().describe(
          "Project root path override. Defaults to the server's configured root.",
        ),
      },
    },
    async (input) => {
      const result = await handleAnalyzeSource(input, defaultRoot);
      return {
        content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
        isError: !!result.error,
      };
    },
  );

  server.registerTool(
    "detect_conventions",
    {
      title: "Detect Conventions",
      description:
        "Scan existing test files for the frameworks, mocking libraries, fixtures " +
        "and assertion styles the project already uses.",
      inputSchema: {
        path: z.string().optional().describe(
          "Project root path override. Defaults to the server's configured root.",
        ),
      },
    },
    async (input) => {
      const result = await handleDetectConventions(input, defaultRoot);
      return {
        content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
      };
    },
  );

  server.registerTool(
    "validate_tests",
    {
      title: "Validate Tests",
      description:
        "Score candidate test code for a source file: syntax check, a run under the " +
        "configured test runner, and how many of the file's functions it calls.",
      inputSchema: {
        file: z.string().describe("Source file under test, relative to the project root"),
        test_code: z.string().describe("Full text of the candidate test file"),
        path: z.string().optional().describe(
          "Project root path override. Defaults to the server's configured root.",
        ),
      },
    },
    async (input) => {
      const result = await handleValidateTests(input, defaultRoot, input.path ? undefined : runner);
      return {
        content: [{ type: "text" as const, text: JSON.stringify(result, null, 2) }],
        isError: !!result.error,
      };
    },
  );
}
