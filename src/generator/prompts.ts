import { languageOf } from "../analyzer/source.js";
import type { ProjectConventions, SourceAnalysis } from "../analyzer/types.js";
import { renderTemplate } from "./templates.js";

export const NO_CONTEXT_LINE = "No additional context available.";
const MAX_FEEDBACK_CHARS = 2000;

export interface GenerationRequest {
  /** Final text sent to the backend */
  renderedPrompt: string;
  /** Source text as embedded in the prompt */
  sourceExcerpt: string;
  /** True only when `maxSourceChars` cut the excerpt; the excerpt then says so */
  truncated: boolean;
}

export interface ComposeInput {
  sourceText: string;
  template: string;
  analysis?: SourceAnalysis;
  conventions?: ProjectConventions;
  /** Relative import path of the module under test, e.g. "./math" */
  modulePath?: string;
  /** File name the generated tests are written to, e.g. "math.test.js" */
  testFileName?: string;
  maxSourceChars?: number;
}

function unique(values: Iterable<string>): string[] {
  return [...new Set(values)];
}

function specialRequirements(analysis: SourceAnalysis): string[] {
  const requirements: string[] = [];
  if (analysis.signals.hasAsyncFunctions) requirements.push("async functions present (use async tests)");
  if (analysis.signals.raisesExceptions) requirements.push("code throws errors (assert error paths)");
  if (analysis.signals.usesDecorators) requirements.push("decorators in use");
  return requirements;
}

/**
 * Context lines in fixed order; a line is present only when it has data.
 */
export function buildContextLines(
  analysis?: SourceAnalysis,
  conventions?: ProjectConventions,
  modulePath?: string,
  testFileName?: string,
): string[] {
  const lines: string[] = [];

  if (analysis && analysis.functions.length > 0) {
    lines.push(`Functions to test: ${unique(analysis.functions.map((f) => f.name)).join(", ")}`);
  }
  if (analysis && analysis.classes.length > 0) {
    lines.push(`Classes to test: ${unique(analysis.classes.map((c) => c.name)).join(", ")}`);
  }
  if (analysis && analysis.dependencies.length > 0) {
    lines.push(`Key dependencies: ${analysis.dependencies.slice(0, 5).join(", ")}`);
  }
  if (conventions && conventions.commonTestImports.length > 0) {
    lines.push(`Project uses: ${conventions.commonTestImports.join(", ")}`);
  }
  if (conventions && conventions.assertionStyles.length > 0) {
    lines.push(`Assertion style: ${conventions.assertionStyles.join(", ")}`);
  }
  if (analysis) {
    const requirements = specialRequirements(analysis);
    if (requirements.length > 0) lines.push(`Special requirements: ${requirements.join("; ")}`);
  }
  if (modulePath) {
    lines.push(`Module under test: ${modulePath}`);
  }
  if (testFileName) {
    lines.push(`Language: ${languageOf(testFileName)}`);
    lines.push(`Test file: ${testFileName}`);
  }

  return lines;
}

export function buildContextBlock(lines: string[]): string {
  const body = lines.length > 0 ? lines.join("\n") : NO_CONTEXT_LINE;
  return `Project Context:\n${body}`;
}

function excerptOf(sourceText: string, maxSourceChars?: number): { excerpt: string; truncated: boolean } {
  if (maxSourceChars === undefined || sourceText.length <= maxSourceChars) {
    return { excerpt: sourceText, truncated: false };
  }
  const shown = sourceText.slice(0, maxSourceChars);
  return {
    excerpt: `${shown}\n... (truncated: showing ${maxSourceChars} of ${sourceText.length} characters)`,
    truncated: true,
  };
}

/**
 * Compose the generation request. With an analysis or conventions supplied the
 * Project Context block follows the source inside the same substitution.
 */
export function composePrompt(input: ComposeInput): GenerationRequest {
  const { excerpt, truncated } = excerptOf(input.sourceText, input.maxSourceChars);
  const contextAware = input.analysis !== undefined || input.conventions !== undefined;

  const insertion = contextAware
    ? `${excerpt}\n\n${buildContextBlock(buildContextLines(input.analysis, input.conventions, input.modulePath, input.testFileName))}`
    : excerpt;

  return {
    renderedPrompt: renderTemplate(input.template, insertion),
    sourceExcerpt: excerpt,
    truncated,
  };
}

/**
 * Feedback suffix appended to the prompt after a failed attempt.
 */
export function buildFeedback(issue: string): string {
  const trimmed = issue.trim() || "Syntax error";
  const summary = trimmed.length > MAX_FEEDBACK_CHARS
    ? `${trimmed.slice(0, MAX_FEEDBACK_CHARS)}\n... (truncated)`
    : trimmed;
  return `\n\nPrevious attempt had issues: ${summary}\nPlease fix these issues in the next generation.`;
}
