import { randomUUID } from "node:crypto";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type ts from "typescript";
import { parseSource } from "../analyzer/source.js";
import type { SourceAnalysis } from "../analyzer/types.js";
import { describeError } from "../core/errors.js";
import { DEFAULT_RUN_TIMEOUT_MS } from "../core/schema.js";
import { estimateCoverage, NO_COVERAGE, type CoverageEstimate } from "./coverage.js";
import { CommandTestRunner, type ExecutionResult, type TestRunner } from "./runner.js";

export const SCORE_WEIGHTS = {
  syntax: 0.3,
  execution: 0.4,
  coverage: 0.3,
} as const;

export interface ValidationResult {
  readonly syntaxValid: boolean;
  readonly syntaxError?: string;
  readonly execution: ExecutionResult;
  readonly coverage: CoverageEstimate;
  /** 0.3·syntax + 0.4·execution + 0.3·coverage, in [0, 1] */
  readonly aggregateQualityScore: number;
}

export function computeQualityScore(syntaxValid: boolean, executionSucceeded: boolean, coverageScore: number): number {
  return (syntaxValid ? SCORE_WEIGHTS.syntax : 0)
    + (executionSucceeded ? SCORE_WEIGHTS.execution : 0)
    + SCORE_WEIGHTS.coverage * coverageScore;
}

export interface ValidatorOptions {
  runner?: TestRunner;
  timeoutMs?: number;
  /**
   * Directory the candidate file is written into. Defaults to a fresh temporary
   * directory; pass the source directory so relative imports resolve.
   */
  workDir?: string;
  /** Working directory for the runner (default: the directory holding the candidate) */
  cwd?: string;
  /** Candidate file name is `<stem>.<random><extension>` */
  candidateStem?: string;
  candidateExtension?: string;
}

interface SyntaxCheck {
  valid: boolean;
  error?: string;
  sourceFile?: ts.SourceFile;
}

/**
 * Scores a candidate test body: does it parse, does it run, and how many of the
 * target's declared functions does it call. Never throws for candidate content.
 */
export class QualityValidator {
  readonly runner: TestRunner;
  readonly timeoutMs: number;
  private workDir?: string;
  private cwd?: string;
  private candidateStem: string;
  private candidateExtension: string;

  constructor(options: ValidatorOptions = {}) {
    this.runner = options.runner ?? new CommandTestRunner();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RUN_TIMEOUT_MS;
    this.workDir = options.workDir;
    this.cwd = options.cwd;
    this.candidateStem = options.candidateStem ?? "candidate";
    this.candidateExtension = options.candidateExtension ?? ".test.ts";
  }

  checkSyntax(candidate: string): SyntaxCheck {
    try {
      const { sourceFile, error } = parseSource(candidate, `${this.candidateStem}${this.candidateExtension}`);
      return error ? { valid: false, error, sourceFile } : { valid: true, sourceFile };
    } catch (err) {
      return { valid: false, error: describeError(err) };
    }
  }

  /**
   * Write the candidate to a uniquely named file, run it under the timeout, and
   * remove it again on every exit path.
   */
  async execute(candidate: string): Promise<ExecutionResult> {
    const fileName = `${this.candidateStem}.${randomUUID().slice(0, 8)}${this.candidateExtension}`;
    let tempDir: string | undefined;
    let filePath: string | undefined;

    try {
      if (!this.workDir) tempDir = await mkdtemp(join(tmpdir(), "testsmith-"));
      const dir = this.workDir ?? tempDir ?? tmpdir();
      filePath = join(dir, fileName);
      await writeFile(filePath, candidate, "utf-8");
      return await this.runner.run(filePath, { timeoutMs: this.timeoutMs, cwd: this.cwd ?? dir });
    } catch (err) {
      return {
        succeeded: false,
        timedOut: false,
        standardOutput: "",
        standardError: describeError(err),
        exitStatus: -1,
      };
    } finally {
      const leftover = tempDir ?? filePath;
      if (leftover) {
        await rm(leftover, { recursive: true, force: true }).catch((err) => {
          console.warn(`Warning: could not remove ${leftover}: ${describeError(err)}`);
        });
      }
    }
  }

  async validate(candidate: string, target: SourceAnalysis): Promise<ValidationResult> {
    const syntax = this.checkSyntax(candidate);
    const execution = await this.execute(candidate);
    const coverage = syntax.valid && syntax.sourceFile
      ? estimateCoverage(syntax.sourceFile, target)
      : { ...NO_COVERAGE, functionsReferenced: [] };

    const result: ValidationResult = {
      syntaxValid: syntax.valid,
      execution,
      coverage,
      aggregateQualityScore: computeQualityScore(syntax.valid, execution.succeeded, coverage.score),
    };
    return Object.freeze(syntax.error ? { ...result, syntaxError: syntax.error } : result);
  }
}

/**
 * One-line summary of why a candidate fell short, for retry feedback.
 */
export function describeValidationIssue(result: ValidationResult): string {
  if (!result.syntaxValid) return `Syntax error: ${result.syntaxError ?? "could not parse test code"}`;

  const { execution } = result;
  const stderr = execution.standardError.trim();
  if (stderr) return stderr;
  const stdout = execution.standardOutput.trim();
  if (stdout) return stdout.slice(-2000);
  return `Tests failed with exit status ${execution.exitStatus}`;
}
