import { mkdtemp, rm, mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { tmpdir } from "node:os";
import type { GenerationOptions, LLMProvider } from "../src/providers/index.js";
import type { ExecutionResult, RunOptions, TestRunner } from "../src/validator/runner.js";

export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "testsmith-test-"));
}

export async function cleanupTmpDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function createFile(dirPath: string, name: string, content = ""): Promise<void> {
  await writeFile(join(dirPath, name), content);
}

export async function createNestedFile(basePath: string, relativePath: string, content = ""): Promise<void> {
  const fullPath = join(basePath, relativePath);
  await mkdir(dirname(fullPath), { recursive: true });
  await writeFile(fullPath, content);
}

export interface BackendCall {
  prompt: string;
  model: string;
  options?: GenerationOptions;
}

/**
 * Backend returning the scripted replies in order. An Error entry is thrown
 * instead of returned; the last entry repeats once the script runs out.
 */
export class StubBackend implements LLMProvider {
  readonly name = "stub";
  readonly defaultModel = "stub-model";
  readonly calls: BackendCall[] = [];

  constructor(private replies: Array<string | Error>, readonly supportedModels?: readonly string[]) {}

  async generateText(prompt: string, model: string, options?: GenerationOptions): Promise<string> {
    this.calls.push({ prompt, model, options });
    const reply = this.replies[Math.min(this.calls.length - 1, this.replies.length - 1)];
    if (reply instanceof Error) throw reply;
    return reply;
  }
}

export function passed(overrides: Partial<ExecutionResult> = {}): ExecutionResult {
  return { succeeded: true, timedOut: false, standardOutput: "1 passed", standardError: "", exitStatus: 0, ...overrides };
}

export function failed(standardError: string, overrides: Partial<ExecutionResult> = {}): ExecutionResult {
  return { succeeded: false, timedOut: false, standardOutput: "", standardError, exitStatus: 1, ...overrides };
}

/**
 * Runner that decides the outcome from the written file's content.
 */
export class StubRunner implements TestRunner {
  readonly runs: Array<{ file: string; content: string; options: RunOptions }> = [];

  constructor(private decide: (content: string) => ExecutionResult = () => passed()) {}

  async run(testFile: string, options: RunOptions): Promise<ExecutionResult> {
    const content = await readFile(testFile, "utf-8");
    this.runs.push({ file: testFile, content, options });
    return this.decide(content);
  }
}
