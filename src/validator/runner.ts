import { spawn, type ChildProcess } from "node:child_process";
import { DEFAULT_RUNNER_COMMAND, DEFAULT_RUN_TIMEOUT_MS } from "../core/schema.js";

export const FILE_PLACEHOLDER = "{file}";
export const MAX_OUTPUT_CHARS = 512_000;

export interface ExecutionResult {
  succeeded: boolean;
  /** True when the run was killed for exceeding its wall-clock budget */
  timedOut: boolean;
  standardOutput: string;
  standardError: string;
  /** Process exit code; -1 when the process never exited on its own */
  exitStatus: number;
}

export interface RunOptions {
  timeoutMs: number;
  cwd?: string;
}

/**
 * External test runner. Pass/fail is read from the exit status.
 */
export interface TestRunner {
  run(testFile: string, options: RunOptions): Promise<ExecutionResult>;
}

export function combinedOutput(result: ExecutionResult): string {
  return [result.standardOutput, result.standardError].filter(Boolean).join("\n");
}

export function timeoutMessage(timeoutMs: number): string {
  return `Test execution timed out after ${timeoutMs}ms`;
}

function appendCapped(current: string, chunk: Buffer): string {
  if (current.length >= MAX_OUTPUT_CHARS) return current;
  return (current + chunk.toString("utf-8")).slice(0, MAX_OUTPUT_CHARS);
}

function killProcessTree(child: ChildProcess): void {
  if (child.pid === undefined) return;
  try {
    // Negative pid targets the process group, so workers the runner forked die too
    if (process.platform !== "win32") process.kill(-child.pid, "SIGKILL");
    else child.kill("SIGKILL");
  } catch {
    child.kill("SIGKILL");
  }
}

/**
 * Runs a configured command against a test file. `{file}` in the command is
 * replaced with the file path; without it the path is appended.
 */
export class CommandTestRunner implements TestRunner {
  readonly command: string[];

  constructor(command: string[] = DEFAULT_RUNNER_COMMAND) {
    if (command.length === 0) {
      throw new Error("Test runner command must not be empty");
    }
    this.command = command;
  }

  buildArgs(testFile: string): string[] {
    const hasPlaceholder = this.command.some((part) => part.includes(FILE_PLACEHOLDER));
    const args = this.command.map((part) => part.split(FILE_PLACEHOLDER).join(testFile));
    return hasPlaceholder ? args : [...args, testFile];
  }

  run(testFile: string, options: RunOptions): Promise<ExecutionResult> {
    const [bin, ...args] = this.buildArgs(testFile);

    return new Promise((resolve) => {
      let stdout = "";
      let stderr = "";
      let timedOut = false;
      let settled = false;

      const finish = (result: ExecutionResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(result);
      };

      const child = spawn(bin, args, {
        cwd: options.cwd,
        env: process.env,
        stdio: ["ignore", "pipe", "pipe"],
        detached: process.platform !== "win32",
        shell: process.platform === "win32",
      });

      const timer = setTimeout(() => {
        timedOut = true;
        killProcessTree(child);
      }, options.timeoutMs);

      child.stdout?.on("data", (chunk: Buffer) => {
        stdout = appendCapped(stdout, chunk);
      });
      child.stderr?.on("data", (chunk: Buffer) => {
        stderr = appendCapped(stderr, chunk);
      });

      child.on("error", (err) => {
        finish({
          succeeded: false,
          timedOut: false,
          standardOutput: stdout,
          standardError: err.message,
          exitStatus: -1,
        });
      });

      child.on("close", (code) => {
        if (timedOut) {
          finish({
            succeeded: false,
            timedOut: true,
            standardOutput: stdout,
            standardError: timeoutMessage(options.timeoutMs),
            exitStatus: -1,
          });
          return;
        }
        const exitStatus = code ?? -1;
        finish({
          succeeded: exitStatus === 0,
          timedOut: false,
          standardOutput: stdout,
          standardError: stderr,
          exitStatus,
        });
      });
    });
  }
}

/**
 * Run an existing test file once, e.g. for the `run` command.
 */
export async function runTestFile(
  testFile: string,
  options: { command?: string[]; timeoutMs?: number; cwd?: string } = {},
): Promise<ExecutionResult> {
  const runner = new CommandTestRunner(options.command ?? DEFAULT_RUNNER_COMMAND);
  return runner.run(testFile, {
    timeoutMs: options.timeoutMs ?? DEFAULT_RUN_TIMEOUT_MS,
    cwd: options.cwd,
  });
}
