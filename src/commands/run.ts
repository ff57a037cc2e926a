import { basename, resolve } from "node:path";
import { describeError } from "../core/errors.js";
import { createGist, createGitHubIssue, formatFailureReport } from "../integrations/github.js";
import { loadConfig } from "../utils/config.js";
import { errorMsg, successMsg, warnMsg } from "../utils/display.js";
import { combinedOutput, runTestFile } from "../validator/runner.js";

export interface RunCommandOptions {
  path?: string;
  timeout?: number;
  createIssue?: boolean;
  repo?: string;
  title?: string;
  gist?: boolean;
}

/**
 * Run an existing test file with the configured runner, optionally filing an
 * issue when it fails.
 */
export async function runCommand(testFile: string, options: RunCommandOptions): Promise<void> {
  const rootPath = resolve(options.path ?? ".");
  const config = await loadConfig(rootPath);
  const target = resolve(testFile);

  if (options.createIssue && !options.repo) {
    console.log(errorMsg("--create-issue requires --repo owner/name"));
    process.exitCode = 1;
    return;
  }

  const result = await runTestFile(target, {
    command: config?.runner,
    timeoutMs: options.timeout ?? config?.timeout_ms,
    cwd: rootPath,
  });
  const output = combinedOutput(result).trim();
  if (output) console.log(output);

  if (result.succeeded) {
    console.log(successMsg(`Tests passed: ${testFile}`));
    return;
  }

  process.exitCode = 1;
  console.log(errorMsg(result.timedOut ? `Tests timed out: ${testFile}` : `Tests failed (exit status ${result.exitStatus}): ${testFile}`));

  if (!options.createIssue || !options.repo) return;

  const token = process.env.GITHUB_TOKEN;
  try {
    let gistUrl: string | undefined;
    if (options.gist) {
      gistUrl = await createGist(target, token);
      console.log(successMsg(`Gist created: ${gistUrl}`));
    }
    const url = await createGitHubIssue({
      repo: options.repo,
      title: options.title ?? `Failing tests in ${basename(target)}`,
      body: formatFailureReport(testFile, output, gistUrl),
      token,
    });
    console.log(successMsg(`Issue created: ${url}`));
  } catch (err) {
    console.log(warnMsg(`Could not create issue: ${describeError(err)}`));
  }
}
