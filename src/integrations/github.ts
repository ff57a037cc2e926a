import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { IssueCreationError, describeError } from "../core/errors.js";

const GITHUB_API = "https://api.github.com";
export const DEFAULT_ISSUE_LABELS = ["test-failure", "testsmith-auto"];

export interface IssueRequest {
  /** `owner/name` */
  repo: string;
  title: string;
  body: string;
  token?: string;
  labels?: string[];
  assignees?: string[];
}

function headers(token: string): Record<string, string> {
  return {
    Accept: "application/vnd.github+json",
    Authorization: `Bearer ${token}`,
    "Content-Type": "application/json",
    "X-GitHub-Api-Version": "2022-11-28",
  };
}

async function postJson(url: string, token: string, payload: unknown, what: string): Promise<string> {
  let response: Response;
  try {
    response = await fetch(url, { method: "POST", headers: headers(token), body: JSON.stringify(payload) });
  } catch (err) {
    throw new IssueCreationError(`Failed to create ${what}: ${describeError(err)}`);
  }

  if (!response.ok) {
    const detail = await response.text().catch(() => "");
    throw new IssueCreationError(
      `Failed to create ${what}: ${response.status} ${response.statusText}${detail ? ` ${detail}` : ""}`,
      response.status,
    );
  }

  const data = await response.json() as { html_url?: unknown };
  if (typeof data.html_url !== "string") {
    throw new IssueCreationError(`Failed to create ${what}: response carried no html_url`, response.status);
  }
  return data.html_url;
}

/**
 * Open an issue and return its URL.
 */
export async function createGitHubIssue(request: IssueRequest): Promise<string> {
  if (!request.token) {
    throw new IssueCreationError("GitHub token is required to create an issue (set GITHUB_TOKEN)");
  }
  if (!/^[\w.-]+\/[\w.-]+$/.test(request.repo)) {
    throw new IssueCreationError(`Invalid repository '${request.repo}'. Expected owner/name`);
  }

  return postJson(`${GITHUB_API}/repos/${request.repo}/issues`, request.token, {
    title: request.title,
    body: request.body,
    labels: request.labels ?? DEFAULT_ISSUE_LABELS,
    assignees: request.assignees ?? [],
  }, "issue");
}

/**
 * Upload one file as a gist and return its URL.
 */
export async function createGist(
  filePath: string,
  token: string | undefined,
  options: { public?: boolean; description?: string } = {},
): Promise<string> {
  if (!token) {
    throw new IssueCreationError("GitHub token is required to create a gist (set GITHUB_TOKEN)");
  }

  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new IssueCreationError(`Cannot read ${filePath}: ${describeError(err)}`);
  }

  const name = basename(filePath);
  return postJson(`${GITHUB_API}/gists`, token, {
    description: options.description ?? `Failing test: ${name}`,
    public: options.public ?? false,
    files: { [name]: { content } },
  }, "gist");
}

/**
 * Issue body for a failing run: the command output in a fenced block.
 */
export function formatFailureReport(testFile: string, output: string, gistUrl?: string): string {
  const lines = [
    `Test file \`${testFile}\` failed.`,
    "",
    "```",
    output.trim(),
    "```",
  ];
  if (gistUrl) lines.push("", `Test source: ${gistUrl}`);
  return lines.join("\n");
}
