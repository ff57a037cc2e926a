/**
 * Raised when a prompt template cannot be resolved: the file is unreadable,
 * the named entry is missing, or the template does not carry exactly one
 * source placeholder.
 */
export class TemplateError extends Error {
  constructor(message: string, public templateFile?: string) {
    super(message);
    this.name = "TemplateError";
  }
}

/**
 * Raised once the generation backend has failed on every attempt.
 * Validation failures never produce this error; they are retried internally.
 */
export class BackendError extends Error {
  constructor(message: string, public attempts: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BackendError";
  }
}

export class UnsupportedModelError extends Error {
  constructor(public provider: string, public model: string, public supported: string[]) {
    super(`Model '${model}' not supported by provider ${provider}. Supported models: ${supported.join(", ")}`);
    this.name = "UnsupportedModelError";
  }
}

export class ProviderConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProviderConfigError";
  }
}

/**
 * Raised by the GitHub integration. Surfaced verbatim to the caller, never retried.
 */
export class IssueCreationError extends Error {
  constructor(message: string, public status?: number) {
    super(message);
    this.name = "IssueCreationError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
