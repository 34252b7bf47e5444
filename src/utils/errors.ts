/**
 * Errors that are allowed to leave a screen run. Per-symbol lookup failures
 * never reach these; they are folded into empty records or `false`.
 */

export class SourceUnavailableError extends Error {
  url: string;
  status?: number;

  constructor(opts: { message: string; url: string; status?: number }) {
    super(opts.message);
    this.name = 'SourceUnavailableError';
    this.url = opts.url;
    this.status = opts.status;
  }
}

export class OutputWriteError extends Error {
  path: string;

  constructor(opts: { message: string; path: string }) {
    super(opts.message);
    this.name = 'OutputWriteError';
    this.path = opts.path;
  }
}

export class ApiRequestError extends Error {
  url: string;
  status?: number;
  statusText?: string;
  bodySnippet?: string;

  constructor(opts: { message: string; url: string; status?: number; statusText?: string; bodySnippet?: string }) {
    super(opts.message);
    this.name = 'ApiRequestError';
    this.url = opts.url;
    this.status = opts.status;
    this.statusText = opts.statusText;
    this.bodySnippet = opts.bodySnippet;
  }
}

export class ScreenArgsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScreenArgsError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
