export type PreviewErrorKind = "fetch" | "parse";

export class PreviewError extends Error {
  readonly kind: PreviewErrorKind;

  constructor(kind: PreviewErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/** Network, timeout, redirect or decoding failure while retrieving a page. */
export class FetchError extends PreviewError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("fetch", message, options);
  }
}

/** The retrieved text could not be interpreted as a document. */
export class ParseError extends PreviewError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("parse", message, options);
  }
}

// Cached failures and 500 bodies carry only this text.
export function errorText(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === "string" && err) return err;
  return "unknown error";
}
