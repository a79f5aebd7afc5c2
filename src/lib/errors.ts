// src/lib/errors.ts
import { ZodError } from "zod";

export type IndentErrorKind = "config" | "store" | "validation" | "render";

const STATUS: Record<IndentErrorKind, number> = {
  config: 500,
  store: 502,
  validation: 400,
  render: 500,
};

export class IndentError extends Error {
  readonly kind: IndentErrorKind;
  readonly code: number;
  readonly details: string[];

  constructor(kind: IndentErrorKind, message: string, details: string[] = []) {
    super(message);
    this.name = "IndentError";
    this.kind = kind;
    this.code = STATUS[kind];
    this.details = details;
  }
}

/** Missing or malformed credentials, spreadsheet or worksheet. Fatal to the session. */
export class ConfigError extends IndentError {
  constructor(message: string, details: string[] = []) {
    super("config", message, details);
    this.name = "ConfigError";
  }
}

export class StoreError extends IndentError {
  readonly status: number | null;
  constructor(message: string, status: number | null = null) {
    super("store", message);
    this.name = "StoreError";
    this.status = status;
  }
}

export class ValidationError extends IndentError {
  constructor(message: string, details: string[] = []) {
    super("validation", message, details);
    this.name = "ValidationError";
  }
}

export class RenderError extends IndentError {
  constructor(message: string) {
    super("render", message);
    this.name = "RenderError";
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

export type ErrorBody = {
  ok: false;
  error: string;
  kind: IndentErrorKind | "internal";
  fatal: boolean;
  details?: string[];
};

/** Maps a thrown value onto the JSON body and HTTP status the routes return. */
export function toErrorResponse(e: unknown): { status: number; body: ErrorBody } {
  if (e instanceof ZodError) {
    const details = e.issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message));
    return { status: 400, body: { ok: false, error: "Invalid request", kind: "validation", fatal: false, details } };
  }
  if (e instanceof IndentError) {
    const body: ErrorBody = { ok: false, error: e.message, kind: e.kind, fatal: e.kind === "config" };
    if (e.details.length) body.details = e.details;
    return { status: e.code, body };
  }
  return { status: 500, body: { ok: false, error: errorMessage(e) || "Failed", kind: "internal", fatal: false } };
}
