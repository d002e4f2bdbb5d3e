import { DEFAULT_BODY_SNIPPET_LENGTH, INTERNAL_SERVER_ERROR } from "./constants";
import { formatError, serializeError } from "./utils";

export type ValidationErrors = Record<string, string[]>;

/**
 * What a failed operation reports: a description string, or the field-level
 * messages Discourse returned for a rejected user.
 */
export type FailureReason = string | { errors: ValidationErrors };

type RequestMeta = {
  method: string;
  path: string;
};

export class AdminClientError extends Error {
  readonly reason: FailureReason;

  constructor(message: string, params: { reason: FailureReason; cause?: unknown }) {
    super(message, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = "AdminClientError";
    this.reason = params.reason;
  }
}

export class TransportError extends AdminClientError {
  readonly method: string;
  readonly path: string;
  readonly code?: string;
  declare readonly reason: string;

  constructor(params: RequestMeta & { description: string; code?: string; cause?: unknown }) {
    super(`Request ${params.method} ${params.path} failed: ${params.description}`, {
      reason: params.description,
      cause: params.cause,
    });
    this.name = "TransportError";
    this.method = params.method;
    this.path = params.path;
    this.code = params.code;
  }
}

export class ServerError extends AdminClientError {
  readonly method: string;
  readonly path: string;
  readonly status = 500;
  declare readonly reason: string;

  constructor(params: RequestMeta) {
    super(`Discourse API error (${params.method} 500): ${params.path}`, {
      reason: INTERNAL_SERVER_ERROR,
    });
    this.name = "ServerError";
    this.method = params.method;
    this.path = params.path;
  }
}

export class ValidationError extends AdminClientError {
  readonly errors: ValidationErrors;
  declare readonly reason: { errors: ValidationErrors };

  constructor(params: { errors: ValidationErrors; message?: string }) {
    const fields = Object.keys(params.errors).join(", ");
    super(params.message || `Discourse rejected the request: ${fields}`, {
      reason: { errors: params.errors },
    });
    this.name = "ValidationError";
    this.errors = params.errors;
  }
}

export class UnexpectedStatusError extends AdminClientError {
  readonly status: number;
  readonly method: string;
  readonly path: string;
  readonly bodySnippet?: string;
  readonly bodySnippetMaxLength: number;
  declare readonly reason: string;

  constructor(
    params: RequestMeta & {
      status: number;
      bodySnippet?: string;
      bodySnippetMaxLength?: number;
    }
  ) {
    const base = `Discourse API error (${params.method} ${params.status}): ${params.path}`;
    const maxLength = Math.max(0, params.bodySnippetMaxLength ?? DEFAULT_BODY_SNIPPET_LENGTH);
    const trimmedBodySnippet =
      typeof params.bodySnippet === "string" && params.bodySnippet.length > 0
        ? params.bodySnippet.slice(0, maxLength)
        : undefined;
    const message = trimmedBodySnippet ? `${base} - ${trimmedBodySnippet}` : base;
    super(message, { reason: `Unexpected status ${params.status}` });
    this.name = "UnexpectedStatusError";
    this.status = params.status;
    this.method = params.method;
    this.path = params.path;
    this.bodySnippet = trimmedBodySnippet;
    this.bodySnippetMaxLength = maxLength;
  }
}

export class MalformedResponseError extends AdminClientError {
  declare readonly reason: string;

  constructor(label: string, details: string) {
    super(`Malformed ${label} response: ${details}`, { reason: `Malformed ${label} response` });
    this.name = "MalformedResponseError";
  }
}

export class MissingCredentialsError extends AdminClientError {
  declare readonly reason: string;

  constructor(action: string, missing: string[]) {
    super(`${action} requires admin credentials; missing ${missing.join(", ")}`, {
      reason: `Missing admin credentials: ${missing.join(", ")}`,
    });
    this.name = "MissingCredentialsError";
  }
}

export class InvalidInputError extends AdminClientError {
  declare readonly reason: string;

  constructor(details: string) {
    super(details, { reason: details });
    this.name = "InvalidInputError";
  }
}

export const isAdminClientError = (value: unknown): value is AdminClientError =>
  value instanceof AdminClientError;

export const wrapServiceError = (action: string, error: unknown): AdminClientError => {
  if (isAdminClientError(error)) {
    return error;
  }
  const description = formatError(error);
  return new AdminClientError(`${action} failed: ${description}`, {
    reason: description,
    cause: error,
  });
};

export const resolveCause = (cause: unknown): string | undefined => {
  if (!cause) return undefined;
  const serialized = serializeError(cause);
  return typeof serialized === "string" ? serialized : serialized.message;
};

export const sanitizeErrorForLog = (
  error: unknown
): {
  message: string;
  name?: string;
  status?: number;
  path?: string;
  method?: string;
  code?: string;
  bodySnippet?: string;
  cause?: string;
} => {
  const serialized = serializeError(error);
  const name = error instanceof Error ? error.name : undefined;
  const message = typeof serialized === "string" ? serialized : serialized.message;
  const cause = error instanceof Error ? resolveCause(error.cause) : undefined;
  const payload = cause ? { message, name, cause } : { message, name };

  if (error instanceof UnexpectedStatusError) {
    return {
      ...payload,
      status: error.status,
      path: error.path,
      method: error.method,
      bodySnippet: error.bodySnippet,
    };
  }

  if (error instanceof ServerError) {
    return { ...payload, status: error.status, path: error.path, method: error.method };
  }

  if (error instanceof TransportError) {
    return { ...payload, path: error.path, method: error.method, code: error.code };
  }

  return payload;
};
