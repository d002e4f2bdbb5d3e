import { DEFAULT_BODY_SNIPPET_LENGTH } from "./constants";
import { TransportError } from "./errors";
import type { RequestLogEvent, RequestLogger, SafeLogger } from "./logging";
import { normalizeResponseBody, type ResponseBody } from "./response-normalizer";
import { findErrorCode, formatError, serializeError, stripQuery } from "./utils";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type ParamValue = string | number | boolean | undefined;

export type RequestOptions = {
  method?: HttpMethod;
  query?: Record<string, ParamValue>;
  form?: Record<string, ParamValue>;
  headers?: Record<string, string | undefined>;
};

export type BuiltRequest = {
  url: string;
  method: HttpMethod;
  headers: Record<string, string>;
  body?: URLSearchParams;
};

export type TransportResponse = {
  status: number;
  body: ResponseBody;
  text: string;
  url: string;
  method: HttpMethod;
};

export type TransportConfig = {
  baseUrl: string;
  timeoutMs?: number;
  userAgent?: string;
  bodySnippetLength?: number;
  logger: SafeLogger;
  requestLogger?: RequestLogger;
  fetchImpl?: typeof fetch;
};

export const normalizeBaseUrl = (baseUrl: string): string => {
  try {
    const parsed = new URL(baseUrl);
    const trimmedPath = parsed.pathname.replace(/\/+$/, "");
    const normalizedPath = trimmedPath.length ? trimmedPath : "";
    return `${parsed.origin}${normalizedPath}/`;
  } catch {
    throw new Error(`Invalid Discourse base URL: ${baseUrl}`);
  }
};

const hasHeader = (headers: Record<string, string>, name: string): boolean => {
  const target = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === target);
};

export const sanitizeSnippet = (text: string, maxLength: number = 512): string => {
  const compact = text.replace(/\s+/g, " ").trim();
  if (!compact) return "";
  return compact.length > maxLength ? `${compact.slice(0, maxLength)}…` : compact;
};

const normalizeHeaders = (extraHeaders: Record<string, string | undefined>) => {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(extraHeaders)) {
    if (value === undefined) continue;
    headers[key] = value;
  }
  return headers;
};

const toParams = (values: Record<string, ParamValue>): URLSearchParams => {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(values)) {
    if (value === undefined) continue;
    params.append(key, String(value));
  }
  return params;
};

export const buildUrl = (
  baseUrl: string,
  path: string,
  query?: Record<string, ParamValue>
): string => {
  const normalizedPath = path.replace(/^\/+/, "");
  const url = new URL(normalizedPath, baseUrl);
  if (query) {
    toParams(query).forEach((value, key) => url.searchParams.append(key, value));
  }
  return url.toString();
};

export const buildRequest = (
  config: { baseUrl: string; userAgent?: string },
  path: string,
  options: RequestOptions
): BuiltRequest => {
  const { method = "GET", query, form, headers: extraHeaders = {} } = options;
  const headers = normalizeHeaders(extraHeaders);

  if (!hasHeader(headers, "Accept")) {
    headers.Accept = "application/json";
  }
  if (config.userAgent && !hasHeader(headers, "User-Agent")) {
    headers["User-Agent"] = config.userAgent;
  }

  return {
    url: buildUrl(config.baseUrl, path, query),
    method,
    headers,
    body: form ? toParams(form) : undefined,
  };
};

const logRequest = (
  logger: SafeLogger,
  requestLogger: RequestLogger | undefined,
  params: {
    url: string;
    method: string;
    durationMs?: number;
    outcome: "success" | "fail";
    status?: number;
    error?: unknown;
  }
) => {
  const payload: RequestLogEvent = {
    path: stripQuery(params.url),
    method: params.method,
    durationMs: params.durationMs,
    status: params.status,
    error: params.error ? serializeError(params.error) : undefined,
    outcome: params.outcome,
  };

  try {
    requestLogger?.(payload);
  } catch {
    // ignore observer failures
  }

  if (params.outcome === "success") {
    logger.debug("Discourse request completed", payload);
  } else {
    logger.error("Discourse request failed", payload);
  }
};

export class Transport {
  private readonly baseUrl: string;
  private readonly timeoutMs?: number;
  private readonly userAgent?: string;
  private readonly bodySnippetLength: number;
  private readonly logger: SafeLogger;
  private readonly requestLogger?: RequestLogger;
  private readonly fetchImpl?: typeof fetch;

  constructor(config: TransportConfig) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    this.timeoutMs =
      typeof config.timeoutMs === "number" && Number.isFinite(config.timeoutMs) && config.timeoutMs > 0
        ? config.timeoutMs
        : undefined;
    this.userAgent = config.userAgent?.trim() || undefined;
    this.bodySnippetLength =
      typeof config.bodySnippetLength === "number" && config.bodySnippetLength >= 0
        ? config.bodySnippetLength
        : DEFAULT_BODY_SNIPPET_LENGTH;
    this.logger = config.logger;
    this.requestLogger = config.requestLogger;
    this.fetchImpl = config.fetchImpl;
  }

  getNormalizedBaseUrl(): string {
    return this.baseUrl.replace(/\/+$/, "");
  }

  getBodySnippetLength(): number {
    return this.bodySnippetLength;
  }

  buildRequest(path: string, options: RequestOptions): BuiltRequest {
    return buildRequest({ baseUrl: this.baseUrl, userAgent: this.userAgent }, path, options);
  }

  private toTransportError(request: BuiltRequest, error: unknown, timedOut: boolean): TransportError {
    const code = findErrorCode(error);
    const description = timedOut
      ? `timeout after ${this.timeoutMs}ms`
      : code ?? formatError(error);
    return new TransportError({
      method: request.method,
      path: stripQuery(request.url),
      description,
      code: timedOut ? "ETIMEDOUT" : code,
      cause: error,
    });
  }

  /**
   * Issues exactly one request and reads the whole body. Resolves with the
   * status whatever it is; only failures below HTTP (connection, DNS, abort,
   * body read) reject, always with a `TransportError`.
   */
  async send(path: string, options: RequestOptions = {}): Promise<TransportResponse> {
    const request = this.buildRequest(path, options);
    const fetchFn = this.fetchImpl ?? fetch;
    const controller = this.timeoutMs === undefined ? undefined : new AbortController();
    let timedOut = false;
    const timeoutId =
      controller && this.timeoutMs !== undefined
        ? setTimeout(() => {
            timedOut = true;
            controller.abort();
          }, this.timeoutMs)
        : undefined;
    const start = Date.now();

    try {
      const response = await fetchFn(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller?.signal,
      });

      let text: string;
      try {
        text = await response.text();
      } catch (readError) {
        throw new Error(`Failed to read response body: ${formatError(readError)}`, {
          cause: readError,
        });
      }

      logRequest(this.logger, this.requestLogger, {
        url: request.url,
        method: request.method,
        durationMs: Date.now() - start,
        outcome: "success",
        status: response.status,
      });

      return {
        status: response.status,
        body: normalizeResponseBody(text),
        text,
        url: stripQuery(request.url),
        method: request.method,
      };
    } catch (error) {
      const transportError = this.toTransportError(request, error, timedOut);
      logRequest(this.logger, this.requestLogger, {
        url: request.url,
        method: request.method,
        durationMs: Date.now() - start,
        outcome: "fail",
        error: transportError,
      });
      throw transportError;
    } finally {
      if (timeoutId !== undefined) clearTimeout(timeoutId);
    }
  }
}
