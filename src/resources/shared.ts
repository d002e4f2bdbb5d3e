import type { z } from "zod";
import type { ResourceClient } from "../client";
import {
  InvalidInputError,
  MalformedResponseError,
  ServerError,
  UnexpectedStatusError,
} from "../errors";
import type { NormalizedBody } from "../response-normalizer";
import { isNormalizedBody } from "../response-normalizer";
import { sanitizeSnippet, type TransportResponse } from "../transport";

const formatParseIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join(".") : "(root)";
      return `${path} ${issue.message}`;
    })
    .join("; ");

/** Parses a response value; a mismatch becomes a `MalformedResponseError`. */
export const parseWithSchema = <Output, Input>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  value: unknown,
  label: string
): Output => {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new MalformedResponseError(label, formatParseIssues(result.error));
  }
  return result.data;
};

/** Parses caller input before any request is made. */
export const parseInput = <Output, Input>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  value: unknown,
  label: string
): Output => {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new InvalidInputError(`Invalid ${label}: ${formatParseIssues(result.error)}`);
  }
  return result.data;
};

export const requireObjectBody = (response: TransportResponse, label: string): NormalizedBody => {
  if (!isNormalizedBody(response.body)) {
    throw new MalformedResponseError(
      label,
      `expected a JSON object, got ${sanitizeSnippet(response.text, 80) || "an empty body"}`
    );
  }
  return response.body;
};

/**
 * Error for a status the endpoint has no branch for. HTTP 500 always maps to
 * `ServerError`; anything else keeps status and a body snippet.
 */
export const unhandledStatus = (
  client: ResourceClient,
  response: TransportResponse
): ServerError | UnexpectedStatusError => {
  const bodySnippetLength = client.getBodySnippetLength();
  const bodySnippet = sanitizeSnippet(response.text, bodySnippetLength);

  client.getSafeLogger().warn("Discourse API error", {
    path: response.url,
    method: response.method,
    status: response.status,
    body: bodySnippet,
  });

  if (response.status === 500) {
    return new ServerError({ method: response.method, path: response.url });
  }

  return new UnexpectedStatusError({
    status: response.status,
    method: response.method,
    path: response.url,
    bodySnippet,
    bodySnippetMaxLength: bodySnippetLength,
  });
};

export const encodeSegment = (value: string | number): string =>
  encodeURIComponent(String(value));
