import { EXPECTED_FIELDS, NORMALIZED_KEYS, type NormalizedKey } from "./constants";
import { isRecord } from "./utils";

export type NormalizedBody = Partial<Record<NormalizedKey, unknown>>;

/** A decoded response body: the allow-listed object, or the raw text when it is not a JSON object. */
export type ResponseBody = NormalizedBody | string;

export const decodeBody = (
  text: string
): { kind: "json"; value: Record<string, unknown> } | { kind: "raw"; value: string } => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { kind: "raw", value: text };
  }

  // arrays, scalars and null stay opaque, only objects carry recognised fields
  return isRecord(parsed) ? { kind: "json", value: parsed } : { kind: "raw", value: text };
};

export const pickExpectedFields = (decoded: Record<string, unknown>): NormalizedBody => {
  const normalized: NormalizedBody = {};
  for (const field of EXPECTED_FIELDS) {
    if (Object.prototype.hasOwnProperty.call(decoded, field)) {
      normalized[NORMALIZED_KEYS[field]] = decoded[field];
    }
  }
  return normalized;
};

export const normalizeResponseBody = (text: string): ResponseBody => {
  const decoded = decodeBody(text);
  return decoded.kind === "json" ? pickExpectedFields(decoded.value) : decoded.value;
};

export const isNormalizedBody = (body: ResponseBody): body is NormalizedBody =>
  typeof body !== "string";

/**
 * True when an `errors` field carries at least one entry. Discourse answers a
 * rejected sign-up with HTTP 200 and a populated `errors` object.
 */
export const hasPopulatedErrors = (body: ResponseBody): boolean => {
  if (!isNormalizedBody(body)) return false;
  const { errors } = body;
  if (Array.isArray(errors)) return errors.length > 0;
  if (isRecord(errors)) return Object.keys(errors).length > 0;
  return typeof errors === "string" && errors.trim().length > 0;
};
