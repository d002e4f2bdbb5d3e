export const DEFAULT_BODY_SNIPPET_LENGTH = 200;
export const DEFAULT_CATEGORY_TEXT_COLOR = "FFFFFF";

export const USER_NOT_FOUND = "User not found" as const;
export const INTERNAL_SERVER_ERROR = "Internal server error" as const;
export const API_KEY_REVOKED = "API key successfully revoked" as const;

export type UserNotFound = typeof USER_NOT_FOUND;
export type ApiKeyRevoked = typeof API_KEY_REVOKED;

/** Top-level response fields kept by the normalizer; anything else is dropped. */
export const EXPECTED_FIELDS = [
  "success",
  "message",
  "errors",
  "user_id",
  "user",
  "user_badges",
  "api_key",
  "category",
] as const;

export type ExpectedField = (typeof EXPECTED_FIELDS)[number];

type CamelCase<S extends string> = S extends `${infer Head}_${infer Tail}`
  ? `${Head}${Capitalize<CamelCase<Tail>>}`
  : S;

export type NormalizedKey = CamelCase<ExpectedField>;

export const NORMALIZED_KEYS: { readonly [K in ExpectedField]: CamelCase<K> } = {
  success: "success",
  message: "message",
  errors: "errors",
  user_id: "userId",
  user: "user",
  user_badges: "userBadges",
  api_key: "apiKey",
  category: "category",
};
