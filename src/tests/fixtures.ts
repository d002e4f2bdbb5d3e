import { Either } from "effect";
import { vi } from "vitest";
import type { AdminClientConfigInput } from "../config";
import type { AdminClientError } from "../errors";
import type { Result } from "../result";

type Overrides = Partial<Record<string, unknown>>;

export const TEST_ENDPOINT = "https://forum.example.com";

export const TEST_CONFIG: AdminClientConfigInput = {
  endpoint: TEST_ENDPOINT,
  username: "system",
  apiKey: "test-api-key",
};

export const validUserPayload = (overrides: Overrides = {}): Record<string, unknown> => ({
  id: 42,
  username: "alice",
  name: "Alice",
  avatar_template: "/user_avatar/forum.example.com/alice/{size}/1_2.png",
  title: null,
  trust_level: 1,
  moderator: false,
  admin: false,
  active: true,
  created_at: "2024-01-01T00:00:00.000Z",
  last_seen_at: "2024-02-01T00:00:00.000Z",
  ...overrides,
});

export const userLookupPayload = (overrides: Overrides = {}): Record<string, unknown> => ({
  user_badges: [{ id: 7, badge_id: 3, granted_at: "2024-01-02T00:00:00.000Z", user_id: 42 }],
  badges: [{ id: 3, name: "Basic" }],
  users: [],
  user: validUserPayload(),
  ...overrides,
});

export const createdUserPayload = (overrides: Overrides = {}): Record<string, unknown> => ({
  success: true,
  active: true,
  message: "Your account is activated and ready to use.",
  user_id: 42,
  ...overrides,
});

export const rejectedUserPayload = (overrides: Overrides = {}): Record<string, unknown> => ({
  success: false,
  message: "Password is too short (minimum is 10 characters)",
  errors: { password: ["is too short (minimum is 10 characters)"] },
  values: { name: "alice", username: "alice", email: "alice@example.com" },
  is_developer: false,
  ...overrides,
});

export const validCategoryPayload = (overrides: Overrides = {}): Record<string, unknown> => ({
  id: 12,
  name: "Community",
  slug: "community",
  color: "0088CC",
  text_color: "FFFFFF",
  description: null,
  parent_category_id: null,
  topic_count: 0,
  post_count: 0,
  permission: 1,
  ...overrides,
});

export const jsonResponse = (body: unknown, status: number = 200): Response =>
  new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });

export const textResponse = (body: string, status: number = 200): Response =>
  new Response(body, { status, headers: { "content-type": "text/plain" } });

export const connectionRefused = (): TypeError => {
  const cause = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:443"), {
    code: "ECONNREFUSED",
  });
  return new TypeError("fetch failed", { cause });
};

type FetchInit = Parameters<typeof fetch>[1];

export type RecordedRequest = {
  url: string;
  method: string;
  headers: Record<string, string>;
  form: URLSearchParams | undefined;
};

/**
 * A `fetch` stand-in that replays the given responses in order and records
 * every request. An `Error` entry is thrown instead of returned.
 */
export const makeFetch = (...responses: Array<Response | Error>) => {
  const requests: RecordedRequest[] = [];
  const queue = [...responses];

  const fetchImpl = vi.fn(async (input: Parameters<typeof fetch>[0], init?: FetchInit) => {
    const headers: Record<string, string> = {};
    const rawHeaders = init?.headers;
    if (rawHeaders && !Array.isArray(rawHeaders) && !(rawHeaders instanceof Headers)) {
      Object.assign(headers, rawHeaders);
    }
    requests.push({
      url: String(input),
      method: init?.method ?? "GET",
      headers,
      form: init?.body instanceof URLSearchParams ? init.body : undefined,
    });

    const next = queue.shift();
    if (!next) {
      throw new Error(`Unexpected request to ${String(input)}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  });

  return { fetchImpl, requests };
};

export const expectRight = <A>(result: Result<A>): A => {
  if (Either.isLeft(result)) {
    throw new Error(`Expected a success, got ${result.left.name}: ${result.left.message}`);
  }
  return result.right;
};

export const expectLeft = <A>(result: Result<A>): AdminClientError => {
  if (Either.isRight(result)) {
    throw new Error(`Expected a failure, got ${JSON.stringify(result.right)}`);
  }
  return result.left;
};
