import { z } from "zod";
import { DEFAULT_BODY_SNIPPET_LENGTH, DEFAULT_CATEGORY_TEXT_COLOR } from "./constants";
import { HexColorSchema } from "./contract/schemas/base";
import type { Logger, RequestLogger } from "./logging";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const OptionalTrimmedString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

export const AdminClientConfigSchema = z.object({
  endpoint: z
    .string()
    .trim()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), "must be an http(s) URL")
    .describe("Base URL of the Discourse forum"),
  username: OptionalTrimmedString.describe("Admin account used for privileged calls"),
  apiKey: OptionalTrimmedString.describe("Admin API key used for privileged calls"),
  timeoutMs: z
    .number()
    .int()
    .positive()
    .optional()
    .describe("Abort requests after this many milliseconds; unset means no timeout"),
  userAgent: OptionalTrimmedString,
  categoryTextColor: HexColorSchema.default(DEFAULT_CATEGORY_TEXT_COLOR),
  bodySnippetLength: z.number().int().nonnegative().default(DEFAULT_BODY_SNIPPET_LENGTH),
});

export type AdminClientConfigInput = z.input<typeof AdminClientConfigSchema>;
export type AdminClientConfig = z.output<typeof AdminClientConfigSchema>;

export type Credentials = Readonly<{
  endpoint: string;
  username?: string;
  apiKey?: string;
}>;

export type AdminClientOptions = {
  logger?: Logger;
  requestLogger?: RequestLogger;
  fetchImpl?: typeof fetch;
};

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join(".") : "(root)";
      return `${path} ${issue.message}`;
    })
    .join("; ");

export const parseAdminClientConfig = (input: unknown): AdminClientConfig => {
  const result = AdminClientConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid Discourse client config: ${formatIssues(result.error)}`);
  }
  return result.data;
};

const EnvNumber = z
  .string()
  .trim()
  .optional()
  .transform((value, ctx) => {
    if (value === undefined || value.length === 0) return undefined;
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "must be a number" });
      return z.NEVER;
    }
    return parsed;
  });

const EnvSchema = z.object({
  DISCOURSE_ENDPOINT: z.string({ required_error: "is required" }),
  DISCOURSE_USERNAME: z.string().optional(),
  DISCOURSE_API_KEY: z.string().optional(),
  DISCOURSE_TIMEOUT_MS: EnvNumber,
  DISCOURSE_USER_AGENT: z.string().optional(),
  DISCOURSE_CATEGORY_TEXT_COLOR: z.string().optional(),
  DISCOURSE_LOG_BODY_SNIPPET_LENGTH: EnvNumber,
});

/**
 * Reads the client configuration from environment variables. Called once at
 * start-up; the resulting config is treated as immutable afterwards.
 */
export const loadConfigFromEnv = (
  env: Record<string, string | undefined> = process.env
): AdminClientConfig => {
  const parsedEnv = EnvSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new ConfigError(`Invalid Discourse environment: ${formatIssues(parsedEnv.error)}`);
  }

  const vars = parsedEnv.data;
  return parseAdminClientConfig({
    endpoint: vars.DISCOURSE_ENDPOINT,
    username: vars.DISCOURSE_USERNAME,
    apiKey: vars.DISCOURSE_API_KEY,
    timeoutMs: vars.DISCOURSE_TIMEOUT_MS,
    userAgent: vars.DISCOURSE_USER_AGENT,
    categoryTextColor: vars.DISCOURSE_CATEGORY_TEXT_COLOR,
    bodySnippetLength: vars.DISCOURSE_LOG_BODY_SNIPPET_LENGTH,
  });
};
