import { Effect } from "effect";
import {
  parseAdminClientConfig,
  type AdminClientConfig,
  type AdminClientConfigInput,
  type AdminClientOptions,
  type Credentials,
} from "./config";
import { MissingCredentialsError, wrapServiceError, type AdminClientError } from "./errors";
import { createSafeLogger, type SafeLogger } from "./logging";
import { Transport, type RequestOptions, type TransportResponse } from "./transport";

export const runWithContext = <A>(
  action: string,
  fn: () => Promise<A>
): Effect.Effect<A, AdminClientError> =>
  Effect.tryPromise({
    try: fn,
    catch: (error: unknown) => wrapServiceError(action, error),
  });

export type AdminCredentials = {
  username: string;
  apiKey: string;
};

/** Where a privileged request carries `api_key`/`api_username` besides the auth headers. */
export type CredentialPlacement = "query" | "form";

export type AdminRequestOptions = RequestOptions & {
  credentialsIn: CredentialPlacement;
};

export type ResourceClient = {
  send: (path: string, options?: RequestOptions) => Promise<TransportResponse>;
  sendAsAdmin: (
    action: string,
    path: string,
    options: AdminRequestOptions
  ) => Promise<TransportResponse>;
  getCategoryTextColor: () => string;
  getBodySnippetLength: () => number;
  getSafeLogger: () => SafeLogger;
};

export class DiscourseAdminClient implements ResourceClient {
  protected readonly config: AdminClientConfig;
  protected readonly credentials: Credentials;
  protected readonly transport: Transport;
  protected readonly logger: SafeLogger;

  constructor(config: AdminClientConfigInput, options: AdminClientOptions = {}) {
    this.config = parseAdminClientConfig(config);
    this.credentials = Object.freeze({
      endpoint: this.config.endpoint,
      username: this.config.username,
      apiKey: this.config.apiKey,
    });
    this.logger = createSafeLogger(options.logger);
    this.transport = new Transport({
      baseUrl: this.credentials.endpoint,
      timeoutMs: this.config.timeoutMs,
      userAgent: this.config.userAgent,
      bodySnippetLength: this.config.bodySnippetLength,
      logger: this.logger,
      requestLogger: options.requestLogger,
      fetchImpl: options.fetchImpl,
    });
  }

  getNormalizedBaseUrl(): string {
    return this.transport.getNormalizedBaseUrl();
  }

  getCategoryTextColor(): string {
    return this.config.categoryTextColor;
  }

  getBodySnippetLength(): number {
    return this.transport.getBodySnippetLength();
  }

  getSafeLogger(): SafeLogger {
    return this.logger;
  }

  hasAdminCredentials(): boolean {
    return Boolean(this.credentials.username && this.credentials.apiKey);
  }

  send(path: string, options: RequestOptions = {}): Promise<TransportResponse> {
    return this.transport.send(path, options);
  }

  async sendAsAdmin(
    action: string,
    path: string,
    options: AdminRequestOptions
  ): Promise<TransportResponse> {
    const { credentialsIn, ...requestOptions } = options;
    const { username, apiKey } = this.requireCredentials(action);
    const headers = { ...requestOptions.headers, "Api-Key": apiKey, "Api-Username": username };

    if (credentialsIn === "query") {
      return this.transport.send(path, {
        ...requestOptions,
        headers,
        query: { api_key: apiKey, api_username: username, ...requestOptions.query },
      });
    }

    return this.transport.send(path, {
      ...requestOptions,
      headers,
      form: { api_username: username, api_key: apiKey, ...requestOptions.form },
    });
  }

  protected requireCredentials(action: string): AdminCredentials {
    const { username, apiKey } = this.credentials;
    if (username && apiKey) {
      return { username, apiKey };
    }

    const missing = [username ? undefined : "username", apiKey ? undefined : "apiKey"].filter(
      (entry): entry is string => entry !== undefined
    );
    this.logger.warn("Privileged Discourse call without admin credentials", {
      action,
      missing,
    });
    throw new MissingCredentialsError(action, missing);
  }
}
