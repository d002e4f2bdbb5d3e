import { Either, type Effect } from "effect";
import { DiscourseAdminClient } from "./client";
import {
  loadConfigFromEnv,
  type AdminClientConfigInput,
  type AdminClientOptions,
} from "./config";
import type { ApiKeyRevoked, UserNotFound } from "./constants";
import type {
  CommunityTopicInput,
  CreateCategoryInput,
  CreateUserInput,
  CreatedCategory,
  CreatedUser,
  UserLookup,
} from "./contract";
import { sanitizeErrorForLog, type AdminClientError } from "./errors";
import { runResult, unwrapOrThrow, type Result } from "./result";
import {
  createDomainServices,
  type DomainFactories,
  type DomainServices,
} from "./services/domains";

export type DiscourseAdminServiceOptions = AdminClientOptions & {
  domainFactories?: Partial<DomainFactories>;
};

/** Same operations as the service, resolving with the value or rejecting with the failure. */
export type RaisingAdminService = {
  lookupUserId: (username: string) => Promise<number | UserNotFound>;
  lookupUser: (username: string) => Promise<UserLookup | UserNotFound>;
  createUser: (params: CreateUserInput) => Promise<CreatedUser>;
  deactivateUser: (username: string) => Promise<string | UserNotFound>;
  reactivateUser: (username: string) => Promise<string | UserNotFound>;
  generateUserApiKey: (userId: number) => Promise<string>;
  revokeUserApiKey: (userId: number) => Promise<ApiKeyRevoked>;
  createCommunityTopic: (params: CommunityTopicInput) => Promise<CreatedCategory>;
  createCategory: (params: CreateCategoryInput) => Promise<CreatedCategory>;
};

/**
 * Administrative client for a Discourse forum.
 *
 * Every operation resolves with a `Result`: `Right` holds the value and `Left`
 * the `AdminClientError` describing the failure. The promise itself never
 * rejects. Lookups and activation toggles report a missing user as the value
 * `"User not found"`, not as a failure. Use {@link DiscourseAdminService.orThrow}
 * for the unwrap-or-throw style.
 */
export class DiscourseAdminService extends DiscourseAdminClient {
  protected readonly domains: DomainServices;

  constructor(config: AdminClientConfigInput, options: DiscourseAdminServiceOptions = {}) {
    const { domainFactories, ...clientOptions } = options;
    super(config, clientOptions);
    this.domains = createDomainServices(this, domainFactories);
  }

  private async run<A>(action: string, effect: Effect.Effect<A, AdminClientError>): Promise<Result<A>> {
    const result = await runResult(effect);
    if (Either.isLeft(result)) {
      this.logger.warn(`${action} failed`, { action, error: sanitizeErrorForLog(result.left) });
    }
    return result;
  }

  lookupUserId(username: string): Promise<Result<number | UserNotFound>> {
    return this.run("lookupUserId", this.domains.users.lookupUserId(username));
  }

  lookupUser(username: string): Promise<Result<UserLookup | UserNotFound>> {
    return this.run("lookupUser", this.domains.users.lookupUser(username));
  }

  createUser(params: CreateUserInput): Promise<Result<CreatedUser>> {
    return this.run("createUser", this.domains.users.createUser(params));
  }

  deactivateUser(username: string): Promise<Result<string | UserNotFound>> {
    return this.run("deactivateUser", this.domains.users.deactivateUser(username));
  }

  reactivateUser(username: string): Promise<Result<string | UserNotFound>> {
    return this.run("reactivateUser", this.domains.users.reactivateUser(username));
  }

  generateUserApiKey(userId: number): Promise<Result<string>> {
    return this.run("generateUserApiKey", this.domains.apiKeys.generateUserApiKey(userId));
  }

  revokeUserApiKey(userId: number): Promise<Result<ApiKeyRevoked>> {
    return this.run("revokeUserApiKey", this.domains.apiKeys.revokeUserApiKey(userId));
  }

  createCommunityTopic(params: CommunityTopicInput): Promise<Result<CreatedCategory>> {
    return this.run("createCommunityTopic", this.domains.categories.createCommunityTopic(params));
  }

  createCategory(params: CreateCategoryInput): Promise<Result<CreatedCategory>> {
    return this.run("createCategory", this.domains.categories.createCategory(params));
  }

  orThrow(): RaisingAdminService {
    return {
      lookupUserId: (username) => unwrapOrThrow(this.lookupUserId(username)),
      lookupUser: (username) => unwrapOrThrow(this.lookupUser(username)),
      createUser: (params) => unwrapOrThrow(this.createUser(params)),
      deactivateUser: (username) => unwrapOrThrow(this.deactivateUser(username)),
      reactivateUser: (username) => unwrapOrThrow(this.reactivateUser(username)),
      generateUserApiKey: (userId) => unwrapOrThrow(this.generateUserApiKey(userId)),
      revokeUserApiKey: (userId) => unwrapOrThrow(this.revokeUserApiKey(userId)),
      createCommunityTopic: (params) => unwrapOrThrow(this.createCommunityTopic(params)),
      createCategory: (params) => unwrapOrThrow(this.createCategory(params)),
    };
  }
}

export const createAdminServiceFromEnv = (
  env?: Record<string, string | undefined>,
  options: DiscourseAdminServiceOptions = {}
): DiscourseAdminService => new DiscourseAdminService(loadConfigFromEnv(env), options);
