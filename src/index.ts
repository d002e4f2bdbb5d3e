export {
  DiscourseAdminService,
  createAdminServiceFromEnv,
  type DiscourseAdminServiceOptions,
  type RaisingAdminService,
} from "./service";
export { DiscourseAdminClient, runWithContext, type ResourceClient } from "./client";
export {
  AdminClientConfigSchema,
  ConfigError,
  loadConfigFromEnv,
  parseAdminClientConfig,
  type AdminClientConfig,
  type AdminClientConfigInput,
  type AdminClientOptions,
  type Credentials,
} from "./config";
export {
  API_KEY_REVOKED,
  EXPECTED_FIELDS,
  INTERNAL_SERVER_ERROR,
  USER_NOT_FOUND,
  type ApiKeyRevoked,
  type UserNotFound,
} from "./constants";
export type {
  Category,
  CommunityTopicInput,
  CreateCategoryInput,
  CreateUserInput,
  CreatedCategory,
  CreatedUser,
  ForumUser,
  UserBadge,
  UserLookup,
} from "./contract";
export {
  AdminClientError,
  InvalidInputError,
  MalformedResponseError,
  MissingCredentialsError,
  ServerError,
  TransportError,
  UnexpectedStatusError,
  ValidationError,
  isAdminClientError,
  sanitizeErrorForLog,
  type FailureReason,
  type ValidationErrors,
} from "./errors";
export {
  createSafeLogger,
  noopLogger,
  type Logger,
  type RequestLogEvent,
  type RequestLogger,
  type SafeLogger,
} from "./logging";
export { normalizeResponseBody, type NormalizedBody, type ResponseBody } from "./response-normalizer";
export { runResult, unwrapOrThrow, type Result } from "./result";
