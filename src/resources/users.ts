import { Effect } from "effect";
import { z } from "zod";
import type { ResourceClient } from "../client";
import { runWithContext } from "../client";
import { USER_NOT_FOUND, type UserNotFound } from "../constants";
import type { CreateUserInput, CreatedUser, ForumUser, UserBadge, UserLookup } from "../contract";
import { CreateUserInputSchema, UsernameInputSchema } from "../contract/schemas";
import { ValidationError, type ValidationErrors } from "../errors";
import { hasPopulatedErrors } from "../response-normalizer";
import { isRecord } from "../utils";
import {
  encodeSegment,
  parseInput,
  parseWithSchema,
  requireObjectBody,
  unhandledStatus,
} from "./shared";

export const RawUserSchema = z.object({
  id: z.number().int(),
  username: z.string(),
  name: z.string().nullable().default(null),
  avatar_template: z.string().default(""),
  title: z.string().nullable().default(null),
  trust_level: z.number().int().nonnegative().default(0),
  moderator: z.boolean().default(false),
  admin: z.boolean().default(false),
  active: z.boolean().optional(),
  created_at: z.string().optional(),
  last_seen_at: z.string().nullable().default(null),
});

export const RawUserBadgeSchema = z.object({
  id: z.number().int().positive(),
  badge_id: z.number().int().positive(),
  granted_at: z.string().nullable().default(null),
});

const UserLookupBodySchema = z.object({
  user: RawUserSchema,
  userBadges: z.array(RawUserBadgeSchema).default([]),
});

const CreatedUserBodySchema = z.object({
  success: z.boolean().default(true),
  message: z.string().nullable().default(null),
  userId: z.number().int().positive().optional(),
});

// Discourse answers `PUT /users/:username` with `success: "OK"`
const StatusBodySchema = z.object({
  success: z.union([z.string(), z.boolean()]).transform(String),
});

export const mapForumUser = (raw: z.output<typeof RawUserSchema>): ForumUser => ({
  id: raw.id,
  username: raw.username,
  name: raw.name,
  avatarTemplate: raw.avatar_template,
  title: raw.title,
  trustLevel: raw.trust_level,
  moderator: raw.moderator,
  admin: raw.admin,
  active: raw.active,
  createdAt: raw.created_at,
  lastSeenAt: raw.last_seen_at,
});

export const mapUserBadge = (raw: z.output<typeof RawUserBadgeSchema>): UserBadge => ({
  id: raw.id,
  badgeId: raw.badge_id,
  grantedAt: raw.granted_at,
});

/**
 * Flattens the shapes Discourse uses for `errors` (a field map, a list of
 * messages, or a single message) into field → messages. Free-standing
 * messages are filed under `base`.
 */
export const normalizeValidationErrors = (errors: unknown): ValidationErrors => {
  const toMessages = (value: unknown): string[] => {
    if (typeof value === "string") return value.trim() ? [value] : [];
    if (Array.isArray(value)) {
      return value.filter((entry): entry is string => typeof entry === "string");
    }
    return [];
  };

  if (isRecord(errors)) {
    return Object.fromEntries(
      Object.entries(errors).map(([field, value]) => [field, toMessages(value)])
    );
  }

  const messages = toMessages(errors);
  return messages.length ? { base: messages } : {};
};

export const createUsersResource = (client: ResourceClient) => {
  const fetchUser = (action: string, username: string) =>
    runWithContext(action, async (): Promise<UserLookup | UserNotFound> => {
      const name = parseInput(UsernameInputSchema, username, "username");
      const response = await client.send(`/users/${encodeSegment(name)}.json`);

      switch (response.status) {
        case 200: {
          const body = requireObjectBody(response, "user");
          const parsed = parseWithSchema(UserLookupBodySchema, body, "user");
          return {
            user: mapForumUser(parsed.user),
            userBadges: parsed.userBadges.map(mapUserBadge),
          };
        }
        case 404:
          return USER_NOT_FOUND;
        default:
          throw unhandledStatus(client, response);
      }
    });

  const setActive = (action: string, username: string, active: boolean) =>
    runWithContext(action, async (): Promise<string | UserNotFound> => {
      const name = parseInput(UsernameInputSchema, username, "username");
      const response = await client.sendAsAdmin(action, `/users/${encodeSegment(name)}`, {
        method: "PUT",
        credentialsIn: "query",
        form: { username: name, active },
      });

      switch (response.status) {
        case 200: {
          const body = requireObjectBody(response, "user status");
          return parseWithSchema(StatusBodySchema, body, "user status").success;
        }
        case 404:
          return USER_NOT_FOUND;
        default:
          throw unhandledStatus(client, response);
      }
    });

  return {
    lookupUserId: (username: string) =>
      fetchUser("Lookup user id", username).pipe(
        Effect.map((result) => (result === USER_NOT_FOUND ? result : result.user.id))
      ),

    lookupUser: (username: string) => fetchUser("Lookup user", username),

    createUser: (params: CreateUserInput) =>
      runWithContext("Create user", async (): Promise<CreatedUser> => {
        const input = parseInput(CreateUserInputSchema, params, "user");
        const response = await client.sendAsAdmin("Create user", "/users", {
          method: "POST",
          credentialsIn: "query",
          form: {
            name: input.name,
            username: input.name,
            email: input.email,
            password: input.password,
            active: true,
          },
        });

        if (response.status !== 200) {
          throw unhandledStatus(client, response);
        }

        const body = requireObjectBody(response, "create user");
        if (hasPopulatedErrors(body)) {
          throw new ValidationError({
            errors: normalizeValidationErrors(body.errors),
            message: typeof body.message === "string" ? body.message : undefined,
          });
        }

        return parseWithSchema(CreatedUserBodySchema, body, "create user");
      }),

    deactivateUser: (username: string) => setActive("Deactivate user", username, false),

    reactivateUser: (username: string) => setActive("Reactivate user", username, true),
  };
};

export type UsersResource = ReturnType<typeof createUsersResource>;
