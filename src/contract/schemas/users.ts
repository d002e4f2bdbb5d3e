import { z } from "zod";
import {
  NonEmptyString,
  NonNegativeIntSchema,
  PositiveIntSchema,
  RequiredUsernameSchema,
} from "./base";

export const ForumUserSchema = z.object({
  id: z.number().int(),
  username: z.string(),
  name: z.string().nullable(),
  avatarTemplate: z.string(),
  title: z.string().nullable(),
  trustLevel: NonNegativeIntSchema,
  moderator: z.boolean(),
  admin: z.boolean(),
  active: z.boolean().optional(),
  createdAt: z.string().optional(),
  lastSeenAt: z.string().nullable(),
});

export const UserBadgeSchema = z.object({
  id: PositiveIntSchema,
  badgeId: PositiveIntSchema,
  grantedAt: z.string().nullable(),
});

export const UserLookupSchema = z.object({
  user: ForumUserSchema,
  userBadges: z.array(UserBadgeSchema),
});

export const CreatedUserSchema = z.object({
  success: z.boolean(),
  message: z.string().nullable(),
  userId: PositiveIntSchema.optional(),
});

export const UsernameInputSchema = RequiredUsernameSchema;

export const CreateUserInputSchema = z.object({
  name: NonEmptyString,
  email: NonEmptyString,
  password: z.string().min(1, "Password is required"),
});
