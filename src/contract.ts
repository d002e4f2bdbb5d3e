import type { z } from "zod";
import type {
  CategorySchema,
  CommunityTopicInputSchema,
  CreateCategoryInputSchema,
  CreateUserInputSchema,
  CreatedCategorySchema,
  CreatedUserSchema,
  ForumUserSchema,
  UserBadgeSchema,
  UserLookupSchema,
} from "./contract/schemas";

export type ForumUser = z.infer<typeof ForumUserSchema>;
export type UserBadge = z.infer<typeof UserBadgeSchema>;
export type UserLookup = z.infer<typeof UserLookupSchema>;
export type CreatedUser = z.infer<typeof CreatedUserSchema>;
export type Category = z.infer<typeof CategorySchema>;
export type CreatedCategory = z.infer<typeof CreatedCategorySchema>;

export type CreateUserInput = z.input<typeof CreateUserInputSchema>;
export type CommunityTopicInput = z.input<typeof CommunityTopicInputSchema>;
export type CreateCategoryInput = z.input<typeof CreateCategoryInputSchema>;
