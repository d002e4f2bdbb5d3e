import { z } from "zod";
import { HexColorSchema, NonEmptyString, NonNegativeIntSchema, PositiveIntSchema } from "./base";

export const CategorySchema = z.object({
  id: PositiveIntSchema,
  name: z.string(),
  slug: z.string(),
  color: z.string(),
  textColor: z.string(),
  description: z.string().nullable(),
  parentCategoryId: PositiveIntSchema.nullable(),
  topicCount: NonNegativeIntSchema,
  postCount: NonNegativeIntSchema,
});

export const CreatedCategorySchema = z.object({
  category: CategorySchema,
});

export const CommunityTopicInputSchema = z.object({
  name: NonEmptyString,
  color: HexColorSchema,
});

export const CreateCategoryInputSchema = CommunityTopicInputSchema.extend({
  parentCategoryId: PositiveIntSchema.optional(),
  description: z.string().default(""),
  icon: z.string().trim().default(""),
});
