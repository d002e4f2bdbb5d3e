import { z } from "zod";
import type { ResourceClient } from "../client";
import { runWithContext } from "../client";
import type {
  Category,
  CommunityTopicInput,
  CreateCategoryInput,
  CreatedCategory,
} from "../contract";
import { CommunityTopicInputSchema, CreateCategoryInputSchema } from "../contract/schemas";
import type { ParamValue } from "../transport";
import { parseInput, parseWithSchema, requireObjectBody, unhandledStatus } from "./shared";

export const RawCategorySchema = z.object({
  id: z.number().int().positive(),
  name: z.string(),
  slug: z.string(),
  color: z.string().default(""),
  text_color: z.string().default(""),
  description: z.string().nullable().default(null),
  parent_category_id: z.number().int().positive().nullable().default(null),
  topic_count: z.number().int().nonnegative().default(0),
  post_count: z.number().int().nonnegative().default(0),
});

const CreatedCategoryBodySchema = z.object({
  category: RawCategorySchema,
});

export const mapCategory = (raw: z.output<typeof RawCategorySchema>): Category => ({
  id: raw.id,
  name: raw.name,
  slug: raw.slug,
  color: raw.color,
  textColor: raw.text_color,
  description: raw.description,
  parentCategoryId: raw.parent_category_id,
  topicCount: raw.topic_count,
  postCount: raw.post_count,
});

export const createCategoriesResource = (client: ResourceClient) => {
  // input is parsed inside the effect, after which exactly one request is sent
  const postCategory = (action: string, buildForm: () => Record<string, ParamValue>) =>
    runWithContext(action, async (): Promise<CreatedCategory> => {
      const form = buildForm();
      const response = await client.sendAsAdmin(action, "/categories", {
        method: "POST",
        credentialsIn: "form",
        form,
      });

      if (response.status !== 200) {
        throw unhandledStatus(client, response);
      }

      const body = requireObjectBody(response, "category");
      const parsed = parseWithSchema(CreatedCategoryBodySchema, body, "category");
      return { category: mapCategory(parsed.category) };
    });

  return {
    createCommunityTopic: (params: CommunityTopicInput) =>
      postCategory("Create community topic", () => {
        const input = parseInput(CommunityTopicInputSchema, params, "community topic");
        return {
          name: input.name,
          color: input.color,
          text_color: client.getCategoryTextColor(),
        };
      }),

    createCategory: (params: CreateCategoryInput) =>
      postCategory("Create category", () => {
        const input = parseInput(CreateCategoryInputSchema, params, "category");
        return {
          name: input.name,
          color: input.color,
          text_color: client.getCategoryTextColor(),
          description: input.description,
          parent_category_id: input.parentCategoryId,
          icon: input.icon,
        };
      }),
  };
};

export type CategoriesResource = ReturnType<typeof createCategoriesResource>;
