import { describe, expect, it } from "vitest";
import type { AdminClientConfigInput } from "../../config";
import { InvalidInputError, MalformedResponseError, ServerError } from "../../errors";
import { DiscourseAdminService } from "../../service";
import {
  TEST_CONFIG,
  expectLeft,
  expectRight,
  jsonResponse,
  makeFetch,
  validCategoryPayload,
} from "../fixtures";

const makeService = (
  responses: Array<Response | Error>,
  config: AdminClientConfigInput = TEST_CONFIG
) => {
  const { fetchImpl, requests } = makeFetch(...responses);
  return { service: new DiscourseAdminService(config, { fetchImpl }), requests };
};

describe("createCommunityTopic", () => {
  it("posts the name, colour and default text colour", async () => {
    const { service, requests } = makeService([
      jsonResponse({ category: validCategoryPayload() }),
    ]);

    const result = expectRight(
      await service.createCommunityTopic({ name: "Community", color: "#0088CC" })
    );

    expect(result).toEqual({
      category: {
        id: 12,
        name: "Community",
        slug: "community",
        color: "0088CC",
        textColor: "FFFFFF",
        description: null,
        parentCategoryId: null,
        topicCount: 0,
        postCount: 0,
      },
    });
    expect(requests[0].method).toBe("POST");
    expect(requests[0].url).toBe("https://forum.example.com/categories");
    expect(requests[0].form?.toString()).toBe(
      "api_username=system&api_key=test-api-key&name=Community&color=0088CC&text_color=FFFFFF"
    );
  });

  it("uses the configured text colour", async () => {
    const { service, requests } = makeService(
      [jsonResponse({ category: validCategoryPayload({ text_color: "000000" }) })],
      { ...TEST_CONFIG, categoryTextColor: "#000000" }
    );

    const result = expectRight(
      await service.createCommunityTopic({ name: "Community", color: "0088CC" })
    );

    expect(result.category.textColor).toBe("000000");
    expect(requests[0].form?.get("text_color")).toBe("000000");
  });

  it("rejects an invalid colour before sending", async () => {
    const { service, requests } = makeService([]);

    const error = expectLeft(await service.createCommunityTopic({ name: "Community", color: "blue" }));

    expect(error).toBeInstanceOf(InvalidInputError);
    expect(error.message).toBe("Invalid community topic: color must be a 3- or 6-digit hex colour");
    expect(requests).toHaveLength(0);
  });

  it("maps HTTP 500 to a server error", async () => {
    const { service } = makeService([jsonResponse({ errors: ["boom"] }, 500)]);

    const error = expectLeft(
      await service.createCommunityTopic({ name: "Community", color: "0088CC" })
    );

    expect(error).toBeInstanceOf(ServerError);
    expect(error.reason).toBe("Internal server error");
  });

  it("reports a body without a category as malformed", async () => {
    const { service } = makeService([jsonResponse({ success: "OK" })]);

    const error = expectLeft(
      await service.createCommunityTopic({ name: "Community", color: "0088CC" })
    );

    expect(error).toBeInstanceOf(MalformedResponseError);
    expect(error.reason).toBe("Malformed category response");
  });
});

describe("createCategory", () => {
  it("sends the parent, description and icon", async () => {
    const { service, requests } = makeService([
      jsonResponse({
        category: validCategoryPayload({
          id: 13,
          name: "Help",
          slug: "help",
          color: "fff",
          description: "Ask here",
          parent_category_id: 12,
        }),
      }),
    ]);

    const result = expectRight(
      await service.createCategory({
        name: "Help",
        color: "fff",
        parentCategoryId: 12,
        description: "Ask here",
        icon: "question",
      })
    );

    expect(result.category).toMatchObject({ id: 13, parentCategoryId: 12, description: "Ask here" });
    expect(requests[0].form?.toString()).toBe(
      "api_username=system&api_key=test-api-key&name=Help&color=fff&text_color=FFFFFF" +
        "&description=Ask+here&parent_category_id=12&icon=question"
    );
  });

  it("omits the parent for a top-level category", async () => {
    const { service, requests } = makeService([jsonResponse({ category: validCategoryPayload() })]);

    await service.createCategory({ name: "Community", color: "0088CC" });

    expect(requests[0].form?.has("parent_category_id")).toBe(false);
    expect(requests[0].form?.get("description")).toBe("");
    expect(requests[0].form?.get("icon")).toBe("");
  });

  it("rejects a non-positive parent id before sending", async () => {
    const { service, requests } = makeService([]);

    const error = expectLeft(
      await service.createCategory({ name: "Help", color: "fff", parentCategoryId: 0 })
    );

    expect(error).toBeInstanceOf(InvalidInputError);
    expect(requests).toHaveLength(0);
  });
});
