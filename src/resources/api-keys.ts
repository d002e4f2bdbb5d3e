import { z } from "zod";
import type { ResourceClient } from "../client";
import { runWithContext } from "../client";
import { API_KEY_REVOKED, type ApiKeyRevoked } from "../constants";
import { UserIdInputSchema } from "../contract/schemas";
import { encodeSegment, parseInput, parseWithSchema, requireObjectBody, unhandledStatus } from "./shared";

const GeneratedApiKeyBodySchema = z.object({
  apiKey: z.object({
    key: z.string().min(1),
  }),
});

export const createApiKeysResource = (client: ResourceClient) => ({
  generateUserApiKey: (userId: number) =>
    runWithContext("Generate user API key", async (): Promise<string> => {
      const id = parseInput(UserIdInputSchema, userId, "user id");
      const response = await client.sendAsAdmin(
        "Generate user API key",
        `/admin/users/${encodeSegment(id)}/generate_api_key`,
        { method: "POST", credentialsIn: "form" }
      );

      if (response.status !== 200) {
        throw unhandledStatus(client, response);
      }

      const body = requireObjectBody(response, "API key");
      return parseWithSchema(GeneratedApiKeyBodySchema, body, "API key").apiKey.key;
    }),

  revokeUserApiKey: (userId: number) =>
    runWithContext("Revoke user API key", async (): Promise<ApiKeyRevoked> => {
      const id = parseInput(UserIdInputSchema, userId, "user id");
      const response = await client.sendAsAdmin(
        "Revoke user API key",
        `/admin/users/${encodeSegment(id)}/revoke_api_key`,
        { method: "DELETE", credentialsIn: "form" }
      );

      // success bodies carry nothing to return
      if (response.status !== 200) {
        throw unhandledStatus(client, response);
      }

      return API_KEY_REVOKED;
    }),
});

export type ApiKeysResource = ReturnType<typeof createApiKeysResource>;
