import type { ResourceClient } from "../client";
import { createApiKeysResource, type ApiKeysResource } from "../resources/api-keys";
import { createCategoriesResource, type CategoriesResource } from "../resources/categories";
import { createUsersResource, type UsersResource } from "../resources/users";

export type DomainFactories = {
  users: (client: ResourceClient) => UsersResource;
  apiKeys: (client: ResourceClient) => ApiKeysResource;
  categories: (client: ResourceClient) => CategoriesResource;
};

export type DomainServices = {
  users: UsersResource;
  apiKeys: ApiKeysResource;
  categories: CategoriesResource;
};

export const defaultDomainFactories: DomainFactories = {
  users: createUsersResource,
  apiKeys: createApiKeysResource,
  categories: createCategoriesResource,
};

export const createDomainServices = (
  client: ResourceClient,
  overrides: Partial<DomainFactories> = {}
): DomainServices => {
  const factories = { ...defaultDomainFactories, ...overrides };
  return {
    users: factories.users(client),
    apiKeys: factories.apiKeys(client),
    categories: factories.categories(client),
  };
};
