/**
 * Path fragments for the resource collections of the v9 API.
 */
export const RESOURCE_PATHS = {
  clients: "clients",
  projects: "projects",
  tags: "tags",
  timeEntries: "time_entries",
} as const;

export type ResourceKind = keyof typeof RESOURCE_PATHS;

/** `/me/{resource}`, for resources scoped to the authenticated user. */
export const userResourceUrl = (kind: ResourceKind): string => `/me/${RESOURCE_PATHS[kind]}`;

/** `/workspaces/{wid}/{resource}` */
export const resourceUrl = (kind: ResourceKind, wid: number): string =>
  `/workspaces/${wid}/${RESOURCE_PATHS[kind]}`;

/** `/workspaces/{wid}/{resource}/{id}`. Ids are passed through unchecked; the API validates them. */
export const resourceUrlWithId = (kind: ResourceKind, wid: number, id: number): string =>
  `${resourceUrl(kind, wid)}/${id}`;
