import { InvalidRequestError } from "./errors.js";

/** Discovery type URLs identifying every resource category served by the cache. */
export const ResourceTypes = {
  endpoint: "type.googleapis.com/envoy.api.v2.ClusterLoadAssignment",
  cluster: "type.googleapis.com/envoy.api.v2.Cluster",
  route: "type.googleapis.com/envoy.api.v2.RouteConfiguration",
  listener: "type.googleapis.com/envoy.api.v2.Listener",
  secret: "type.googleapis.com/envoy.api.v2.auth.Secret",
  runtime: "type.googleapis.com/envoy.service.discovery.v2.Runtime",
} as const;

/** Union of the supported discovery type URLs. */
export type ResourceType = (typeof ResourceTypes)[keyof typeof ResourceTypes];

/** Categories in the order responses are usually sequenced by a transport. */
export const RESOURCE_TYPES: readonly ResourceType[] = [
  ResourceTypes.cluster,
  ResourceTypes.endpoint,
  ResourceTypes.listener,
  ResourceTypes.route,
  ResourceTypes.secret,
  ResourceTypes.runtime,
] as const;

const KNOWN_TYPES = new Set<string>(RESOURCE_TYPES);

/** Narrows an arbitrary string to a supported {@link ResourceType}. */
export function isResourceType(value: string): value is ResourceType {
  return KNOWN_TYPES.has(value);
}

/**
 * Opaque resource body. The cache only relies on the `name` field, the rest
 * of the payload belongs to the encoding layer.
 */
export interface Resource {
  readonly name: string;
  readonly [field: string]: unknown;
}

/** Versioned collection of resources for one category. */
export interface Resources {
  readonly version: string;
  readonly items: ReadonlyMap<string, Resource>;
}

/**
 * Indexes resources by name. Duplicate names are rejected because a
 * subscriber asking for a name must receive exactly one body.
 */
export function indexResourcesByName(items: Iterable<Resource>): ReadonlyMap<string, Resource> {
  const index = new Map<string, Resource>();
  for (const item of items) {
    if (item.name.length === 0) {
      throw new InvalidRequestError("resource name must not be empty");
    }
    if (index.has(item.name)) {
      throw new InvalidRequestError(`duplicate resource name '${item.name}'`, {
        details: { name: item.name },
      });
    }
    index.set(item.name, item);
  }
  return index;
}

/** Builds an immutable collection at the provided version. */
export function createResources(version: string, items: Iterable<Resource> = []): Resources {
  return Object.freeze({ version, items: indexResourcesByName(items) });
}

/** Collection used for categories a snapshot never populated. */
export const EMPTY_RESOURCES: Resources = createResources("");

/**
 * Restricts a collection to the requested names. An empty name set selects
 * every item.
 */
export function filterResources(
  items: ReadonlyMap<string, Resource>,
  names: ReadonlySet<string>,
): ReadonlyMap<string, Resource> {
  if (names.size === 0) {
    return items;
  }
  const filtered = new Map<string, Resource>();
  for (const name of names) {
    const item = items.get(name);
    if (item !== undefined) {
      filtered.set(name, item);
    }
  }
  return filtered;
}
