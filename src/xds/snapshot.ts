import {
  EMPTY_RESOURCES,
  RESOURCE_TYPES,
  createResources,
  type Resource,
  type Resources,
  type ResourceType,
} from "./resources.js";

/** Raw per-category items accepted by {@link Snapshot.create}. */
export type SnapshotItems = Partial<Record<ResourceType, Iterable<Resource>>>;

/** Pre-built per-category collections accepted by {@link Snapshot.fromResources}. */
export type SnapshotResources = Partial<Record<ResourceType, Resources>>;

/**
 * Immutable desired state of one group: exactly one collection per category.
 * Derived snapshots share the collections they do not replace, so bumping a
 * single category never copies the others.
 */
export class Snapshot {
  private readonly collections: ReadonlyMap<ResourceType, Resources>;

  private constructor(collections: ReadonlyMap<ResourceType, Resources>) {
    this.collections = collections;
    Object.freeze(this);
  }

  /** Builds a snapshot where every populated category carries {@link version}. */
  static create(version: string, items: SnapshotItems = {}): Snapshot {
    const resources: SnapshotResources = {};
    for (const type of RESOURCE_TYPES) {
      const entries = items[type];
      if (entries !== undefined) {
        resources[type] = createResources(version, entries);
      }
    }
    return Snapshot.fromResources(resources);
  }

  /**
   * Builds a snapshot from existing collections. Missing categories get the
   * shared empty, unversioned collection.
   */
  static fromResources(resources: SnapshotResources): Snapshot {
    const collections = new Map<ResourceType, Resources>();
    for (const type of RESOURCE_TYPES) {
      collections.set(type, resources[type] ?? EMPTY_RESOURCES);
    }
    return new Snapshot(collections);
  }

  getSupportedTypes(): readonly ResourceType[] {
    return RESOURCE_TYPES;
  }

  getVersion(type: ResourceType): string {
    return this.getCollection(type).version;
  }

  getResources(type: ResourceType): ReadonlyMap<string, Resource> {
    return this.getCollection(type).items;
  }

  getCollection(type: ResourceType): Resources {
    return this.collections.get(type) ?? EMPTY_RESOURCES;
  }

  /**
   * Returns a snapshot where {@link type} keeps its items under a new
   * version. The same instance is returned when nothing changes.
   */
  withVersion(type: ResourceType, version: string): Snapshot {
    const current = this.getCollection(type);
    if (current.version === version) {
      return this;
    }
    return this.withResources(type, Object.freeze({ version, items: current.items }));
  }

  /** Returns a snapshot where {@link type} is replaced by {@link resources}. */
  withResources(type: ResourceType, resources: Resources): Snapshot {
    const collections = new Map(this.collections);
    collections.set(type, resources);
    return new Snapshot(collections);
  }

  /** Version of every category, keyed by type URL. */
  describeVersions(): Partial<Record<ResourceType, string>> {
    const versions: Partial<Record<ResourceType, string>> = {};
    for (const type of RESOURCE_TYPES) {
      versions[type] = this.getVersion(type);
    }
    return versions;
  }
}
