export { StructuredLogger, LOG_LEVELS, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export {
  createSnapshotCacheFromEnv,
  loadSnapshotCacheConfig,
  type ConfiguredSnapshotCache,
  type SnapshotCacheConfig,
} from "./config/cacheConfig.js";
export type { EnvSource } from "./config/env.js";
export { ResponseChannel, type ReceiveOptions } from "./xds/channel.js";
export {
  InvalidRequestError,
  SnapshotCacheError,
  SnapshotNotFoundError,
  WatchAbortedError,
  type SnapshotCacheErrorOptions,
} from "./xds/errors.js";
export { IdHash, groupKeyResolver, type GroupKeyResolver, type IdHashOptions } from "./xds/nodeHash.js";
export {
  SubscriberIdentitySchema,
  SubscriptionRequestSchema,
  normaliseRequest,
  type SubscriberIdentity,
  type SubscriptionRequest,
  type SubscriptionRequestInput,
  type WatchResponse,
} from "./xds/request.js";
export { resolveRequest, type Resolution, type UnresolvedReason } from "./xds/resolution.js";
export {
  EMPTY_RESOURCES,
  RESOURCE_TYPES,
  ResourceTypes,
  createResources,
  filterResources,
  indexResourcesByName,
  isResourceType,
  type Resource,
  type ResourceType,
  type Resources,
} from "./xds/resources.js";
export { Snapshot, type SnapshotItems, type SnapshotResources } from "./xds/snapshot.js";
export {
  SnapshotCache,
  type FetchResult,
  type SnapshotCacheLogger,
  type SnapshotCacheOptions,
  type Watch,
  type WatchTarget,
} from "./xds/snapshotCache.js";
export type { PendingWatch, StatusInfo } from "./xds/statusInfo.js";
