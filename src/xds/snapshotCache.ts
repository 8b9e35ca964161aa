import { ResponseChannel } from "./channel.js";
import { InvalidRequestError, SnapshotCacheError, SnapshotNotFoundError } from "./errors.js";
import type { GroupKeyResolver } from "./nodeHash.js";
import {
  normaliseRequest,
  type SubscriptionRequest,
  type SubscriptionRequestInput,
  type WatchResponse,
} from "./request.js";
import { resolveRequest, type UnresolvedReason } from "./resolution.js";
import type { Snapshot } from "./snapshot.js";
import { GroupState, type StatusInfo } from "./statusInfo.js";

/** Logging capability consumed by the cache. {@link StructuredLogger} satisfies it. */
export interface SnapshotCacheLogger {
  info(message: string, payload?: unknown): void;
  error(message: string, payload?: unknown): void;
  debug?(message: string, payload?: unknown): void;
}

/** Options accepted when instantiating the cache. */
export interface SnapshotCacheOptions {
  /** Aggregate discovery mode, exposed to the transport through {@link SnapshotCache.aggregated}. */
  ads: boolean;
  /** Resolver deriving group keys from subscriber identities. */
  hash: GroupKeyResolver;
  logger: SnapshotCacheLogger;
  /** Clock used for status bookkeeping. Defaults to {@link Date.now}. */
  now?: () => number;
}

/** Per-call options of {@link SnapshotCache.createWatch} and {@link SnapshotCache.fetch}. */
export interface WatchTarget {
  /** Group key already resolved by the transport; bypasses the resolver. */
  groupKey?: string;
}

/** Handle returned by {@link SnapshotCache.createWatch}. */
export interface Watch {
  readonly id: number;
  readonly key: string;
  readonly channel: ResponseChannel;
  /** Removes the watch if still pending. Safe to call any number of times. */
  readonly cancel: () => void;
}

/** Outcome of {@link SnapshotCache.fetch}. */
export type FetchResult =
  | { readonly status: "ok"; readonly key: string; readonly response: WatchResponse }
  | { readonly status: "not_found"; readonly key: string }
  | {
      readonly status: "no_update";
      readonly key: string;
      readonly version: string;
      readonly reason: UnresolvedReason;
    };

/**
 * Snapshot cache holding the desired configuration of every group and the
 * watches parked on it.
 *
 * Each public method runs synchronously from start to finish, so the scan
 * and mutation of one group's state can never interleave with another
 * operation. Deliveries are offers into single-slot channels and never wait
 * on the consumer.
 */
export class SnapshotCache {
  private readonly groups = new Map<string, GroupState>();
  private readonly ads: boolean;
  private readonly hash: GroupKeyResolver;
  private readonly logger: SnapshotCacheLogger;
  private readonly now: () => number;
  private watchCount = 0;

  constructor(options: SnapshotCacheOptions) {
    this.ads = options.ads;
    this.hash = options.hash;
    this.logger = options.logger;
    this.now = options.now ?? (() => Date.now());
  }

  /** Whether the cache runs in aggregate discovery mode. */
  get aggregated(): boolean {
    return this.ads;
  }

  /**
   * Stores the snapshot of {@link key} and answers every pending watch the
   * new snapshot satisfies. Unsatisfied watches stay parked.
   */
  setSnapshot(key: string, snapshot: Snapshot): void {
    const group = this.getOrCreateGroup(assertGroupKey(key));
    group.snapshot = snapshot;

    let responded = 0;
    for (const watch of [...group.watches.values()]) {
      const resolution = resolveRequest(watch.request, snapshot);
      if (!resolution.resolved) {
        if (resolution.reason !== "up_to_date") {
          this.logger.debug?.("xds_watch_withheld", {
            key,
            watch_id: watch.id,
            type_url: watch.request.typeUrl,
            version: resolution.version,
            reason: resolution.reason,
            resource_names: [...watch.request.resourceNames],
          });
        }
        continue;
      }
      group.removeWatch(watch.id);
      this.logger.info("xds_watch_responded", {
        key,
        watch_id: watch.id,
        type_url: watch.request.typeUrl,
        resource_names: [...watch.request.resourceNames],
        version: resolution.response.version,
      });
      watch.channel.offer(resolution.response);
      responded += 1;
    }

    this.logger.debug?.("xds_snapshot_set", {
      key,
      versions: snapshot.describeVersions(),
      responded,
      pending: group.watches.size,
    });
  }

  /** Returns the snapshot last set for {@link key}. */
  getSnapshot(key: string): Snapshot {
    const snapshot = this.groups.get(key)?.snapshot ?? null;
    if (snapshot === null) {
      throw new SnapshotNotFoundError(key);
    }
    return snapshot;
  }

  /** Drops the group and cancels its watches without answering them. */
  clearSnapshot(key: string): void {
    const group = this.groups.get(key);
    if (!group) {
      return;
    }
    this.groups.delete(key);
    const cancelled = group.cancelAll();
    this.logger.info("xds_snapshot_cleared", { key, cancelled_watches: cancelled });
  }

  /**
   * Opens a watch. The channel is pre-loaded when the current snapshot
   * already satisfies the request; otherwise the watch is parked until a
   * later {@link setSnapshot} does.
   */
  createWatch(input: SubscriptionRequestInput, target: WatchTarget = {}): Watch {
    const request = normaliseRequest(input);
    const key = this.resolveKey(request, target);
    const group = this.getOrCreateGroup(key);
    group.node = request.node;
    group.lastWatchRequestTime = this.now();

    this.watchCount += 1;
    const id = this.watchCount;
    const channel = new ResponseChannel(id);

    if (group.snapshot !== null) {
      const resolution = resolveRequest(request, group.snapshot);
      if (resolution.resolved) {
        this.logger.info("xds_watch_responded", {
          key,
          watch_id: id,
          type_url: request.typeUrl,
          resource_names: [...request.resourceNames],
          version: resolution.response.version,
          immediate: true,
        });
        channel.offer(resolution.response);
        return { id, key, channel, cancel: () => undefined };
      }
    }

    group.addWatch({ id, request, channel });
    this.logger.info("xds_watch_opened", {
      key,
      watch_id: id,
      type_url: request.typeUrl,
      resource_names: [...request.resourceNames],
      version: request.versionInfo,
    });

    const cancel = () => {
      // The group may have been cleared and re-created since; ids are never reused.
      const current = this.groups.get(key);
      if (current !== undefined && current.removeWatch(id)) {
        channel.close();
        this.logger.debug?.("xds_watch_cancelled", { key, watch_id: id });
      }
    };
    return { id, key, channel, cancel };
  }

  /** Single non-blocking resolution attempt; never parks a watch. */
  fetch(input: SubscriptionRequestInput, target: WatchTarget = {}): FetchResult {
    const request = normaliseRequest(input);
    const key = this.resolveKey(request, target);
    const snapshot = this.groups.get(key)?.snapshot ?? null;
    if (snapshot === null) {
      return { status: "not_found", key };
    }
    const resolution = resolveRequest(request, snapshot);
    if (!resolution.resolved) {
      return { status: "no_update", key, version: resolution.version, reason: resolution.reason };
    }
    return { status: "ok", key, response: resolution.response };
  }

  getStatusInfo(key: string): StatusInfo | null {
    return this.groups.get(key)?.describe() ?? null;
  }

  getStatusKeys(): string[] {
    return [...this.groups.keys()];
  }

  private getOrCreateGroup(key: string): GroupState {
    let group = this.groups.get(key);
    if (!group) {
      group = new GroupState(key);
      this.groups.set(key, group);
    }
    return group;
  }

  private resolveKey(request: SubscriptionRequest, target: WatchTarget): string {
    if (target.groupKey !== undefined) {
      return assertGroupKey(target.groupKey);
    }
    let key: string;
    try {
      key = this.hash.resolve(request.node);
    } catch (error) {
      this.logger.error("xds_group_key_unresolved", {
        node: request.node,
        message: error instanceof Error ? error.message : String(error),
      });
      if (error instanceof SnapshotCacheError) {
        throw error;
      }
      throw new InvalidRequestError("group key resolver failed", { cause: error });
    }
    return assertGroupKey(key);
  }
}

function assertGroupKey(key: string): string {
  if (key.length === 0) {
    throw new InvalidRequestError("group key must not be empty");
  }
  return key;
}
