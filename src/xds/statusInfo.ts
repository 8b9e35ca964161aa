import type { ResponseChannel } from "./channel.js";
import type { SubscriberIdentity, SubscriptionRequest } from "./request.js";
import type { Snapshot } from "./snapshot.js";

/** Watch parked on a group until a snapshot satisfies its request. */
export interface PendingWatch {
  readonly id: number;
  readonly request: SubscriptionRequest;
  readonly channel: ResponseChannel;
}

/** Read-only view of a group's bookkeeping. */
export interface StatusInfo {
  readonly key: string;
  readonly node: SubscriberIdentity | null;
  readonly numWatches: number;
  /** Epoch milliseconds of the last watch request, `null` before any. */
  readonly lastWatchRequestTime: number | null;
  readonly hasSnapshot: boolean;
}

/**
 * Mutable per-group record owned by the cache. Every mutation happens inside
 * a synchronous cache operation, which makes each one atomic with respect to
 * the other operations touching the same key.
 */
export class GroupState {
  snapshot: Snapshot | null = null;
  node: SubscriberIdentity | null = null;
  lastWatchRequestTime: number | null = null;
  readonly watches = new Map<number, PendingWatch>();

  constructor(readonly key: string) {}

  addWatch(watch: PendingWatch): void {
    this.watches.set(watch.id, watch);
  }

  /** Returns true when the watch was still pending. */
  removeWatch(id: number): boolean {
    return this.watches.delete(id);
  }

  /** Closes and drops every pending watch. */
  cancelAll(): number {
    const count = this.watches.size;
    for (const watch of this.watches.values()) {
      watch.channel.close();
    }
    this.watches.clear();
    return count;
  }

  describe(): StatusInfo {
    return {
      key: this.key,
      node: this.node,
      numWatches: this.watches.size,
      lastWatchRequestTime: this.lastWatchRequestTime,
      hasSnapshot: this.snapshot !== null,
    };
  }
}
