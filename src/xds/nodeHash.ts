import { InvalidRequestError } from "./errors.js";
import type { SubscriberIdentity } from "./request.js";

/**
 * Maps a subscriber identity to the key of the group whose snapshot it
 * consumes. Subscribers resolving to the same key share one snapshot.
 */
export interface GroupKeyResolver {
  resolve(node: SubscriberIdentity | null): string;
}

export interface IdHashOptions {
  /** Key used when the request carries no identity at all. */
  fallbackKey?: string | null;
}

/** Groups subscribers by their node identifier. */
export class IdHash implements GroupKeyResolver {
  private readonly fallbackKey: string | null;

  constructor(options: IdHashOptions = {}) {
    this.fallbackKey = options.fallbackKey ?? null;
  }

  resolve(node: SubscriberIdentity | null): string {
    if (node !== null) {
      return node.id;
    }
    if (this.fallbackKey !== null) {
      return this.fallbackKey;
    }
    throw new InvalidRequestError("subscription request carries no node identity", {
      hint: "configure a fallback group key or send a node identifier",
    });
  }
}

/** Wraps a plain function into a {@link GroupKeyResolver}. */
export function groupKeyResolver(fn: (node: SubscriberIdentity | null) => string): GroupKeyResolver {
  return { resolve: fn };
}
