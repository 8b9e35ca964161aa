import { filterResources } from "./resources.js";
import type { SubscriptionRequest, WatchResponse } from "./request.js";
import type { Snapshot } from "./snapshot.js";

/** Why a request was left unanswered by {@link resolveRequest}. */
export type UnresolvedReason =
  /** The subscriber already holds the snapshot version of its category. */
  | "up_to_date"
  /** None of the requested names exist in the category. */
  | "names_unmatched";

export type Resolution =
  | { readonly resolved: true; readonly response: WatchResponse }
  | { readonly resolved: false; readonly reason: UnresolvedReason; readonly version: string };

/**
 * Decides whether {@link request} should be answered from {@link snapshot}.
 *
 * A differing version alone is not enough. Categories are versioned
 * independently and a name filter may legitimately select nothing, in which
 * case answering would wake the subscriber without progress.
 */
export function resolveRequest(request: SubscriptionRequest, snapshot: Snapshot): Resolution {
  const version = snapshot.getVersion(request.typeUrl);
  if (version === request.versionInfo) {
    return { resolved: false, reason: "up_to_date", version };
  }

  const all = snapshot.getResources(request.typeUrl);
  if (request.resourceNames.size === 0) {
    return { resolved: true, response: { request, version, resources: all } };
  }

  const filtered = filterResources(all, request.resourceNames);
  if (filtered.size === 0) {
    return { resolved: false, reason: "names_unmatched", version };
  }
  return { resolved: true, response: { request, version, resources: filtered } };
}
