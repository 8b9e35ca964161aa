import { z } from "zod";

import { InvalidRequestError } from "./errors.js";
import { isResourceType, type Resource, type ResourceType } from "./resources.js";

/** Identity advertised by a subscriber. Unknown fields are stripped. */
export const SubscriberIdentitySchema = z.object({
  id: z.string(),
  cluster: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
});

/**
 * Shape of a subscription request as handed over by the transport. Only the
 * category, the names, the known version and the identity are consumed.
 */
export const SubscriptionRequestSchema = z.object({
  typeUrl: z.string().refine(isResourceType, (value) => ({
    message: `unsupported resource type '${value}'`,
  })),
  resourceNames: z.array(z.string()).default([]),
  versionInfo: z.string().default(""),
  node: SubscriberIdentitySchema.nullable().default(null),
});

export type SubscriberIdentity = z.infer<typeof SubscriberIdentitySchema>;

/** Request accepted by the cache before normalisation. */
export type SubscriptionRequestInput = z.input<typeof SubscriptionRequestSchema>;

/** Normalised request tracked by watches and echoed in responses. */
export interface SubscriptionRequest {
  readonly typeUrl: ResourceType;
  readonly resourceNames: ReadonlySet<string>;
  readonly versionInfo: string;
  readonly node: SubscriberIdentity | null;
}

/** Payload delivered to a resolved watch or returned by a fetch. */
export interface WatchResponse {
  readonly request: SubscriptionRequest;
  readonly version: string;
  readonly resources: ReadonlyMap<string, Resource>;
}

/**
 * Validates the transport payload and freezes it into a
 * {@link SubscriptionRequest}. Schema failures surface as
 * {@link InvalidRequestError} with the zod issues attached.
 */
export function normaliseRequest(input: SubscriptionRequestInput): SubscriptionRequest {
  const parsed = SubscriptionRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidRequestError("invalid subscription request", {
      details: { issues: parsed.error.issues },
    });
  }
  const { typeUrl, resourceNames, versionInfo, node } = parsed.data;
  return Object.freeze({
    typeUrl,
    resourceNames: new Set(resourceNames),
    versionInfo,
    node,
  });
}
