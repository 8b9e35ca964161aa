import { IdHash } from "../../src/xds/nodeHash.js";
import { ResourceTypes, type Resource, type ResourceType } from "../../src/xds/resources.js";
import { Snapshot } from "../../src/xds/snapshot.js";
import { SnapshotCache } from "../../src/xds/snapshotCache.js";
import { RecordingLogger } from "./recordingLogger.js";

export const clusterName = "cluster0";
export const routeName = "route0";
export const listenerName = "listener0";
export const runtimeName = "runtime0";

/** Group key used for requests without a node identity. */
export const key = "node";

export const version = "x";
export const version2 = "y";

export function makeEndpoint(cluster: string, port: number): Resource {
  return { name: cluster, endpoints: [{ address: "127.0.0.1", port }] };
}

export function makeCluster(name: string): Resource {
  return { name, discovery: "EDS", edsServiceName: name };
}

export function makeRoute(name: string, cluster: string): Resource {
  return { name, virtualHosts: [{ domains: ["*"], cluster }] };
}

export function makeListener(name: string, port: number, route: string): Resource {
  return { name, port, routeConfigName: route };
}

export function makeRuntime(name: string): Resource {
  return { name, layer: { "field-0": 100 } };
}

export function makeSecret(name: string): Resource {
  return { name, private_key: "test-secret" };
}

/** Snapshot with one resource per category except secrets, all at {@link snapshotVersion}. */
export function sampleSnapshot(snapshotVersion: string = version): Snapshot {
  return Snapshot.create(snapshotVersion, {
    [ResourceTypes.endpoint]: [makeEndpoint(clusterName, 8080)],
    [ResourceTypes.cluster]: [makeCluster(clusterName)],
    [ResourceTypes.route]: [makeRoute(routeName, clusterName)],
    [ResourceTypes.listener]: [makeListener(listenerName, 80, routeName)],
    [ResourceTypes.runtime]: [makeRuntime(runtimeName)],
  });
}

/** Categories exercised by the watch scenarios. */
export const testTypes: readonly ResourceType[] = [
  ResourceTypes.endpoint,
  ResourceTypes.cluster,
  ResourceTypes.route,
  ResourceTypes.listener,
  ResourceTypes.runtime,
];

/** Names requested per category; an empty list asks for everything. */
export const names: Record<ResourceType, string[]> = {
  [ResourceTypes.endpoint]: [clusterName],
  [ResourceTypes.cluster]: [],
  [ResourceTypes.route]: [routeName],
  [ResourceTypes.listener]: [],
  [ResourceTypes.secret]: [],
  [ResourceTypes.runtime]: [],
};

export interface CacheHarness {
  cache: SnapshotCache;
  logger: RecordingLogger;
}

export function createCache(options: { ads?: boolean; now?: () => number } = {}): CacheHarness {
  const logger = new RecordingLogger();
  const cache = new SnapshotCache({
    ads: options.ads ?? true,
    hash: new IdHash({ fallbackKey: key }),
    logger,
    ...(options.now ? { now: options.now } : {}),
  });
  return { cache, logger };
}
