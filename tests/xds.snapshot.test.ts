import { describe, it } from "mocha";
import { expect } from "chai";

import { InvalidRequestError } from "../src/xds/errors.js";
import {
  EMPTY_RESOURCES,
  RESOURCE_TYPES,
  ResourceTypes,
  createResources,
  filterResources,
  isResourceType,
} from "../src/xds/resources.js";
import { Snapshot } from "../src/xds/snapshot.js";
import { clusterName, makeCluster, makeEndpoint, sampleSnapshot, version } from "./helpers/xdsFixtures.js";

describe("xds resources", () => {
  it("indexes items by name", () => {
    const resources = createResources("v1", [makeCluster("a"), makeCluster("b")]);

    expect(resources.version).to.equal("v1");
    expect([...resources.items.keys()]).to.deep.equal(["a", "b"]);
    expect(Object.isFrozen(resources)).to.equal(true);
  });

  it("rejects duplicate and empty names", () => {
    expect(() => createResources("v1", [makeCluster("a"), makeCluster("a")])).to.throw(
      InvalidRequestError,
      "duplicate resource name 'a'",
    );
    expect(() => createResources("v1", [makeCluster("")])).to.throw(InvalidRequestError, "resource name must not be empty");
  });

  it("filters by name and keeps everything for an empty filter", () => {
    const items = createResources("v1", [makeCluster("a"), makeCluster("b")]).items;

    expect(filterResources(items, new Set())).to.equal(items);
    expect([...filterResources(items, new Set(["b", "z"])).keys()]).to.deep.equal(["b"]);
  });

  it("recognises the supported type URLs", () => {
    expect(isResourceType(ResourceTypes.secret)).to.equal(true);
    expect(isResourceType("type.googleapis.com/envoy.api.v2.Unknown")).to.equal(false);
  });
});

describe("xds snapshot", () => {
  it("fills unpopulated categories with the empty collection", () => {
    const snapshot = Snapshot.create("v1", { [ResourceTypes.cluster]: [makeCluster(clusterName)] });

    expect(snapshot.getVersion(ResourceTypes.cluster)).to.equal("v1");
    expect(snapshot.getCollection(ResourceTypes.secret)).to.equal(EMPTY_RESOURCES);
    expect(snapshot.getVersion(ResourceTypes.secret)).to.equal("");
    expect(snapshot.getResources(ResourceTypes.secret).size).to.equal(0);
    expect(snapshot.getSupportedTypes()).to.deep.equal(RESOURCE_TYPES);
  });

  it("returns the same instance when the version does not change", () => {
    const snapshot = sampleSnapshot();

    expect(snapshot.withVersion(ResourceTypes.route, version)).to.equal(snapshot);
  });

  it("bumps one category while sharing the others", () => {
    const snapshot = sampleSnapshot();

    const bumped = snapshot.withVersion(ResourceTypes.endpoint, "x2");

    expect(bumped).to.not.equal(snapshot);
    expect(bumped.getVersion(ResourceTypes.endpoint)).to.equal("x2");
    expect(bumped.getResources(ResourceTypes.endpoint)).to.equal(snapshot.getResources(ResourceTypes.endpoint));
    expect(bumped.getCollection(ResourceTypes.cluster)).to.equal(snapshot.getCollection(ResourceTypes.cluster));
    expect(snapshot.getVersion(ResourceTypes.endpoint)).to.equal(version);
  });

  it("replaces one collection", () => {
    const snapshot = sampleSnapshot();
    const endpoints = createResources("y", [makeEndpoint(clusterName, 9090)]);

    const replaced = snapshot.withResources(ResourceTypes.endpoint, endpoints);

    expect(replaced.getCollection(ResourceTypes.endpoint)).to.equal(endpoints);
    expect(replaced.getCollection(ResourceTypes.listener)).to.equal(snapshot.getCollection(ResourceTypes.listener));
    expect(replaced.describeVersions()).to.deep.equal({
      [ResourceTypes.cluster]: version,
      [ResourceTypes.endpoint]: "y",
      [ResourceTypes.listener]: version,
      [ResourceTypes.route]: version,
      [ResourceTypes.secret]: "",
      [ResourceTypes.runtime]: version,
    });
  });

  it("builds from existing collections", () => {
    const clusters = createResources("c1", [makeCluster("a")]);

    const snapshot = Snapshot.fromResources({ [ResourceTypes.cluster]: clusters });

    expect(snapshot.getCollection(ResourceTypes.cluster)).to.equal(clusters);
    expect(snapshot.getVersion(ResourceTypes.endpoint)).to.equal("");
    expect(Object.isFrozen(snapshot)).to.equal(true);
  });
});
