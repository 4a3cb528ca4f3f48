import { describe, expect, it } from "vitest";
import { buildRecord, testPipelineConfig } from "../../__tests__/fixtures";
import { GeofenceService, haversineMeters } from "./geofenceService";

const geofence = new GeofenceService(testPipelineConfig().region);

describe("GeofenceService", () => {
  it("excludes denylisted cities regardless of coordinates", () => {
    const record = buildRecord({
      id: "curated:1",
      name: "Ridge Cell",
      city: "Davis",
      address: "1 Market St, San Francisco, CA",
      location: { lat: 37.7749, lng: -122.4194 },
    });

    expect(geofence.check(record)).toEqual({
      inScope: false,
      reason: "explicitly denylisted",
    });
  });

  it("never lets the override bypass the denylist", () => {
    const record = buildRecord({
      id: "curated:2",
      name: "Valley Labs",
      address: "10 K St, Sacramento, CA 95814",
      geofenceOverride: true,
    });

    expect(geofence.check(record)).toEqual({
      inScope: false,
      reason: "explicitly denylisted",
    });
  });

  it("accepts the override for non-whitelisted places", () => {
    const record = buildRecord({
      id: "curated:3",
      name: "Remote Lab",
      city: "Stockton",
      geofenceOverride: true,
    });

    expect(geofence.check(record)).toEqual({ inScope: true, via: "override" });
  });

  it("resolves aliases before the whitelist", () => {
    const record = buildRecord({ id: "v:1", name: "Harbor", city: "South SF" });

    expect(geofence.check(record)).toEqual({ inScope: true, via: "city" });
    expect(geofence.canonicalCity(" south sf ")).toBe("South San Francisco");
  });

  it("falls back to the city in the address", () => {
    const record = buildRecord({
      id: "v:2",
      name: "Foghorn",
      address: "400 Bay St, San Francisco, CA 94133",
    });

    expect(geofence.check(record)).toEqual({ inScope: true, via: "address" });
  });

  it("uses the radius backstop for unknown cities", () => {
    const near = buildRecord({
      id: "v:3",
      name: "Near",
      city: "Colma",
      location: { lat: 37.6769, lng: -122.4597 },
    });
    const far = buildRecord({
      id: "v:4",
      name: "Far",
      city: "Fresno",
      location: { lat: 36.7378, lng: -119.7871 },
    });

    expect(geofence.check(near)).toEqual({ inScope: true, via: "radius" });
    expect(geofence.check(far)).toEqual({
      inScope: false,
      reason: "outside radius",
    });
  });

  it("reports non-whitelisted cities without coordinates", () => {
    const record = buildRecord({ id: "v:5", name: "Nowhere", city: "Stockton" });

    expect(geofence.check(record)).toEqual({
      inScope: false,
      reason: "not in whitelist",
    });
  });

  it("requires every city candidate to be whitelisted", () => {
    const bothIn = buildRecord({
      id: "m:1",
      name: "Split",
      cityCandidates: ["Berkeley", "Oakland"],
    });
    const oneOut = buildRecord({
      id: "m:2",
      name: "Split",
      cityCandidates: ["Berkeley", "Stockton"],
    });

    expect(geofence.check(bothIn)).toEqual({ inScope: true, via: "city" });
    expect(geofence.check(oneOut)).toEqual({
      inScope: false,
      reason: "not in whitelist",
    });
  });

  it("extracts cities from addresses", () => {
    expect(geofence.cityFromAddress("1 Main St, Berkeley, CA")).toBe("Berkeley");
    expect(
      geofence.cityFromAddress("55 Dock Rd, South San Francisco, California 94080"),
    ).toBe("South San Francisco");
    expect(geofence.cityFromAddress("Oakland, CA 94607")).toBe("Oakland");
    expect(geofence.cityFromAddress("somewhere")).toBeUndefined();
  });

  it("splits records into in-scope and excluded with reasons", () => {
    const kept = buildRecord({ id: "a", name: "Kept", city: "Oakland" });
    const dropped = buildRecord({ id: "b", name: "Dropped", city: "San Diego" });

    const result = geofence.filter([kept, dropped]);

    expect(result.inScope).toEqual([kept]);
    expect(result.excluded).toEqual([
      { record: dropped, reason: "explicitly denylisted" },
    ]);
  });

  it("computes haversine distances", () => {
    expect(
      haversineMeters({ lat: 0, lng: 0 }, { lat: 0, lng: 1 }),
    ).toBeCloseTo(111_195, -1);
  });
});
