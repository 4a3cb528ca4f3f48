import { describe, expect, it } from "vitest";
import { buildRecord, testPipelineConfig } from "../../__tests__/fixtures";
import { InMemoryTabularStore } from "../../__tests__/inMemoryStores";
import type { TableRow } from "../../core/ports/outboundPorts";
import { ArtifactCodec } from "./artifactCodec";
import { GeofenceService } from "./geofenceService";
import { NormalizationService } from "./normalizationService";
import { PromotionService } from "./promotionService";
import { ValidationGateService } from "./validationGateService";

const config = testPipelineConfig();
const normalizer = new NormalizationService({
  legalSuffixes: config.names.legalSuffixes,
  aggregators: config.domains.aggregators,
});
const geofence = new GeofenceService(config.region);
const codec = new ArtifactCodec(normalizer, geofence);

const acme = buildRecord({
  id: "acmebio.com|acme bio",
  name: "Acme Bio",
  normalizedName: "acme bio",
  website: "https://acmebio.com",
  domainKey: "acmebio.com",
  city: "Berkeley",
  address: "1 Main St, Berkeley, CA 94704, USA",
  addressOrigin: "lookup",
  placeId: "place-acme",
  confidence: 1,
  validationSource: "path_a",
  lastVerified: "2025-11-16",
});

const createService = (working: TableRow[], companies: TableRow[]) => {
  const store = new InMemoryTabularStore({
    "staging/companies_working.csv": working,
    "staging/companies.csv": companies,
  });
  const service = new PromotionService(
    store,
    new ValidationGateService(normalizer, geofence, config.domains.allowList),
    codec,
    { now: () => new Date("2025-11-16T12:00:00.000Z") },
    "staging",
    "final/companies.csv",
  );
  return { store, service };
};

describe("PromotionService", () => {
  it("replaces the production file and records the promotion time", async () => {
    const { store, service } = createService(
      [codec.workingRow(acme)],
      [codec.productionRow(acme)],
    );

    const result = await service.promote();

    expect(result).toEqual({
      status: "promoted",
      rows: 1,
      productionPath: "final/companies.csv",
      promotedAt: "2025-11-16T12:00:00.000Z",
    });
    expect(store.tables.get("final/companies.csv")?.rows).toEqual([
      codec.productionRow(acme),
    ]);
    expect(store.text.get("final/last_updated.txt")).toBe(
      "2025-11-16T12:00:00.000Z\n",
    );
  });

  it("refuses when a looked-up address lost its place id", async () => {
    const { store, service } = createService(
      [{ ...codec.workingRow(acme), "Place ID": "" }],
      [codec.productionRow(acme)],
    );

    const result = await service.promote();

    expect(result.status).toBe("refused");
    if (result.status !== "refused") {
      throw new Error("expected refusal");
    }
    expect(result.rejected[0]?.failures.map((failure) => failure.check)).toEqual([
      "address_has_place_id",
    ]);
    expect(store.tables.has("final/companies.csv")).toBe(false);
  });

  it("reports a stage outside the closed set", () => {
    const { service } = createService([], []);

    const result = service.revalidate([
      { ...codec.workingRow(acme), "Company Stage": "Series B" },
    ]);

    expect(result.promoted).toEqual([]);
    expect(result.rejected[0]?.failures).toEqual([
      {
        check: "stage_membership",
        passed: false,
        explanation: 'stage "Series B" is not a recognised stage',
      },
    ]);
    expect(result.failureCounts.stage_membership).toBe(1);
  });

  it("refuses an empty staged set", async () => {
    const { service } = createService([], []);

    const result = await service.promote();

    expect(result).toEqual({
      status: "refused",
      reason: "staged working artifact has no rows",
      rejected: [],
    });
  });

  it("refuses when staged files disagree on row count", async () => {
    const { service } = createService([codec.workingRow(acme)], []);

    const result = await service.promote();

    expect(result.status === "refused" && result.reason).toBe(
      "staged companies.csv has 0 rows but the working artifact has 1",
    );
  });
});
