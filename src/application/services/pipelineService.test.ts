import { describe, expect, it } from "vitest";
import { testPipelineConfig } from "../../__tests__/fixtures";
import {
  InMemoryCheckpointStore,
  InMemoryTabularStore,
} from "../../__tests__/inMemoryStores";
import { PipelineConfigError } from "../../core/entities/appError";
import type { PlaceDetails } from "../../core/ports/inboundPorts";
import type {
  LookupCacheEntry,
  LookupCachePort,
  TableRow,
} from "../../core/ports/outboundPorts";
import { MockPlaceLookup } from "../../infra/mocks/mockPlaceLookup";
import { MockReasoner } from "../../infra/mocks/mockReasoner";
import { CachedPlaceLookup } from "../../infra/places/cachedPlaceLookup";
import {
  parseStageRuleTable,
  type SourceDefinition,
} from "../../shared/config/pipelineConfig";
import { ArtifactCodec } from "./artifactCodec";
import { CandidateScoringService } from "./candidateScoringService";
import { DeduplicationService } from "./deduplicationService";
import { EnrichmentRouterService } from "./enrichmentRouterService";
import { GeofenceService } from "./geofenceService";
import { IngestionService } from "./ingestionService";
import { NormalizationService } from "./normalizationService";
import { PipelineService } from "./pipelineService";
import { RetryPolicy } from "./retryPolicy";
import { StageClassifierService } from "./stageClassifierService";
import { ValidationGateService } from "./validationGateService";

class MapCache implements LookupCachePort {
  private readonly entries = new Map<string, LookupCacheEntry>();

  async get(key: string): Promise<LookupCacheEntry | undefined> {
    return this.entries.get(key);
  }

  async put(key: string, entry: LookupCacheEntry): Promise<void> {
    this.entries.set(key, entry);
  }
}

const SOURCES: SourceDefinition[] = [
  {
    tag: "verified",
    path: "in/verified.csv",
    columns: {
      name: "Company Name",
      website: "Website",
      address: "Address",
      city: "City",
      stage: "Company Stage",
      focusAreas: "Focus Areas",
    },
  },
  {
    tag: "curated",
    path: "in/curated.csv",
    columns: {
      name: "Company",
      website: "URL",
      city: "City",
      state: "State",
      stage: "Stage",
      description: "Description",
    },
  },
  {
    tag: "scraped",
    path: "in/scraped.csv",
    columns: { name: "name", website: "website", address: "address", focusAreas: "focus" },
  },
];

const verifiedRows: TableRow[] = [
  {
    "Company Name": "Acme Bio Inc.",
    Website: "",
    Address: "1 Main St, Berkeley, CA",
    City: "Berkeley",
    "Company Stage": "",
    "Focus Areas": "Gene editing",
  },
];

const curatedRows: TableRow[] = [
  {
    Company: "Acme Bio",
    URL: "acmebio.com",
    City: "",
    State: "CA",
    Stage: "",
    Description: "Gene editing tools",
  },
  {
    Company: "Ridge Cell Therapeutics",
    URL: "ridgecell.com",
    City: "Davis",
    State: "CA",
    Stage: "Preclinical",
    Description: "Cell therapy",
  },
];

const scrapedRows: TableRow[] = [
  {
    name: "Foghorn Diagnostics",
    website: "n/a",
    address: "400 Bay St, San Francisco, CA",
    focus: "Diagnostics",
  },
];

const places: PlaceDetails[] = [
  {
    id: "mock-acme",
    name: "Acme Bio",
    formattedAddress: "1 Main St, Berkeley, CA 94704, USA",
    website: "https://www.acmebio.com/",
    types: ["point_of_interest", "establishment"],
    operationalStatus: "operational",
    location: { lat: 37.8716, lng: -122.2727 },
  },
  {
    id: "mock-foghorn",
    name: "Foghorn Diagnostics",
    formattedAddress: "400 Bay St, San Francisco, CA 94133, USA",
    website: "https://foghorndx.com/",
    types: ["health", "point_of_interest"],
    operationalStatus: "operational",
  },
];

const stageRules = parseStageRuleTable({
  version: "test-rules",
  aliases: { preclinical: "Preclinical" },
  rules: [
    { stage: "Tools/Services", keywords: ["research tools", "cro"] },
    { stage: "Preclinical", keywords: ["preclinical"] },
  ],
});

const createPipeline = (seed: Record<string, TableRow[]>) => {
  const config = testPipelineConfig();
  const store = new InMemoryTabularStore(seed);
  const checkpoint = new InMemoryCheckpointStore();
  const clock = { now: () => new Date("2025-11-16T12:00:00.000Z") };
  const normalizer = new NormalizationService({
    legalSuffixes: config.names.legalSuffixes,
    aggregators: config.domains.aggregators,
  });
  const geofence = new GeofenceService(config.region);
  const classifier = new StageClassifierService(stageRules);
  const lookup = new CachedPlaceLookup(
    new MockPlaceLookup(places),
    new MapCache(),
    2,
    { searchUsd: 0.032, detailsUsd: 0.017 },
  );
  const router = new EnrichmentRouterService(
    lookup,
    new MockReasoner(0.8),
    new CandidateScoringService(normalizer, geofence, config.enrichment),
    geofence,
    normalizer,
    new RetryPolicy({ attempts: 2, baseDelayMs: 0 }, { sleep: async () => {} }),
    checkpoint,
    clock,
    {
      concurrency: 2,
      queryHint: config.region.queryHint,
      queryQualifier: config.enrichment.queryQualifier,
      maxCandidates: config.enrichment.maxCandidates,
      reasoningAcceptanceThreshold: config.enrichment.reasoningAcceptanceThreshold,
      reasoningMultiTenantConfidence: config.enrichment.reasoningMultiTenantConfidence,
    },
  );

  const pipeline = new PipelineService(
    store,
    new IngestionService(store, normalizer, geofence, classifier),
    new DeduplicationService(normalizer, geofence, {
      sourcePriority: config.dedupe.sourcePriority,
      variantNameThreshold: config.dedupe.variantNameThreshold,
      allowListedDomains: config.domains.allowList,
    }),
    classifier,
    geofence,
    router,
    new ValidationGateService(normalizer, geofence, config.domains.allowList),
    checkpoint,
    lookup,
    new ArtifactCodec(normalizer, geofence),
    clock,
    "staging",
  );

  return { pipeline, store, checkpoint };
};

const baseSeed = (): Record<string, TableRow[]> => ({
  "in/verified.csv": verifiedRows,
  "in/curated.csv": curatedRows,
  "in/scraped.csv": scrapedRows,
});

describe("PipelineService", () => {
  it("merges, enriches and stages the Acme Bio records with stage Unknown", async () => {
    const { pipeline, store } = createPipeline(baseSeed());

    const summary = await pipeline.run({ sources: SOURCES });

    expect(store.tables.get("staging/companies.csv")?.rows).toEqual([
      {
        "Company Name": "Acme Bio Inc.",
        Website: "https://acmebio.com",
        City: "Berkeley",
        Address: "1 Main St, Berkeley, CA 94704, USA",
        "Company Stage": "Unknown",
        "Focus Areas": "Gene editing",
      },
      {
        "Company Name": "Foghorn Diagnostics",
        Website: "https://foghorndx.com",
        City: "San Francisco",
        Address: "400 Bay St, San Francisco, CA 94133, USA",
        "Company Stage": "Unknown",
        "Focus Areas": "Diagnostics",
      },
    ]);

    const working = store.tables.get("staging/companies_working.csv")?.rows ?? [];
    expect(working.map((row) => [row["Record ID"], row.Tier, row.Sources])).toEqual([
      ["acmebio.com|acme bio", "1", "verified; curated"],
      ["-|foghorn diagnostics", "3", "scraped"],
    ]);
    expect(working[1]?.["Validation Source"]).toBe("path_b");

    expect(store.tables.get("staging/geofence_excluded.csv")?.rows).toEqual([
      {
        "Record ID": "ridgecell.com|ridge cell therapeutics",
        "Company Name": "Ridge Cell Therapeutics",
        Website: "https://ridgecell.com",
        City: "Davis",
        Address: "",
        Sources: "curated",
        Reason: "explicitly denylisted",
      },
    ]);
    expect(store.tables.get("staging/manual_review_queue.csv")?.rows).toEqual([]);

    expect(summary).toEqual({
      startedAt: "2025-11-16T12:00:00.000Z",
      finishedAt: "2025-11-16T12:00:00.000Z",
      status: "completed",
      ingestedRows: 4,
      skippedRows: 0,
      mergedRecords: 3,
      classifiedStages: 0,
      domainConflicts: 0,
      geofenceExcluded: 1,
      enrichment: {
        pathA: 1,
        pathB: 1,
        accepted: 2,
        review: 0,
        resumedFromCheckpoint: 0,
      },
      promoted: 2,
      rejected: 0,
      checkFailures: {
        url_well_formed: 0,
        city_whitelist: 0,
        address_in_region: 0,
        domain_unique: 0,
        address_has_place_id: 0,
        stage_membership: 0,
        city_address_consistent: 0,
      },
      lookupUsage: {
        searchCalls: 2,
        detailsCalls: 2,
        cacheHits: 0,
        estimatedCostUsd: 0.098,
      },
    });
    expect(store.json.get("staging/run_summary.json")).toEqual(summary);
  });

  it("blocks every contender for a reused domain", async () => {
    const seed = baseSeed();
    seed["in/curated.csv"] = [
      ...curatedRows,
      {
        Company: "Zeta Labs",
        URL: "acmebio.com/zeta",
        City: "Oakland",
        State: "CA",
        Stage: "",
        Description: "",
      },
    ];
    const { pipeline, store } = createPipeline(seed);

    const summary = await pipeline.run({ sources: SOURCES });

    expect(store.tables.get("staging/domain_reuse_report.csv")?.rows).toEqual([
      {
        "Domain Key": "acmebio.com",
        "Record IDs": "acmebio.com|acme bio; acmebio.com|zeta labs",
        "Company Names": "Acme Bio Inc.; Zeta Labs",
        "Allow-Listed": "no",
      },
    ]);
    expect(
      store.tables
        .get("staging/manual_review_queue.csv")
        ?.rows.map((row) => [row["Record ID"], row["Pipeline Step"], row.Reason]),
    ).toEqual([
      [
        "acmebio.com|zeta labs",
        "enrichment",
        "no candidate met acceptance threshold",
      ],
      [
        "acmebio.com|acme bio",
        "validation",
        "domain_unique: domain acmebio.com is claimed by 2 records (acmebio.com|acme bio, acmebio.com|zeta labs)",
      ],
    ]);
    expect(summary.promoted).toBe(1);
    expect(summary.domainConflicts).toBe(1);
    expect(summary.checkFailures.domain_unique).toBe(1);
  });

  it("resumes from the checkpoint unless asked for a fresh run", async () => {
    const { pipeline, checkpoint } = createPipeline(baseSeed());

    await pipeline.run({ sources: SOURCES });
    const resumed = await pipeline.run({ sources: SOURCES });
    const fresh = await pipeline.run({ sources: SOURCES, fresh: true });

    expect(resumed.enrichment.resumedFromCheckpoint).toBe(2);
    expect(fresh.enrichment.resumedFromCheckpoint).toBe(0);
    expect(checkpoint.entries.size).toBe(2);
  });

  it("stages empty company files and skips the gate when aborted", async () => {
    const { pipeline, store } = createPipeline(baseSeed());
    const controller = new AbortController();
    controller.abort();

    const summary = await pipeline.run({ sources: SOURCES, signal: controller.signal });

    expect(summary.status).toBe("aborted");
    expect(summary.promoted).toBe(0);
    expect(store.tables.get("staging/companies.csv")?.rows).toEqual([]);
    expect(store.tables.get("staging/geofence_excluded.csv")?.rows).toHaveLength(1);
  });

  it("treats an unreadable source as a configuration error", async () => {
    const seed = baseSeed();
    delete seed["in/scraped.csv"];
    const { pipeline, store } = createPipeline(seed);

    await expect(pipeline.run({ sources: SOURCES })).rejects.toBeInstanceOf(
      PipelineConfigError,
    );
    expect(store.tables.has("staging/companies.csv")).toBe(false);
  });
});
