import type { CompanyRecord } from "../core/entities/company";
import {
  parsePipelineConfig,
  type PipelineConfig,
} from "../shared/config/pipelineConfig";

export const testPipelineConfig = (): PipelineConfig =>
  parsePipelineConfig({
    region: {
      name: "Test Bay",
      stateTokens: ["CA", "California"],
      queryHint: "CA",
      center: { lat: 37.7749, lng: -122.4194 },
      radiusMeters: 97_000,
      radiusBackstop: true,
      cityWhitelist: [
        "San Francisco",
        "South San Francisco",
        "Berkeley",
        "Oakland",
        "Palo Alto",
      ],
      cityAliases: { "south sf": "South San Francisco", sf: "San Francisco" },
      denylist: ["Davis", "Sacramento", "San Diego"],
    },
    domains: {
      aggregators: ["linkedin.com", "crunchbase.com", "wixsite.com"],
      allowList: ["gene.com"],
    },
    names: {
      legalSuffixes: ["inc", "corp", "corporation", "llc", "ltd", "co"],
    },
    dedupe: {
      sourcePriority: ["verified", "curated", "scraped"],
      variantNameThreshold: 0.8,
    },
    enrichment: {
      queryQualifier: "biotech",
      maxCandidates: 5,
      nameMatchThreshold: 0.8,
      acceptanceThreshold: 0.75,
      multiTenantNameThreshold: 0.9,
      reasoningAcceptanceThreshold: 0.75,
      reasoningMultiTenantConfidence: 0.85,
      disallowedTypes: ["lodging", "real_estate_agency", "premise", "parking"],
      multiTenantAddresses: ["201 Gateway Blvd", "QB3"],
    },
  });

export const buildRecord = (
  overrides: Partial<CompanyRecord> & Pick<CompanyRecord, "id" | "name">,
): CompanyRecord => ({
  normalizedName: overrides.name.toLowerCase(),
  cityCandidates: [],
  stage: "Unknown",
  sources: ["curated"],
  geofenceOverride: false,
  flags: [],
  ...overrides,
});
