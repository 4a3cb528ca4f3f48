import { describe, expect, it } from "vitest";
import { buildRecord, testPipelineConfig } from "../../__tests__/fixtures";
import type { CompanyRecord } from "../../core/entities/company";
import { GeofenceService } from "./geofenceService";
import { NormalizationService } from "./normalizationService";
import { ValidationGateService } from "./validationGateService";

const config = testPipelineConfig();
const gate = new ValidationGateService(
  new NormalizationService({
    legalSuffixes: config.names.legalSuffixes,
    aggregators: config.domains.aggregators,
  }),
  new GeofenceService(config.region),
  config.domains.allowList,
);

const enriched = (overrides: Partial<CompanyRecord> = {}): CompanyRecord =>
  buildRecord({
    id: "acmebio.com|acme bio",
    name: "Acme Bio",
    website: "https://acmebio.com",
    domainKey: "acmebio.com",
    city: "Berkeley",
    address: "1 Main St, Berkeley, CA 94704, USA",
    addressOrigin: "lookup",
    placeId: "place-acme",
    confidence: 1,
    validationSource: "path_a",
    ...overrides,
  });

describe("ValidationGateService", () => {
  it("promotes a record that passes every check", () => {
    const record = enriched();

    const result = gate.validate([record], []);

    expect(result.promoted).toEqual([record]);
    expect(result.rejected).toEqual([]);
  });

  it("never promotes a looked-up address without a place id", () => {
    const result = gate.validate([enriched({ placeId: undefined })], []);

    expect(result.promoted).toEqual([]);
    expect(result.rejected[0]?.failures).toEqual([
      {
        check: "address_has_place_id",
        passed: false,
        explanation: "looked-up address has no place id",
      },
    ]);
    expect(result.failureCounts.address_has_place_id).toBe(1);
  });

  it("blocks every contender of a shared domain", () => {
    const first = enriched({ id: "a" });
    const second = enriched({ id: "b", name: "Acme Labs" });

    const result = gate.validate([first, second], []);

    expect(result.promoted).toEqual([]);
    expect(result.rejected.map((entry) => entry.failures)).toEqual([
      [
        {
          check: "domain_unique",
          passed: false,
          explanation: "domain acmebio.com is claimed by 2 records (a, b)",
        },
      ],
      [
        {
          check: "domain_unique",
          passed: false,
          explanation: "domain acmebio.com is claimed by 2 records (a, b)",
        },
      ],
    ]);
  });

  it("blocks a contender whose rival only appears in the reuse report", () => {
    const result = gate.validate(
      [enriched({ id: "a" })],
      [
        {
          domainKey: "acmebio.com",
          recordIds: ["a", "c"],
          names: ["Acme Bio", "Acme Capital"],
          allowListed: false,
        },
      ],
    );

    expect(result.promoted).toEqual([]);
    expect(result.failureCounts.domain_unique).toBe(1);
  });

  it("lets allow-listed domains be shared", () => {
    const first = enriched({
      id: "gene.com|genentech",
      website: "https://gene.com",
      domainKey: "gene.com",
    });
    const second = enriched({
      id: "gene.com|roche",
      website: "https://gene.com/roche",
      domainKey: "gene.com",
    });

    expect(gate.validate([first, second], []).promoted).toHaveLength(2);
  });

  it("lists every failing check", () => {
    const record = enriched({
      website: "https://www.linkedin.com/company/acme",
      domainKey: "linkedin.com",
      city: "",
      cityCandidates: ["Berkeley", "Oakland"],
      flags: ["city_conflict"],
      address: undefined,
      addressOrigin: undefined,
      placeId: undefined,
    });

    const result = gate.validate([record], []);

    expect(result.rejected[0]?.failures.map((failure) => failure.check)).toEqual([
      "url_well_formed",
      "city_whitelist",
      "address_in_region",
      "city_address_consistent",
    ]);
    expect(result.rejected[0]?.failures[0]?.explanation).toBe(
      'website "https://www.linkedin.com/company/acme" is an aggregator domain',
    );
    expect(result.rejected[0]?.failures[3]?.explanation).toBe(
      "unresolved city conflict: Berkeley, Oakland",
    );
  });

  it("rejects out-of-region addresses and city mismatches", () => {
    const result = gate.validate(
      [
        enriched({
          city: "Berkeley",
          address: "9 Harbor Dr, San Diego, CA 92101",
        }),
      ],
      [],
    );

    expect(result.rejected[0]?.failures).toEqual([
      {
        check: "address_in_region",
        passed: false,
        explanation:
          'address "9 Harbor Dr, San Diego, CA 92101" is outside the region (explicitly denylisted)',
      },
      {
        check: "city_address_consistent",
        passed: false,
        explanation: 'city "Berkeley" does not match address city "San Diego"',
      },
    ]);
  });

  it("accepts the override flag in place of an in-region address", () => {
    const record = enriched({
      city: "Berkeley",
      address: undefined,
      addressOrigin: undefined,
      placeId: undefined,
      geofenceOverride: true,
    });

    expect(gate.validate([record], []).promoted).toEqual([record]);
  });
});
