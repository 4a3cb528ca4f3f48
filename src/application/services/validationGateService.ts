import { isCompanyStage, type CompanyRecord } from "../../core/entities/company";
import {
  VALIDATION_CHECKS,
  type CheckResult,
  type DomainReuseConflict,
  type GateResult,
  type RejectedRecord,
  type ValidationCheckName,
} from "../../core/entities/pipeline";
import type { GeofenceService } from "./geofenceService";
import {
  domainOf,
  standardizeUrl,
  type NormalizationService,
} from "./normalizationService";

type CheckContext = {
  contestedDomains: Map<string, string[]>;
};

const pass = (check: ValidationCheckName): CheckResult => ({
  check,
  passed: true,
  explanation: "ok",
});

const fail = (check: ValidationCheckName, explanation: string): CheckResult => ({
  check,
  passed: false,
  explanation,
});

export const emptyFailureCounts = (): Record<ValidationCheckName, number> => ({
  url_well_formed: 0,
  city_whitelist: 0,
  address_in_region: 0,
  domain_unique: 0,
  address_has_place_id: 0,
  stage_membership: 0,
  city_address_consistent: 0,
});

/**
 * Deterministic invariant checks; only records passing every check are promoted.
 */
export class ValidationGateService {
  private readonly allowListed: Set<string>;

  constructor(
    private readonly normalizer: NormalizationService,
    private readonly geofence: GeofenceService,
    allowListedDomains: readonly string[],
  ) {
    this.allowListed = new Set(
      allowListedDomains.map((domain) => domain.toLowerCase()),
    );
  }

  validate(
    records: CompanyRecord[],
    domainReuseReport: DomainReuseConflict[],
  ): GateResult {
    const context: CheckContext = {
      contestedDomains: this.contestedDomains(records, domainReuseReport),
    };
    const promoted: CompanyRecord[] = [];
    const rejected: RejectedRecord[] = [];
    const failureCounts = emptyFailureCounts();

    for (const record of records) {
      const failures = this.runChecks(record, context).filter(
        (result) => !result.passed,
      );
      for (const failure of failures) {
        failureCounts[failure.check] += 1;
      }
      if (failures.length === 0) {
        promoted.push(record);
      } else {
        rejected.push({ record, failures });
      }
    }

    return { promoted, rejected, failureCounts };
  }

  private runChecks(record: CompanyRecord, context: CheckContext): CheckResult[] {
    const results: Record<ValidationCheckName, CheckResult> = {
      url_well_formed: this.checkUrl(record),
      city_whitelist: this.checkCity(record),
      address_in_region: this.checkAddress(record),
      domain_unique: this.checkDomain(record, context),
      address_has_place_id: this.checkPlaceId(record),
      stage_membership: isCompanyStage(record.stage)
        ? pass("stage_membership")
        : fail("stage_membership", `stage "${record.stage}" is not a recognised stage`),
      city_address_consistent: this.checkConsistency(record),
    };
    return VALIDATION_CHECKS.map((check) => results[check]);
  }

  private contestedDomains(
    records: CompanyRecord[],
    report: DomainReuseConflict[],
  ): Map<string, string[]> {
    const claims = new Map<string, string[]>();
    for (const record of records) {
      if (record.domainKey) {
        claims.set(record.domainKey, [
          ...(claims.get(record.domainKey) ?? []),
          record.id,
        ]);
      }
    }
    for (const conflict of report) {
      const known = claims.get(conflict.domainKey) ?? [];
      claims.set(conflict.domainKey, [
        ...new Set([...known, ...conflict.recordIds]),
      ]);
    }

    return new Map(
      [...claims.entries()].filter(
        ([domainKey, ids]) => ids.length > 1 && !this.allowListed.has(domainKey),
      ),
    );
  }

  private checkUrl(record: CompanyRecord): CheckResult {
    if (!record.website) {
      return pass("url_well_formed");
    }
    if (!standardizeUrl(record.website) || !domainOf(record.website)) {
      return fail(
        "url_well_formed",
        `website "${record.website}" is not a valid http(s) URL with a registrable domain`,
      );
    }
    if (this.normalizer.isAggregator(record.website)) {
      return fail(
        "url_well_formed",
        `website "${record.website}" is an aggregator domain`,
      );
    }
    return pass("url_well_formed");
  }

  private checkCity(record: CompanyRecord): CheckResult {
    if (!record.city || record.city.trim().length === 0) {
      return fail("city_whitelist", "city is empty");
    }
    return this.geofence.isWhitelisted(record.city)
      ? pass("city_whitelist")
      : fail("city_whitelist", `city "${record.city}" is not in the region whitelist`);
  }

  private checkAddress(record: CompanyRecord): CheckResult {
    if (this.geofence.isDenylisted(record.city)) {
      return fail("address_in_region", `city "${record.city}" is denylisted`);
    }
    if (record.geofenceOverride) {
      return pass("address_in_region");
    }
    if (!record.address || record.address.trim().length === 0) {
      return fail("address_in_region", "address is empty");
    }

    const decision = this.geofence.check({
      address: record.address,
      location: record.location,
    });
    return decision.inScope
      ? pass("address_in_region")
      : fail(
          "address_in_region",
          `address "${record.address}" is outside the region (${decision.reason})`,
        );
  }

  private checkDomain(record: CompanyRecord, context: CheckContext): CheckResult {
    const claimants = record.domainKey
      ? context.contestedDomains.get(record.domainKey)
      : undefined;
    return claimants
      ? fail(
          "domain_unique",
          `domain ${record.domainKey} is claimed by ${claimants.length} records (${claimants.join(", ")})`,
        )
      : pass("domain_unique");
  }

  private checkPlaceId(record: CompanyRecord): CheckResult {
    const traceable =
      record.addressOrigin !== "lookup" ||
      !record.address ||
      (record.placeId !== undefined && record.placeId.length > 0);
    return traceable
      ? pass("address_has_place_id")
      : fail("address_has_place_id", "looked-up address has no place id");
  }

  private checkConsistency(record: CompanyRecord): CheckResult {
    if (record.flags.includes("city_conflict") || record.cityCandidates.length > 0) {
      return fail(
        "city_address_consistent",
        `unresolved city conflict: ${record.cityCandidates.join(", ")}`,
      );
    }
    const addressCity = this.geofence.cityFromAddress(record.address);
    if (
      record.city &&
      addressCity &&
      !this.geofence.sameCity(record.city, addressCity)
    ) {
      return fail(
        "city_address_consistent",
        `city "${record.city}" does not match address city "${addressCity}"`,
      );
    }
    return pass("city_address_consistent");
  }
}
