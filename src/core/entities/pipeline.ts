import type { CompanyRecord } from "./company";

export type DomainReuseConflict = {
  domainKey: string;
  recordIds: string[];
  names: string[];
  allowListed: boolean;
};

export type GeofenceReason =
  | "explicitly denylisted"
  | "not in whitelist"
  | "outside radius";

export type GeofenceDecision =
  | { inScope: true; via: "override" | "city" | "address" | "radius" }
  | { inScope: false; reason: GeofenceReason };

export type ExcludedRecord = {
  record: CompanyRecord;
  reason: GeofenceReason;
};

export type EnrichmentPath = "A" | "B";

export type EnrichmentOutcome = {
  recordId: string;
  path: EnrichmentPath;
  status: "accepted" | "review";
  record: CompanyRecord;
  reason: string;
};

export const VALIDATION_CHECKS = [
  "url_well_formed",
  "city_whitelist",
  "address_in_region",
  "domain_unique",
  "address_has_place_id",
  "stage_membership",
  "city_address_consistent",
] as const;

export type ValidationCheckName = (typeof VALIDATION_CHECKS)[number];

export type CheckResult = {
  check: ValidationCheckName;
  passed: boolean;
  explanation: string;
};

export type RejectedRecord = {
  record: CompanyRecord;
  failures: CheckResult[];
};

export type GateResult = {
  promoted: CompanyRecord[];
  rejected: RejectedRecord[];
  failureCounts: Record<ValidationCheckName, number>;
};

export type ReviewEntry = {
  record: CompanyRecord;
  step: "enrichment" | "validation";
  reasons: string[];
};

export type LookupUsage = {
  searchCalls: number;
  detailsCalls: number;
  cacheHits: number;
  estimatedCostUsd: number;
};

export type RunSummary = {
  startedAt: string;
  finishedAt: string;
  status: "completed" | "aborted";
  ingestedRows: number;
  skippedRows: number;
  mergedRecords: number;
  classifiedStages: number;
  domainConflicts: number;
  geofenceExcluded: number;
  enrichment: {
    pathA: number;
    pathB: number;
    accepted: number;
    review: number;
    resumedFromCheckpoint: number;
  };
  promoted: number;
  rejected: number;
  checkFailures: Record<ValidationCheckName, number>;
  lookupUsage: LookupUsage;
};
