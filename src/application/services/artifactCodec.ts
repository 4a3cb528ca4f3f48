import {
  confidenceTier,
  isCompanyStage,
  type CompanyRecord,
  type RecordFlag,
} from "../../core/entities/company";
import type {
  CheckResult,
  DomainReuseConflict,
  ExcludedRecord,
  ReviewEntry,
} from "../../core/entities/pipeline";
import type { TableRow } from "../../core/ports/outboundPorts";
import type { GeofenceService } from "./geofenceService";
import { domainOf, type NormalizationService } from "./normalizationService";

export const PRODUCTION_COLUMNS = [
  "Company Name",
  "Website",
  "City",
  "Address",
  "Company Stage",
  "Focus Areas",
] as const;

export const WORKING_COLUMNS = [
  ...PRODUCTION_COLUMNS,
  "Confidence",
  "Validation Source",
  "Place ID",
  "Last Verified",
  "Tier",
  "Validation Reason",
  "Sources",
  "Record ID",
  "Address Origin",
  "Latitude",
  "Longitude",
  "Geofence Override",
] as const;

export const REVIEW_COLUMNS = [
  "Record ID",
  "Company Name",
  "Website",
  "City",
  "Address",
  "Company Stage",
  "Pipeline Step",
  "Reason",
] as const;

export const DOMAIN_REUSE_COLUMNS = [
  "Domain Key",
  "Record IDs",
  "Company Names",
  "Allow-Listed",
] as const;

export const GEOFENCE_EXCLUDED_COLUMNS = [
  "Record ID",
  "Company Name",
  "Website",
  "City",
  "Address",
  "Sources",
  "Reason",
] as const;

const LIST_SEPARATOR = "; ";

const text = (value: string | undefined): string => value ?? "";

const readCell = (row: TableRow, column: string): string | undefined => {
  const value = row[column]?.trim();
  return value && value.length > 0 ? value : undefined;
};

const readNumber = (row: TableRow, column: string): number | undefined => {
  const raw = readCell(row, column);
  const value = raw === undefined ? Number.NaN : Number(raw);
  return Number.isFinite(value) ? value : undefined;
};

const splitList = (raw: string | undefined): string[] =>
  (raw ?? "")
    .split(";")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);

/**
 * One review-queue reason per failing check.
 */
export const describeFailures = (failures: CheckResult[]): string[] =>
  failures.map((failure) => `${failure.check}: ${failure.explanation}`);

export type DecodedWorkingRow = {
  record: CompanyRecord;
  failures: CheckResult[];
};

/**
 * Converts records to staging rows and working rows back to records for re-validation.
 */
export class ArtifactCodec {
  constructor(
    private readonly normalizer: NormalizationService,
    private readonly geofence: GeofenceService,
  ) {}

  productionRow(record: CompanyRecord): TableRow {
    return {
      "Company Name": record.name,
      Website: text(record.website),
      City: text(record.city),
      Address: text(record.address),
      "Company Stage": record.stage,
      "Focus Areas": text(record.focusAreas),
    };
  }

  workingRow(record: CompanyRecord): TableRow {
    return {
      ...this.productionRow(record),
      Confidence: record.confidence === undefined ? "" : record.confidence.toFixed(2),
      "Validation Source": text(record.validationSource),
      "Place ID": text(record.placeId),
      "Last Verified": text(record.lastVerified),
      Tier: String(confidenceTier(record.confidence)),
      "Validation Reason": text(record.validationReason),
      Sources: record.sources.join(LIST_SEPARATOR),
      "Record ID": record.id,
      "Address Origin": text(record.addressOrigin),
      Latitude: record.location ? String(record.location.lat) : "",
      Longitude: record.location ? String(record.location.lng) : "",
      "Geofence Override": record.geofenceOverride ? "yes" : "",
    };
  }

  reviewRow(entry: ReviewEntry): TableRow {
    return {
      "Record ID": entry.record.id,
      "Company Name": entry.record.name,
      Website: text(entry.record.website),
      City:
        entry.record.cityCandidates.length > 0
          ? entry.record.cityCandidates.join(" / ")
          : text(entry.record.city),
      Address: text(entry.record.address),
      "Company Stage": entry.record.stage,
      "Pipeline Step": entry.step,
      Reason: entry.reasons.join(LIST_SEPARATOR),
    };
  }

  domainReuseRow(conflict: DomainReuseConflict): TableRow {
    return {
      "Domain Key": conflict.domainKey,
      "Record IDs": conflict.recordIds.join(LIST_SEPARATOR),
      "Company Names": conflict.names.join(LIST_SEPARATOR),
      "Allow-Listed": conflict.allowListed ? "yes" : "no",
    };
  }

  excludedRow(excluded: ExcludedRecord): TableRow {
    return {
      "Record ID": excluded.record.id,
      "Company Name": excluded.record.name,
      Website: text(excluded.record.website),
      City:
        excluded.record.cityCandidates.length > 0
          ? excluded.record.cityCandidates.join(" / ")
          : text(excluded.record.city),
      Address: text(excluded.record.address),
      Sources: excluded.record.sources.join(LIST_SEPARATOR),
      Reason: excluded.reason,
    };
  }

  /**
   * Rebuilds a record from a working row. Values are taken as written so the gate judges
   * them; a stage outside the closed set is reported instead of coerced.
   * Rows without a company name yield undefined.
   */
  decodeWorkingRow(row: TableRow, rowNumber: number): DecodedWorkingRow | undefined {
    const name = readCell(row, "Company Name");
    if (!name) {
      return undefined;
    }

    const failures: CheckResult[] = [];
    const rawStage = readCell(row, "Company Stage") ?? "Unknown";
    const stage = isCompanyStage(rawStage) ? rawStage : "Unknown";
    if (!isCompanyStage(rawStage)) {
      failures.push({
        check: "stage_membership",
        passed: false,
        explanation: `stage "${rawStage}" is not a recognised stage`,
      });
    }

    const website = readCell(row, "Website");
    const address = readCell(row, "Address");
    const city = readCell(row, "City");
    const addressCity = this.geofence.cityFromAddress(address);
    const flags: RecordFlag[] =
      city && addressCity && !this.geofence.sameCity(city, addressCity)
        ? ["city_address_mismatch"]
        : [];
    const origin = readCell(row, "Address Origin");
    const validationSource = readCell(row, "Validation Source");
    const lat = readNumber(row, "Latitude");
    const lng = readNumber(row, "Longitude");

    return {
      failures,
      record: {
        id: readCell(row, "Record ID") ?? `working:${rowNumber}`,
        name,
        normalizedName: this.normalizer.normalizeName(name),
        website,
        domainKey: domainOf(website),
        address,
        city,
        cityCandidates: [],
        stage,
        focusAreas: readCell(row, "Focus Areas"),
        sources: splitList(readCell(row, "Sources")),
        confidence: readNumber(row, "Confidence"),
        validationReason: readCell(row, "Validation Reason"),
        validationSource:
          validationSource === "path_a" || validationSource === "path_b"
            ? validationSource
            : undefined,
        placeId: readCell(row, "Place ID"),
        addressOrigin: origin === "lookup" || origin === "source" ? origin : undefined,
        location: lat !== undefined && lng !== undefined ? { lat, lng } : undefined,
        geofenceOverride: /^(true|yes|y|1|x)$/i.test(
          readCell(row, "Geofence Override") ?? "",
        ),
        lastVerified: readCell(row, "Last Verified"),
        flags,
      },
    };
  }
}
