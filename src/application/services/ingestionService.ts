import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { CompanyRecord, RecordFlag } from "../../core/entities/company";
import type {
  TableRow,
  TabularStorePort,
} from "../../core/ports/outboundPorts";
import type {
  MappableField,
  SourceDefinition,
} from "../../shared/config/pipelineConfig";
import { logger } from "../../shared/logger/logger";
import type { GeofenceService } from "./geofenceService";
import {
  domainOf,
  standardizeUrl,
  type NormalizationService,
} from "./normalizationService";
import type { StageClassifierService } from "./stageClassifierService";

export type IngestionResult = {
  records: CompanyRecord[];
  rowCount: number;
  skippedRows: number;
};

const TRUTHY = /^(true|yes|y|1|x)$/i;

const parseCoordinate = (raw: string | undefined): number | undefined => {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number.parseFloat(raw);
  return Number.isFinite(value) ? value : undefined;
};

/**
 * Maps heterogeneous source rows onto canonical records through each source's column mapping.
 */
export class IngestionService {
  constructor(
    private readonly store: TabularStorePort,
    private readonly normalizer: NormalizationService,
    private readonly geofence: GeofenceService,
    private readonly classifier: StageClassifierService,
  ) {}

  /**
   * An unreadable source is returned as an error; malformed rows are skipped and counted.
   */
  async ingest(
    sources: SourceDefinition[],
  ): Promise<Result<IngestionResult, AppBoundaryError>> {
    const records: CompanyRecord[] = [];
    let rowCount = 0;
    let skippedRows = 0;

    for (const source of sources) {
      const rows = await this.store.readTable(source.path);
      if (rows.isErr()) {
        return err(rows.error);
      }

      rows.value.forEach((row, index) => {
        rowCount += 1;
        const record = this.toRecord(source, row, index + 1);
        if (record) {
          records.push(record);
        } else {
          skippedRows += 1;
          logger.warn(
            { source: source.tag, row: index + 1 },
            "Skipping source row without a company name",
          );
        }
      });

      logger.info(
        { source: source.tag, rows: rows.value.length },
        "Source ingested",
      );
    }

    return ok({ records, rowCount, skippedRows });
  }

  toRecord(
    source: SourceDefinition,
    row: TableRow,
    rowNumber: number,
  ): CompanyRecord | undefined {
    const read = (field: MappableField): string | undefined => {
      const header = source.columns[field];
      const value = header === undefined ? undefined : row[header]?.trim();
      return value && value.length > 0 ? value : undefined;
    };

    const name = read("name");
    if (!name) {
      return undefined;
    }

    const website = standardizeUrl(read("website"));
    const address = read("address");
    const rawCity = read("city");
    const addressCity = this.geofence.cityFromAddress(address);
    const flags: RecordFlag[] =
      rawCity && addressCity && !this.geofence.sameCity(rawCity, addressCity)
        ? ["city_address_mismatch"]
        : [];
    const lat = parseCoordinate(read("lat"));
    const lng = parseCoordinate(read("lng"));

    return {
      id: `${source.tag}:${rowNumber}`,
      name,
      normalizedName: this.normalizer.normalizeName(name),
      website,
      domainKey: domainOf(website),
      address,
      addressOrigin: address ? "source" : undefined,
      city: rawCity ? this.geofence.canonicalCity(rawCity) : addressCity,
      state: read("state"),
      cityCandidates: [],
      stage: this.classifier.parseStage(read("stage")),
      focusAreas: read("focusAreas"),
      description: read("description"),
      sources: [source.tag],
      location:
        lat !== undefined && lng !== undefined ? { lat, lng } : undefined,
      geofenceOverride: TRUTHY.test(read("geofenceOverride") ?? ""),
      flags,
    };
  }
}
