import { dirname, join } from "node:path";
import type { CompanyRecord } from "../../core/entities/company";
import type { GateResult, RejectedRecord } from "../../core/entities/pipeline";
import type {
  ClockPort,
  TableRow,
  TabularStorePort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import type { ArtifactCodec } from "./artifactCodec";
import { STAGING_FILES } from "./pipelineService";
import type { ValidationGateService } from "./validationGateService";

export type PromotionResult =
  | { status: "promoted"; rows: number; productionPath: string; promotedAt: string }
  | { status: "refused"; reason: string; rejected: RejectedRecord[] };

export type RevalidationResult = GateResult & {
  skippedRows: number;
};

/**
 * Re-validates staged artifacts and replaces the production file only when every row passes.
 */
export class PromotionService {
  constructor(
    private readonly store: TabularStorePort,
    private readonly gate: ValidationGateService,
    private readonly codec: ArtifactCodec,
    private readonly clock: ClockPort,
    private readonly stagingDir: string,
    private readonly productionPath: string,
  ) {}

  /**
   * Runs the gate over working rows. Rows without a company name are counted and skipped.
   */
  revalidate(rows: TableRow[]): RevalidationResult {
    const decoded = rows.map((row, index) =>
      this.codec.decodeWorkingRow(row, index + 1),
    );
    const present = decoded.filter(
      (entry): entry is NonNullable<typeof entry> => entry !== undefined,
    );
    const decodeFailures = new Map<CompanyRecord, RejectedRecord["failures"]>(
      present.map((entry) => [entry.record, entry.failures]),
    );

    const result = this.gate.validate(
      present.map((entry) => entry.record),
      [],
    );

    const promoted: CompanyRecord[] = [];
    const rejected = result.rejected.map((rejection) => ({
      record: rejection.record,
      failures: [
        ...(decodeFailures.get(rejection.record) ?? []),
        ...rejection.failures,
      ],
    }));
    const failureCounts = { ...result.failureCounts };
    for (const record of result.promoted) {
      const failures = decodeFailures.get(record) ?? [];
      if (failures.length === 0) {
        promoted.push(record);
      } else {
        rejected.push({ record, failures });
      }
    }
    for (const failures of decodeFailures.values()) {
      for (const failure of failures) {
        failureCounts[failure.check] += 1;
      }
    }

    return {
      promoted,
      rejected,
      failureCounts,
      skippedRows: rows.length - present.length,
    };
  }

  async validateFile(path: string): Promise<RevalidationResult | undefined> {
    const rows = await this.store.readTable(path);
    if (rows.isErr()) {
      logger.error({ path, error: rows.error.message }, "Cannot read working artifact");
      return undefined;
    }
    return this.revalidate(rows.value);
  }

  async promote(): Promise<PromotionResult> {
    const stagedCompanies = join(this.stagingDir, STAGING_FILES.companies);
    const stagedWorking = join(this.stagingDir, STAGING_FILES.working);

    const working = await this.store.readTable(stagedWorking);
    if (working.isErr()) {
      return this.refuse(`cannot read ${stagedWorking}: ${working.error.message}`);
    }
    if (working.value.length === 0) {
      return this.refuse("staged working artifact has no rows");
    }

    const companies = await this.store.readTable(stagedCompanies);
    if (companies.isErr()) {
      return this.refuse(`cannot read ${stagedCompanies}: ${companies.error.message}`);
    }
    if (companies.value.length !== working.value.length) {
      return this.refuse(
        `staged companies.csv has ${companies.value.length} rows but the working artifact has ${working.value.length}`,
      );
    }

    const result = this.revalidate(working.value);
    if (result.rejected.length > 0 || result.skippedRows > 0) {
      return this.refuse(
        `${result.rejected.length} staged records fail validation and ${result.skippedRows} rows have no company name`,
        result.rejected,
      );
    }

    await this.store.replaceFile(stagedCompanies, this.productionPath);
    const promotedAt = this.clock.now().toISOString();
    await this.store.writeText(
      join(dirname(this.productionPath), "last_updated.txt"),
      `${promotedAt}\n`,
    );

    logger.info(
      { rows: companies.value.length, productionPath: this.productionPath },
      "Staged companies promoted",
    );
    return {
      status: "promoted",
      rows: companies.value.length,
      productionPath: this.productionPath,
      promotedAt,
    };
  }

  private refuse(reason: string, rejected: RejectedRecord[] = []): PromotionResult {
    logger.warn({ reason, rejected: rejected.length }, "Promotion refused");
    return { status: "refused", reason, rejected };
  }
}
