import { join } from "node:path";
import { PipelineConfigError } from "../../core/entities/appError";
import type { CompanyRecord } from "../../core/entities/company";
import type {
  DomainReuseConflict,
  ExcludedRecord,
  GateResult,
  ReviewEntry,
  RunSummary,
} from "../../core/entities/pipeline";
import type {
  CheckpointStorePort,
  ClockPort,
  LookupUsagePort,
  TabularStorePort,
} from "../../core/ports/outboundPorts";
import type { SourceDefinition } from "../../shared/config/pipelineConfig";
import { logger } from "../../shared/logger/logger";
import {
  DOMAIN_REUSE_COLUMNS,
  GEOFENCE_EXCLUDED_COLUMNS,
  PRODUCTION_COLUMNS,
  REVIEW_COLUMNS,
  WORKING_COLUMNS,
  describeFailures,
  type ArtifactCodec,
} from "./artifactCodec";
import type { DeduplicationService } from "./deduplicationService";
import type { EnrichmentRouterService } from "./enrichmentRouterService";
import type { GeofenceService } from "./geofenceService";
import type { IngestionService } from "./ingestionService";
import type { StageClassifierService } from "./stageClassifierService";
import {
  emptyFailureCounts,
  type ValidationGateService,
} from "./validationGateService";

export const STAGING_FILES = {
  companies: "companies.csv",
  working: "companies_working.csv",
  review: "manual_review_queue.csv",
  domainReuse: "domain_reuse_report.csv",
  geofenceExcluded: "geofence_excluded.csv",
  summary: "run_summary.json",
} as const;

export type PipelineRunOptions = {
  sources: SourceDefinition[];
  fresh?: boolean;
  signal?: AbortSignal;
};

type StagedArtifacts = {
  promoted: CompanyRecord[];
  review: ReviewEntry[];
  domainReuseReport: DomainReuseConflict[];
  excluded: ExcludedRecord[];
  summary: RunSummary;
};

const byName = (left: CompanyRecord, right: CompanyRecord): number =>
  left.name.localeCompare(right.name) || left.id.localeCompare(right.id);

/**
 * Runs the stages strictly in order over the whole record set and stages every artifact.
 * The production file is never touched here.
 */
export class PipelineService {
  constructor(
    private readonly store: TabularStorePort,
    private readonly ingestion: IngestionService,
    private readonly deduplication: DeduplicationService,
    private readonly classifier: StageClassifierService,
    private readonly geofence: GeofenceService,
    private readonly router: EnrichmentRouterService,
    private readonly gate: ValidationGateService,
    private readonly checkpoint: CheckpointStorePort,
    private readonly lookupUsage: LookupUsagePort,
    private readonly codec: ArtifactCodec,
    private readonly clock: ClockPort,
    private readonly stagingDir: string,
  ) {}

  async run(options: PipelineRunOptions): Promise<RunSummary> {
    const startedAt = this.clock.now().toISOString();

    if (options.fresh) {
      await this.checkpoint.clear();
      logger.info("Checkpoint discarded for a fresh run");
    }

    const ingested = await this.ingestion.ingest(options.sources);
    if (ingested.isErr()) {
      throw new PipelineConfigError("Cannot read a configured source", [
        ingested.error.message,
      ]);
    }
    const { records, rowCount, skippedRows } = ingested.value;
    logger.info(
      { rows: rowCount, records: records.length, skippedRows },
      "Ingestion finished",
    );

    const { merged, domainReuseReport } = this.deduplication.merge(records);
    logger.info(
      {
        merged: merged.length,
        domainConflicts: domainReuseReport.filter((conflict) => !conflict.allowListed)
          .length,
      },
      "Deduplication finished",
    );

    const classified = this.classifier.classifyAll(merged);
    logger.info(
      { classified: classified.classified, ruleVersion: this.classifier.version },
      "Stage classification finished",
    );

    const { inScope, excluded } = this.geofence.filter(classified.records);
    logger.info(
      { inScope: inScope.length, excluded: excluded.length },
      "Geofence finished",
    );

    const enrichment = await this.router.enrichAll(inScope, options.signal);
    const accepted = enrichment.outcomes
      .filter((outcome) => outcome.status === "accepted")
      .map((outcome) => outcome.record);
    const review: ReviewEntry[] = enrichment.outcomes
      .filter((outcome) => outcome.status === "review")
      .map((outcome): ReviewEntry => ({
        record: outcome.record,
        step: "enrichment",
        reasons: [outcome.reason],
      }));
    logger.info(
      {
        accepted: accepted.length,
        review: review.length,
        resumed: enrichment.resumed,
        aborted: enrichment.aborted,
      },
      "Enrichment finished",
    );

    const gate: GateResult = enrichment.aborted
      ? { promoted: [], rejected: [], failureCounts: emptyFailureCounts() }
      : this.gate.validate(accepted, domainReuseReport);
    for (const rejected of gate.rejected) {
      review.push({
        record: rejected.record,
        step: "validation",
        reasons: describeFailures(rejected.failures),
      });
    }
    if (!enrichment.aborted) {
      logger.info(
        { promoted: gate.promoted.length, rejected: gate.rejected.length },
        "Validation gate finished",
      );
    }

    const summary: RunSummary = {
      startedAt,
      finishedAt: this.clock.now().toISOString(),
      status: enrichment.aborted ? "aborted" : "completed",
      ingestedRows: rowCount,
      skippedRows,
      mergedRecords: merged.length,
      classifiedStages: classified.classified,
      domainConflicts: domainReuseReport.filter((conflict) => !conflict.allowListed)
        .length,
      geofenceExcluded: excluded.length,
      enrichment: {
        pathA: enrichment.outcomes.filter((outcome) => outcome.path === "A").length,
        pathB: enrichment.outcomes.filter((outcome) => outcome.path === "B").length,
        accepted: accepted.length,
        review: enrichment.outcomes.length - accepted.length,
        resumedFromCheckpoint: enrichment.resumed,
      },
      promoted: gate.promoted.length,
      rejected: gate.rejected.length,
      checkFailures: gate.failureCounts,
      lookupUsage: this.lookupUsage.usage(),
    };

    await this.writeArtifacts({
      promoted: [...gate.promoted].sort(byName),
      review,
      domainReuseReport,
      excluded,
      summary,
    });

    if (enrichment.aborted) {
      logger.warn(
        {
          settled: enrichment.outcomes.length,
          pending: inScope.length - enrichment.outcomes.length,
        },
        "Run aborted; staged companies are empty and the checkpoint keeps settled records",
      );
    }
    return summary;
  }

  private async writeArtifacts(artifacts: StagedArtifacts): Promise<void> {
    const path = (file: string) => join(this.stagingDir, file);

    await this.store.writeTable(
      path(STAGING_FILES.companies),
      PRODUCTION_COLUMNS,
      artifacts.promoted.map((record) => this.codec.productionRow(record)),
    );
    await this.store.writeTable(
      path(STAGING_FILES.working),
      WORKING_COLUMNS,
      artifacts.promoted.map((record) => this.codec.workingRow(record)),
    );
    await this.store.writeTable(
      path(STAGING_FILES.review),
      REVIEW_COLUMNS,
      artifacts.review.map((entry) => this.codec.reviewRow(entry)),
    );
    await this.store.writeTable(
      path(STAGING_FILES.domainReuse),
      DOMAIN_REUSE_COLUMNS,
      artifacts.domainReuseReport.map((conflict) => this.codec.domainReuseRow(conflict)),
    );
    await this.store.writeTable(
      path(STAGING_FILES.geofenceExcluded),
      GEOFENCE_EXCLUDED_COLUMNS,
      artifacts.excluded.map((excluded) => this.codec.excludedRow(excluded)),
    );
    await this.store.writeJson(path(STAGING_FILES.summary), artifacts.summary);

    logger.info({ stagingDir: this.stagingDir }, "Staging artifacts written");
  }
}
