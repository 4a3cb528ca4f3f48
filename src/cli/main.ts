import { Command } from "commander";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import type { RevalidationResult } from "../application/services/promotionService";
import { describeFailures } from "../application/services/artifactCodec";
import type { RunSummary } from "../core/entities/pipeline";
import { env } from "../shared/config/env";
import { logger } from "../shared/logger/logger";

/**
 * Formats the run summary into a compact terminal report.
 */
export const formatRunReport = (summary: RunSummary): string => {
  const lines: string[] = [];

  lines.push(`Run ${summary.status} (${summary.startedAt} -> ${summary.finishedAt})`);
  lines.push(
    `Ingested ${summary.ingestedRows} rows (${summary.skippedRows} skipped), ${summary.mergedRecords} records after dedupe`,
  );
  lines.push(
    `Stages classified: ${summary.classifiedStages}; domain conflicts: ${summary.domainConflicts}; geofence excluded: ${summary.geofenceExcluded}`,
  );
  lines.push(
    `Enrichment: path A ${summary.enrichment.pathA}, path B ${summary.enrichment.pathB}, accepted ${summary.enrichment.accepted}, review ${summary.enrichment.review}, resumed ${summary.enrichment.resumedFromCheckpoint}`,
  );
  lines.push(`Promoted: ${summary.promoted}; rejected: ${summary.rejected}`);

  const failing = Object.entries(summary.checkFailures).filter(
    ([, count]) => count > 0,
  );
  lines.push("Check failures:");
  if (failing.length === 0) {
    lines.push("- none");
  } else {
    failing.forEach(([check, count]) => lines.push(`- ${check}: ${count}`));
  }

  const usage = summary.lookupUsage;
  lines.push(
    `Lookup usage: ${usage.searchCalls} searches, ${usage.detailsCalls} details, ${usage.cacheHits} cache hits, ~$${usage.estimatedCostUsd.toFixed(3)}`,
  );

  return lines.join("\n");
};

/**
 * Lists every rejected record with each failing check.
 */
export const formatValidationReport = (result: RevalidationResult): string => {
  const lines: string[] = [];

  lines.push(
    `Passed: ${result.promoted.length}; failed: ${result.rejected.length}; rows without a name: ${result.skippedRows}`,
  );
  result.rejected.forEach((rejection) => {
    lines.push(`${rejection.record.id} (${rejection.record.name})`);
    describeFailures(rejection.failures).forEach((reason) =>
      lines.push(`  - ${reason}`),
    );
  });

  return lines.join("\n");
};

/**
 * Defines a single command surface so operational tasks share one composition root.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("biotech-pipeline")
    .description("Regional biotech directory curation pipeline");

  cli
    .command("run")
    .description("Run ingestion through the validation gate and write staging artifacts")
    .option("--fresh", "Discard the enrichment checkpoint before running")
    .action(async (opts: { fresh?: boolean }) => {
      const runtime = createRuntime();
      const controller = new AbortController();
      const onSignal = () => {
        logger.warn("Interrupt received; finishing in-flight records");
        controller.abort();
      };
      process.once("SIGINT", onSignal);

      try {
        const summary = await runtime.pipelineService.run({
          sources: runtime.sources,
          fresh: Boolean(opts.fresh),
          signal: controller.signal,
        });
        console.log(formatRunReport(summary));
        process.exitCode = summary.status === "completed" ? 0 : 130;
      } finally {
        process.off("SIGINT", onSignal);
      }
    });

  cli
    .command("validate")
    .description("Run the validation gate over a working CSV and report failures")
    .option(
      "--input <path>",
      "Working CSV to validate",
      `${env.STAGING_DIR}/companies_working.csv`,
    )
    .action(async (opts: { input: string }) => {
      const runtime = createRuntime();
      const result = await runtime.promotionService.validateFile(opts.input);
      if (!result) {
        process.exitCode = 1;
        return;
      }

      console.log(formatValidationReport(result));
      process.exitCode = result.rejected.length === 0 ? 0 : 1;
    });

  cli
    .command("promote")
    .description("Re-validate staged artifacts and replace the production CSV")
    .action(async () => {
      const runtime = createRuntime();
      const result = await runtime.promotionService.promote();
      if (result.status === "refused") {
        logger.error({ reason: result.reason }, "Promotion refused");
        process.exitCode = 1;
        return;
      }

      logger.info(
        { rows: result.rows, productionPath: result.productionPath },
        "Promotion complete",
      );
    });

  cli
    .command("status")
    .description("Report effective configuration")
    .action(() => {
      const runtime = createRuntime();

      logger.info(
        {
          region: runtime.config.region.name,
          whitelistedCities: runtime.config.region.cityWhitelist.length,
          denylist: runtime.config.region.denylist,
          radiusBackstop: runtime.config.region.radiusBackstop,
          sources: runtime.sources.map((source) => ({
            tag: source.tag,
            path: source.path,
          })),
          stageRuleVersion: runtime.stageRuleVersion,
          placesProvider: env.PLACES_PROVIDER,
          reasonerProvider: env.REASONER_PROVIDER,
          enrichConcurrency: env.ENRICH_CONCURRENCY,
          lookupConcurrency: env.LOOKUP_CONCURRENCY,
          stagingDir: env.STAGING_DIR,
          productionPath: env.PRODUCTION_PATH,
          checkpointPath: env.CHECKPOINT_PATH,
        },
        "Runtime status",
      );
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
