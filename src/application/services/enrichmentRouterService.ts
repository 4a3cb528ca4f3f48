import { createHash } from "node:crypto";
import pLimit from "p-limit";
import type { CompanyRecord } from "../../core/entities/company";
import type {
  EnrichmentOutcome,
  EnrichmentPath,
} from "../../core/entities/pipeline";
import type {
  PlaceLookupPort,
  ReasoningPort,
} from "../../core/ports/inboundPorts";
import type {
  CheckpointStorePort,
  ClockPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import type {
  CandidateEvaluation,
  CandidateScoringService,
} from "./candidateScoringService";
import type { GeofenceService } from "./geofenceService";
import {
  brandToken,
  domainOf,
  standardizeUrl,
  type NormalizationService,
} from "./normalizationService";
import { RecordingPlaceLookup } from "./recordingPlaceLookup";
import type { RetryPolicy } from "./retryPolicy";

export const REVIEW_REASONS = {
  noCandidate: "no candidate met acceptance threshold",
  multiTenant: "multi-tenant match insufficient",
  lookupUnavailable: "lookup unavailable",
  roundLimit: "reasoning round limit exceeded",
  untracedPlace: "place id not traced to a fetched lookup result",
} as const;

export type EnrichmentRouterOptions = {
  concurrency: number;
  queryHint: string;
  queryQualifier: string;
  maxCandidates: number;
  reasoningAcceptanceThreshold: number;
  reasoningMultiTenantConfidence: number;
};

export type EnrichmentRunResult = {
  outcomes: EnrichmentOutcome[];
  resumed: number;
  aborted: boolean;
};

const nonEmpty = (value: string | undefined): value is string =>
  value !== undefined && value.trim().length > 0;

const clampConfidence = (value: number): number =>
  Math.min(1, Math.max(0, value));

/**
 * Identifies the enrichment inputs of a record so stale checkpoint entries are ignored.
 */
export const enrichmentFingerprint = (record: CompanyRecord): string =>
  createHash("sha256")
    .update(
      JSON.stringify([
        record.name,
        record.website ?? "",
        record.address ?? "",
        record.city ?? "",
        record.cityCandidates,
      ]),
    )
    .digest("hex");

/**
 * Resolves address and website per record: deterministic lookup scoring when a trustworthy
 * website exists, guided discovery otherwise.
 */
export class EnrichmentRouterService {
  constructor(
    private readonly lookup: PlaceLookupPort,
    private readonly reasoner: ReasoningPort,
    private readonly scorer: CandidateScoringService,
    private readonly geofence: GeofenceService,
    private readonly normalizer: NormalizationService,
    private readonly retry: RetryPolicy,
    private readonly checkpoint: CheckpointStorePort,
    private readonly clock: ClockPort,
    private readonly options: EnrichmentRouterOptions,
  ) {}

  route(record: CompanyRecord): EnrichmentPath {
    return nonEmpty(record.website) &&
      nonEmpty(record.domainKey) &&
      !this.normalizer.isAggregator(record.website)
      ? "A"
      : "B";
  }

  /**
   * Enriches every record through a bounded pool, persisting each outcome as it settles.
   * Records already checkpointed with an unchanged fingerprint are reused.
   */
  async enrichAll(
    records: CompanyRecord[],
    signal?: AbortSignal,
  ): Promise<EnrichmentRunResult> {
    const saved = await this.checkpoint.load();
    const limit = pLimit(this.options.concurrency);
    let resumed = 0;

    const settled = await Promise.all(
      records.map((record) =>
        limit(async (): Promise<EnrichmentOutcome | undefined> => {
          const fingerprint = enrichmentFingerprint(record);
          const previous = saved.get(record.id);
          if (previous && previous.fingerprint === fingerprint) {
            resumed += 1;
            return previous.outcome;
          }
          if (signal?.aborted) {
            return undefined;
          }

          const outcome = await this.enrichOne(record);
          await this.checkpoint.save(record.id, {
            fingerprint,
            completedAt: this.clock.now().toISOString(),
            outcome,
          });
          return outcome;
        }),
      ),
    );

    const outcomes = settled.filter(
      (outcome): outcome is EnrichmentOutcome => outcome !== undefined,
    );
    return { outcomes, resumed, aborted: outcomes.length < records.length };
  }

  async enrichOne(record: CompanyRecord): Promise<EnrichmentOutcome> {
    const outcome =
      this.route(record) === "A"
        ? await this.runPathA(record)
        : await this.runPathB(record);

    if (outcome.status === "review") {
      logger.warn(
        { recordId: record.id, path: outcome.path, reason: outcome.reason },
        "Record routed to manual review",
      );
    } else {
      logger.debug(
        {
          recordId: record.id,
          path: outcome.path,
          confidence: outcome.record.confidence,
        },
        "Record enriched",
      );
    }
    return outcome;
  }

  private async runPathA(record: CompanyRecord): Promise<EnrichmentOutcome> {
    const domainKey = record.domainKey ?? "";
    const query = [
      brandToken(domainKey),
      nonEmpty(record.city) ? record.city : record.cityCandidates[0],
      this.options.queryHint,
      this.options.queryQualifier,
    ]
      .filter(nonEmpty)
      .join(" ");

    const search = await this.retry.execute(() =>
      this.lookup.search(query, this.geofence.center),
    );
    if (search.isErr()) {
      return this.review(record, "A", REVIEW_REASONS.lookupUnavailable);
    }

    const evaluations: CandidateEvaluation[] = [];
    for (const [rank, candidate] of search.value
      .slice(0, this.options.maxCandidates)
      .entries()) {
      const details = await this.retry.execute(() =>
        this.lookup.details(candidate.id),
      );
      if (details.isErr()) {
        return this.review(record, "A", REVIEW_REASONS.lookupUnavailable);
      }
      evaluations.push(this.scorer.evaluate(record, details.value, rank));
    }

    const { accepted } = this.scorer.pick(evaluations);
    if (!accepted) {
      return this.review(
        record,
        "A",
        evaluations.some((evaluation) => evaluation.rejection === "multi_tenant")
          ? REVIEW_REASONS.multiTenant
          : REVIEW_REASONS.noCandidate,
      );
    }

    const details = accepted.candidate;
    return {
      recordId: record.id,
      path: "A",
      status: "accepted",
      reason: accepted.explanation,
      record: {
        ...this.withLookupAddress(record, details.formattedAddress),
        placeId: details.id,
        location: details.location ?? record.location,
        confidence: clampConfidence(accepted.score),
        validationReason: `path_a: ${accepted.explanation}`,
        validationSource: "path_a",
        lastVerified: this.today(),
      },
    };
  }

  private async runPathB(record: CompanyRecord): Promise<EnrichmentOutcome> {
    const tools = new RecordingPlaceLookup(this.lookup, this.retry);
    const cityHint = nonEmpty(record.city) ? record.city : record.cityCandidates[0];

    const result = await this.retry.execute(() =>
      this.reasoner.discover({ companyName: record.name, cityHint }, tools),
    );
    if (result.isErr()) {
      return this.review(
        record,
        "B",
        result.error.code === "round_limit_exceeded"
          ? REVIEW_REASONS.roundLimit
          : REVIEW_REASONS.lookupUnavailable,
      );
    }

    const discovery = result.value;
    const website = standardizeUrl(discovery.website);
    const address = nonEmpty(discovery.address)
      ? discovery.address.trim()
      : undefined;
    // Only places the lookup actually returned during this discovery count.
    const traced = discovery.placeId
      ? tools.byId(discovery.placeId)
      : tools.byAddress(address);
    const confidence = clampConfidence(discovery.confidence);

    const failures: string[] = [];
    if (confidence < this.options.reasoningAcceptanceThreshold) {
      failures.push(
        `confidence ${confidence.toFixed(2)} below ${this.options.reasoningAcceptanceThreshold.toFixed(2)}`,
      );
    }
    if (address !== undefined && !traced) {
      failures.push(REVIEW_REASONS.untracedPlace);
    }
    const region = this.geofence.check({
      address,
      city: nonEmpty(discovery.city)
        ? this.geofence.canonicalCity(discovery.city)
        : undefined,
      location: traced?.location,
    });
    if (!discovery.validation.inRegion || !region.inScope) {
      failures.push("region gate failed");
    }
    if (
      !discovery.validation.brandMatches ||
      (website !== undefined && this.normalizer.isAggregator(website))
    ) {
      failures.push("brand gate failed");
    }
    if (!discovery.validation.isBusiness) {
      failures.push("business gate failed");
    }
    if (
      this.scorer.isMultiTenant(address) &&
      confidence < this.options.reasoningMultiTenantConfidence
    ) {
      failures.push(
        `multi-tenant address requires confidence ${this.options.reasoningMultiTenantConfidence.toFixed(2)}`,
      );
    }

    if (failures.length > 0) {
      return this.review(record, "B", failures.join("; "));
    }

    const located = this.withLookupAddress(record, address, discovery.city);
    return {
      recordId: record.id,
      path: "B",
      status: "accepted",
      reason: discovery.validation.reasoning,
      record: {
        ...located,
        website,
        domainKey: domainOf(website),
        placeId: traced?.id ?? record.placeId,
        location: traced?.location ?? record.location,
        confidence,
        validationReason: `path_b: ${discovery.validation.reasoning}`,
        validationSource: "path_b",
        lastVerified: this.today(),
      },
    };
  }

  /**
   * Applies a looked-up address; its city settles any earlier city conflict or mismatch.
   */
  private withLookupAddress(
    record: CompanyRecord,
    address: string | undefined,
    reportedCity?: string,
  ): CompanyRecord {
    const addressCity = this.geofence.cityFromAddress(address);
    const city =
      addressCity ??
      (nonEmpty(reportedCity) ? this.geofence.canonicalCity(reportedCity) : undefined) ??
      (nonEmpty(record.city) ? record.city : undefined);

    return {
      ...record,
      address: address ?? record.address,
      addressOrigin: address ? "lookup" : record.addressOrigin,
      city,
      cityCandidates: city ? [] : record.cityCandidates,
      flags: city
        ? record.flags.filter(
            (flag) =>
              flag !== "city_conflict" && flag !== "city_address_mismatch",
          )
        : record.flags,
    };
  }

  private review(
    record: CompanyRecord,
    path: EnrichmentPath,
    reason: string,
  ): EnrichmentOutcome {
    return {
      recordId: record.id,
      path,
      status: "review",
      reason,
      record: { ...record, confidence: 0, validationReason: reason },
    };
  }

  private today(): string {
    return this.clock.now().toISOString().slice(0, 10);
  }
}
