import type { CompanyRecord } from "../../core/entities/company";
import type { PlaceDetails } from "../../core/ports/inboundPorts";
import type { GeofenceService } from "./geofenceService";
import { domainOf, type NormalizationService } from "./normalizationService";

export type DomainSignal = "match" | "missing" | "mismatch";

export type CandidateEvaluation = {
  candidate: PlaceDetails;
  rank: number;
  score: number;
  nameSimilarity: number;
  domainSignal: DomainSignal;
  inRegion: boolean;
  businessOk: boolean;
  multiTenant: boolean;
  accepted: boolean;
  rejection?: "below_threshold" | "multi_tenant";
  explanation: string;
};

export type CandidateScoringOptions = {
  nameMatchThreshold: number;
  acceptanceThreshold: number;
  multiTenantNameThreshold: number;
  disallowedTypes: readonly string[];
  multiTenantAddresses: readonly string[];
};

// Points out of 100 so scores stay exact decimals.
const NAME_POINTS = 40;
const DOMAIN_POINTS: Record<DomainSignal, number> = {
  match: 30,
  missing: 10,
  mismatch: -20,
};
const REGION_POINTS = 20;
const BUSINESS_POINTS = 10;

/**
 * Scores lookup candidates against a record and applies the acceptance rules.
 */
export class CandidateScoringService {
  private readonly disallowedTypes: Set<string>;
  private readonly multiTenantPatterns: string[];

  constructor(
    private readonly normalizer: NormalizationService,
    private readonly geofence: GeofenceService,
    private readonly options: CandidateScoringOptions,
  ) {
    this.disallowedTypes = new Set(options.disallowedTypes);
    this.multiTenantPatterns = options.multiTenantAddresses.map((pattern) =>
      pattern.toLowerCase(),
    );
  }

  /**
   * True when the address sits in a known incubator or shared lab building.
   */
  isMultiTenant(address: string | undefined): boolean {
    const normalized = address?.toLowerCase() ?? "";
    return (
      normalized.length > 0 &&
      this.multiTenantPatterns.some((pattern) => normalized.includes(pattern))
    );
  }

  evaluate(
    record: CompanyRecord,
    candidate: PlaceDetails,
    rank: number,
  ): CandidateEvaluation {
    const nameSimilarity = this.normalizer.nameSimilarity(
      record.name,
      candidate.name,
    );
    const candidateDomain = domainOf(candidate.website);
    const domainSignal: DomainSignal = !candidateDomain
      ? "missing"
      : candidateDomain === record.domainKey
        ? "match"
        : "mismatch";
    const inRegion = this.geofence.check({
      address: candidate.formattedAddress,
      location: candidate.location,
    }).inScope;
    const businessOk =
      candidate.operationalStatus === "operational" &&
      !candidate.types.some((type) => this.disallowedTypes.has(type));
    const multiTenant = this.isMultiTenant(candidate.formattedAddress);

    const points =
      (nameSimilarity >= this.options.nameMatchThreshold ? NAME_POINTS : 0) +
      DOMAIN_POINTS[domainSignal] +
      (inRegion ? REGION_POINTS : 0) +
      (businessOk ? BUSINESS_POINTS : 0);
    const score = Math.min(1, Math.max(0, points / 100));

    let accepted: boolean;
    let rejection: CandidateEvaluation["rejection"];
    if (multiTenant) {
      accepted =
        nameSimilarity >= this.options.multiTenantNameThreshold ||
        domainSignal === "match";
      rejection = accepted ? undefined : "multi_tenant";
    } else {
      accepted = score >= this.options.acceptanceThreshold;
      rejection = accepted ? undefined : "below_threshold";
    }

    const parts = [
      `name similarity ${nameSimilarity.toFixed(2)}`,
      `domain ${domainSignal}`,
      inRegion ? "in region" : "out of region",
      businessOk ? "operational business" : "disallowed or closed business",
    ];
    if (multiTenant) {
      parts.push("multi-tenant building");
    }

    return {
      candidate,
      rank,
      score,
      nameSimilarity,
      domainSignal,
      inRegion,
      businessOk,
      multiTenant,
      accepted,
      rejection,
      explanation: `${parts.join(", ")}; score ${score.toFixed(2)}`,
    };
  }

  /**
   * Highest-scoring accepted candidate (rank breaks ties) and the overall best for diagnostics.
   */
  pick(evaluations: CandidateEvaluation[]): {
    accepted?: CandidateEvaluation;
    best?: CandidateEvaluation;
  } {
    const ordered = [...evaluations].sort(
      (left, right) => right.score - left.score || left.rank - right.rank,
    );
    return {
      accepted: ordered.find((evaluation) => evaluation.accepted),
      best: ordered[0],
    };
  }
}
