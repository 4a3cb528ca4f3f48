import pLimit from "p-limit";
import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { LatLng } from "../../core/entities/company";
import type { LookupUsage } from "../../core/entities/pipeline";
import type {
  PlaceCandidate,
  PlaceDetails,
  PlaceLookupPort,
} from "../../core/ports/inboundPorts";
import type {
  LookupCachePort,
  LookupUsagePort,
} from "../../core/ports/outboundPorts";

export type LookupCosts = {
  searchUsd: number;
  detailsUsd: number;
};

/**
 * Shares one lookup collaborator across workers: bounded concurrency, a persistent
 * response cache and usage counters.
 */
export class CachedPlaceLookup implements PlaceLookupPort, LookupUsagePort {
  private readonly limit: ReturnType<typeof pLimit>;
  private searchCalls = 0;
  private detailsCalls = 0;
  private cacheHits = 0;
  private readonly pendingSearches = new Map<
    string,
    Promise<Result<PlaceCandidate[], AppBoundaryError>>
  >();
  private readonly pendingDetails = new Map<
    string,
    Promise<Result<PlaceDetails, AppBoundaryError>>
  >();

  constructor(
    private readonly inner: PlaceLookupPort,
    private readonly cache: LookupCachePort,
    concurrency: number,
    private readonly costs: LookupCosts,
  ) {
    this.limit = pLimit(concurrency);
  }

  /**
   * Identical requests made while one is in flight share its provider call.
   */
  search(
    query: string,
    bias?: LatLng,
  ): Promise<Result<PlaceCandidate[], AppBoundaryError>> {
    const key = `search:${query.trim().toLowerCase()}|${bias ? `${bias.lat},${bias.lng}` : ""}`;
    const inFlight = this.pendingSearches.get(key);
    if (inFlight) {
      this.cacheHits += 1;
      return inFlight;
    }

    const pending = this.fetchSearch(key, query, bias).finally(() =>
      this.pendingSearches.delete(key),
    );
    this.pendingSearches.set(key, pending);
    return pending;
  }

  details(
    candidateId: string,
  ): Promise<Result<PlaceDetails, AppBoundaryError>> {
    const key = `details:${candidateId}`;
    const inFlight = this.pendingDetails.get(key);
    if (inFlight) {
      this.cacheHits += 1;
      return inFlight;
    }

    const pending = this.fetchDetails(key, candidateId).finally(() =>
      this.pendingDetails.delete(key),
    );
    this.pendingDetails.set(key, pending);
    return pending;
  }

  usage(): LookupUsage {
    const cost =
      this.searchCalls * this.costs.searchUsd +
      this.detailsCalls * this.costs.detailsUsd;
    return {
      searchCalls: this.searchCalls,
      detailsCalls: this.detailsCalls,
      cacheHits: this.cacheHits,
      estimatedCostUsd: Math.round(cost * 1000) / 1000,
    };
  }

  private async fetchSearch(
    key: string,
    query: string,
    bias?: LatLng,
  ): Promise<Result<PlaceCandidate[], AppBoundaryError>> {
    const cached = await this.cache.get(key);
    if (cached?.kind === "search") {
      this.cacheHits += 1;
      return ok(cached.value);
    }

    const result = await this.limit(() => {
      this.searchCalls += 1;
      return this.inner.search(query, bias);
    });
    if (result.isOk()) {
      await this.cache.put(key, { kind: "search", value: result.value });
    }
    return result;
  }

  private async fetchDetails(
    key: string,
    candidateId: string,
  ): Promise<Result<PlaceDetails, AppBoundaryError>> {
    const cached = await this.cache.get(key);
    if (cached?.kind === "details") {
      this.cacheHits += 1;
      return ok(cached.value);
    }

    const result = await this.limit(() => {
      this.detailsCalls += 1;
      return this.inner.details(candidateId);
    });
    if (result.isOk()) {
      await this.cache.put(key, { kind: "details", value: result.value });
    }
    return result;
  }
}
