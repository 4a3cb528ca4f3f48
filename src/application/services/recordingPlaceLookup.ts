import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { LatLng } from "../../core/entities/company";
import type {
  PlaceCandidate,
  PlaceDetails,
  PlaceLookupPort,
} from "../../core/ports/inboundPorts";
import type { RetryPolicy } from "./retryPolicy";

const addressKey = (address: string): string =>
  address
    .toLowerCase()
    .replace(/,?\s*(usa|united states)$/, "")
    .replace(/[^a-z0-9]/g, "");

/**
 * Lookup handed to the reasoning collaborator: every call goes through the retry policy
 * and fetched details are remembered so a returned address can be traced to its place id.
 */
export class RecordingPlaceLookup implements PlaceLookupPort {
  private readonly fetched = new Map<string, PlaceDetails>();

  constructor(
    private readonly inner: PlaceLookupPort,
    private readonly retry: RetryPolicy,
  ) {}

  search(
    query: string,
    bias?: LatLng,
  ): Promise<Result<PlaceCandidate[], AppBoundaryError>> {
    return this.retry.execute(() => this.inner.search(query, bias));
  }

  async details(
    candidateId: string,
  ): Promise<Result<PlaceDetails, AppBoundaryError>> {
    const result = await this.retry.execute(() =>
      this.inner.details(candidateId),
    );
    if (result.isOk()) {
      this.fetched.set(result.value.id, result.value);
    }
    return result;
  }

  byId(placeId: string): PlaceDetails | undefined {
    return this.fetched.get(placeId);
  }

  byAddress(address: string | undefined): PlaceDetails | undefined {
    if (!address) {
      return undefined;
    }
    const wanted = addressKey(address);
    if (wanted.length === 0) {
      return undefined;
    }
    return [...this.fetched.values()].find((details) => {
      const key = details.formattedAddress
        ? addressKey(details.formattedAddress)
        : "";
      return key.length > 0 && (key === wanted || key.startsWith(wanted) || wanted.startsWith(key));
    });
  }
}
