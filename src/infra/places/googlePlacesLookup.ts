import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type {
  AppBoundaryError,
  AppBoundaryErrorCode,
} from "../../core/entities/appError";
import type { LatLng } from "../../core/entities/company";
import type {
  OperationalStatus,
  PlaceCandidate,
  PlaceDetails,
  PlaceLookupPort,
} from "../../core/ports/inboundPorts";
import { HttpJsonClient, type HttpClientError } from "../http/httpJsonClient";

const SEARCH_RADIUS_M = 50_000;
const DETAIL_FIELDS = [
  "place_id",
  "name",
  "formatted_address",
  "website",
  "types",
  "geometry/location",
  "business_status",
].join(",");

const statusSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
});

const searchSchema = statusSchema.extend({
  results: z
    .array(
      z.object({
        place_id: z.string(),
        name: z.string().default(""),
        formatted_address: z.string().optional(),
        types: z.array(z.string()).default([]),
      }),
    )
    .default([]),
});

const detailsSchema = statusSchema.extend({
  result: z
    .object({
      place_id: z.string(),
      name: z.string().default(""),
      formatted_address: z.string().optional(),
      website: z.string().optional(),
      types: z.array(z.string()).default([]),
      business_status: z.string().optional(),
      geometry: z
        .object({ location: z.object({ lat: z.number(), lng: z.number() }) })
        .optional(),
    })
    .optional(),
});

const BUSINESS_STATUS: Record<string, OperationalStatus> = {
  OPERATIONAL: "operational",
  CLOSED_TEMPORARILY: "closed_temporarily",
  CLOSED_PERMANENTLY: "closed_permanently",
};

/**
 * Google Places text search and details over the JSON web service.
 */
export class GooglePlacesLookup implements PlaceLookupPort {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly timeoutMs = 10_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  async search(
    query: string,
    bias?: LatLng,
  ): Promise<Result<PlaceCandidate[], AppBoundaryError>> {
    const params = new URLSearchParams({ query, key: this.apiKey });
    if (bias) {
      params.set("location", `${bias.lat},${bias.lng}`);
      params.set("radius", String(SEARCH_RADIUS_M));
    }

    const body = await this.get(`/maps/api/place/textsearch/json?${params}`);
    if (body.isErr()) {
      return err(body.error);
    }

    const parsed = searchSchema.safeParse(body.value);
    if (!parsed.success) {
      return err(this.malformed("text search", parsed.error));
    }
    if (parsed.data.status === "ZERO_RESULTS") {
      return ok([]);
    }
    if (parsed.data.status !== "OK") {
      return err(this.statusError(parsed.data.status, parsed.data.error_message));
    }

    return ok(
      parsed.data.results.map((result) => ({
        id: result.place_id,
        name: result.name,
        formattedAddress: result.formatted_address,
        types: result.types,
      })),
    );
  }

  async details(
    candidateId: string,
  ): Promise<Result<PlaceDetails, AppBoundaryError>> {
    const params = new URLSearchParams({
      place_id: candidateId,
      fields: DETAIL_FIELDS,
      key: this.apiKey,
    });

    const body = await this.get(`/maps/api/place/details/json?${params}`);
    if (body.isErr()) {
      return err(body.error);
    }

    const parsed = detailsSchema.safeParse(body.value);
    if (!parsed.success) {
      return err(this.malformed("details", parsed.error));
    }
    if (parsed.data.status !== "OK") {
      return err(this.statusError(parsed.data.status, parsed.data.error_message));
    }

    const result = parsed.data.result;
    if (!result) {
      return err(this.malformed("details", "missing result"));
    }

    return ok({
      id: result.place_id,
      name: result.name,
      formattedAddress: result.formatted_address,
      website: result.website,
      types: result.types,
      operationalStatus:
        BUSINESS_STATUS[result.business_status ?? ""] ?? "unknown",
      location: result.geometry?.location,
    });
  }

  private async get(path: string): Promise<Result<unknown, AppBoundaryError>> {
    if (this.apiKey.trim().length === 0) {
      return err({
        source: "lookup",
        code: "config_invalid",
        provider: "google-places",
        message: "GOOGLE_MAPS_API_KEY is not configured.",
        retryable: false,
      });
    }

    const response = await this.httpClient.requestJson({
      url: `${this.baseUrl}${path}`,
      method: "GET",
      timeoutMs: this.timeoutMs,
    });

    if (response.isErr()) {
      return err(this.toBoundaryError(response.error));
    }
    return ok(response.value);
  }

  private toBoundaryError(error: HttpClientError): AppBoundaryError {
    return {
      source: "lookup",
      code: this.mapHttpCode(error),
      provider: "google-places",
      message: error.message,
      retryable: error.retryable,
      httpStatus: error.httpStatus,
      cause: error.cause,
    };
  }

  private mapHttpCode(error: HttpClientError): AppBoundaryErrorCode {
    if (error.httpStatus === 401 || error.httpStatus === 403) {
      return "auth_invalid";
    }
    if (error.httpStatus === 429) {
      return "rate_limited";
    }
    if (error.code === "non_success_status") {
      return "provider_error";
    }
    return error.code;
  }

  private statusError(status: string, detail?: string): AppBoundaryError {
    const base = {
      source: "lookup" as const,
      provider: "google-places",
      message: detail ? `Places status ${status}: ${detail}` : `Places status ${status}`,
    };

    switch (status) {
      case "OVER_QUERY_LIMIT":
        return { ...base, code: "rate_limited", retryable: true };
      case "REQUEST_DENIED":
        return { ...base, code: "auth_invalid", retryable: false };
      case "INVALID_REQUEST":
        return { ...base, code: "validation_error", retryable: false };
      case "NOT_FOUND":
        return { ...base, code: "not_found", retryable: false };
      default:
        return { ...base, code: "provider_error", retryable: true };
    }
  }

  private malformed(operation: string, cause: unknown): AppBoundaryError {
    return {
      source: "lookup",
      code: "malformed_response",
      provider: "google-places",
      message: `Places ${operation} payload did not match the expected shape.`,
      retryable: true,
      cause,
    };
  }
}
