import { readFileSync } from "node:fs";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import {
  PipelineConfigError,
  type AppBoundaryError,
} from "../../core/entities/appError";
import type {
  PlaceCandidate,
  PlaceDetails,
  PlaceLookupPort,
} from "../../core/ports/inboundPorts";
import { placeDetailsSchema } from "../storage/schemas";

/**
 * Reads the mock place catalogue; an unreadable or malformed file is a configuration error.
 */
export const loadMockPlaces = (path: string): PlaceDetails[] => {
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    throw new PipelineConfigError(`Cannot load mock places from ${path}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const parsed = z.array(placeDetailsSchema).safeParse(json);
  if (!parsed.success) {
    throw new PipelineConfigError(
      `Invalid mock places in ${path}`,
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return parsed.data;
};

const compact = (value: string): string =>
  value.toLowerCase().replace(/[^a-z0-9]/g, "");

/**
 * Serves a fixed place catalogue so runs and tests need no network.
 * A place matches when its name or website contains the first query token.
 */
export class MockPlaceLookup implements PlaceLookupPort {
  private readonly places: Map<string, PlaceDetails>;

  constructor(places: PlaceDetails[] = []) {
    this.places = new Map(places.map((place) => [place.id, place]));
  }

  async search(
    query: string,
  ): Promise<Result<PlaceCandidate[], AppBoundaryError>> {
    const token = compact(query.trim().split(/\s+/)[0] ?? "");
    if (token.length === 0) {
      return ok([]);
    }

    return ok(
      [...this.places.values()]
        .filter(
          (place) =>
            compact(place.name).includes(token) ||
            compact(place.website ?? "").includes(token),
        )
        .map((place) => ({
          id: place.id,
          name: place.name,
          formattedAddress: place.formattedAddress,
          types: place.types,
        })),
    );
  }

  async details(
    candidateId: string,
  ): Promise<Result<PlaceDetails, AppBoundaryError>> {
    const place = this.places.get(candidateId);
    return place
      ? ok(place)
      : err({
          source: "lookup",
          code: "not_found",
          provider: "mock-places",
          message: `Unknown place ${candidateId}`,
          retryable: false,
        });
  }
}
