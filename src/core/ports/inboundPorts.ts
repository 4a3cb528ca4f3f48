import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { LatLng } from "../entities/company";

export type PlaceCandidate = {
  id: string;
  name: string;
  formattedAddress?: string;
  types: string[];
};

export type OperationalStatus =
  | "operational"
  | "closed_temporarily"
  | "closed_permanently"
  | "unknown";

export type PlaceDetails = {
  id: string;
  name: string;
  formattedAddress?: string;
  website?: string;
  types: string[];
  operationalStatus: OperationalStatus;
  location?: LatLng;
};

/**
 * Ground-truth place lookup shared by deterministic scoring and guided discovery.
 */
export interface PlaceLookupPort {
  search(
    query: string,
    bias?: LatLng,
  ): Promise<Result<PlaceCandidate[], AppBoundaryError>>;
  details(candidateId: string): Promise<Result<PlaceDetails, AppBoundaryError>>;
}

export type DiscoveryRequest = {
  companyName: string;
  cityHint?: string;
};

export type DiscoveryResult = {
  companyName: string;
  address?: string;
  city?: string;
  website?: string;
  placeId?: string;
  confidence: number;
  validation: {
    inRegion: boolean;
    brandMatches: boolean;
    isBusiness: boolean;
    reasoning: string;
  };
};

/**
 * Reasoning collaborator that searches for a company using the lookup tools it is handed.
 * Its answer is untrusted and always passes the system gates.
 */
export interface ReasoningPort {
  discover(
    request: DiscoveryRequest,
    lookup: PlaceLookupPort,
  ): Promise<Result<DiscoveryResult, AppBoundaryError>>;
}
