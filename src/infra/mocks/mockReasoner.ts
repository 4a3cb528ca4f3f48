import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  DiscoveryRequest,
  DiscoveryResult,
  PlaceLookupPort,
  ReasoningPort,
} from "../../core/ports/inboundPorts";

/**
 * Deterministic stand-in for the reasoning collaborator: one search, details of the top hit.
 */
export class MockReasoner implements ReasoningPort {
  constructor(private readonly confidence = 0.8) {}

  async discover(
    request: DiscoveryRequest,
    lookup: PlaceLookupPort,
  ): Promise<Result<DiscoveryResult, AppBoundaryError>> {
    const query = [request.companyName, request.cityHint, "CA"]
      .filter((part): part is string => part !== undefined && part.length > 0)
      .join(" ");
    const search = await lookup.search(query);
    if (search.isErr()) {
      return err(search.error);
    }

    const top = search.value[0];
    if (!top) {
      return ok({
        companyName: request.companyName,
        confidence: 0,
        validation: {
          inRegion: false,
          brandMatches: false,
          isBusiness: false,
          reasoning: "no place found for the company name",
        },
      });
    }

    const details = await lookup.details(top.id);
    if (details.isErr()) {
      return err(details.error);
    }

    return ok({
      companyName: details.value.name,
      address: details.value.formattedAddress,
      website: details.value.website,
      placeId: details.value.id,
      confidence: this.confidence,
      validation: {
        inRegion: true,
        brandMatches: true,
        isBusiness: details.value.operationalStatus === "operational",
        reasoning: `top lookup match "${details.value.name}"`,
      },
    });
  }
}
