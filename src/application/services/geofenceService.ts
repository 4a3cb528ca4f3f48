import type { CompanyRecord, LatLng } from "../../core/entities/company";
import type {
  ExcludedRecord,
  GeofenceDecision,
} from "../../core/entities/pipeline";
import type { RegionConfig } from "../../shared/config/pipelineConfig";

const EARTH_RADIUS_M = 6_371_000;

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const cityKeyOf = (value: string): string =>
  value.trim().toLowerCase().replace(/\s+/g, " ");

/**
 * Great-circle distance in meters.
 */
export const haversineMeters = (from: LatLng, to: LatLng): number => {
  const toRadians = (degrees: number) => (degrees * Math.PI) / 180;
  const dLat = toRadians(to.lat - from.lat);
  const dLng = toRadians(to.lng - from.lng);
  const a =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRadians(from.lat)) *
      Math.cos(toRadians(to.lat)) *
      Math.sin(dLng / 2) ** 2;
  return 2 * EARTH_RADIUS_M * Math.asin(Math.sqrt(a));
};

export type GeofenceSubject = Pick<
  CompanyRecord,
  "city" | "address" | "location"
> &
  Partial<Pick<CompanyRecord, "cityCandidates" | "geofenceOverride">>;

/**
 * Decides whether a record plausibly sits in the target region.
 */
export class GeofenceService {
  private readonly whitelist = new Map<string, string>();
  private readonly denylist = new Map<string, string>();
  private readonly aliases = new Map<string, string>();
  private readonly addressCityPattern: RegExp;

  constructor(private readonly region: RegionConfig) {
    for (const city of region.cityWhitelist) {
      this.whitelist.set(cityKeyOf(city), city);
    }
    for (const city of region.denylist) {
      this.denylist.set(cityKeyOf(city), city);
    }
    for (const [alias, city] of Object.entries(region.cityAliases)) {
      this.aliases.set(cityKeyOf(alias), city);
    }

    const stateTokens = region.stateTokens.map(escapeRegExp).join("|");
    this.addressCityPattern = new RegExp(
      `,\\s*([^,]+?),\\s*(?:${stateTokens})\\b`,
      "i",
    );
  }

  get center(): LatLng {
    return this.region.center;
  }

  /**
   * Lowercased comparison key with aliases resolved.
   */
  cityKey(city: string): string {
    const key = cityKeyOf(city);
    const aliased = this.aliases.get(key);
    return aliased ? cityKeyOf(aliased) : key;
  }

  /**
   * Canonical display form: whitelist or denylist casing when known, trimmed input otherwise.
   */
  canonicalCity(city: string): string {
    const key = this.cityKey(city);
    return this.whitelist.get(key) ?? this.denylist.get(key) ?? city.trim();
  }

  isWhitelisted(city: string | undefined): boolean {
    return city !== undefined && this.whitelist.has(this.cityKey(city));
  }

  isDenylisted(city: string | undefined): boolean {
    return city !== undefined && this.denylist.has(this.cityKey(city));
  }

  sameCity(left: string, right: string): boolean {
    return this.cityKey(left) === this.cityKey(right);
  }

  /**
   * Pulls the city token out of a free-form address, canonicalized.
   */
  cityFromAddress(address: string | undefined): string | undefined {
    if (!address || address.trim().length === 0) {
      return undefined;
    }

    const match = this.addressCityPattern.exec(address);
    const captured = match?.[1]?.trim();
    if (captured) {
      return this.canonicalCity(captured);
    }

    const knownPart = address
      .split(",")
      .map((part) => part.trim())
      .find((part) => this.isWhitelisted(part) || this.isDenylisted(part));
    return knownPart ? this.canonicalCity(knownPart) : undefined;
  }

  check(subject: GeofenceSubject): GeofenceDecision {
    const candidates = subject.cityCandidates ?? [];
    const addressCity = this.cityFromAddress(subject.address);
    const cities = [subject.city, addressCity, ...candidates].filter(
      (city): city is string => city !== undefined && city.trim().length > 0,
    );

    if (cities.some((city) => this.isDenylisted(city))) {
      return { inScope: false, reason: "explicitly denylisted" };
    }
    if (subject.geofenceOverride) {
      return { inScope: true, via: "override" };
    }
    if (
      candidates.length > 0 &&
      candidates.every((city) => this.isWhitelisted(city))
    ) {
      return { inScope: true, via: "city" };
    }
    if (this.isWhitelisted(subject.city)) {
      return { inScope: true, via: "city" };
    }
    if (this.isWhitelisted(addressCity)) {
      return { inScope: true, via: "address" };
    }
    if (this.region.radiusBackstop && subject.location) {
      return haversineMeters(this.region.center, subject.location) <=
        this.region.radiusMeters
        ? { inScope: true, via: "radius" }
        : { inScope: false, reason: "outside radius" };
    }
    return { inScope: false, reason: "not in whitelist" };
  }

  filter(records: CompanyRecord[]): {
    inScope: CompanyRecord[];
    excluded: ExcludedRecord[];
  } {
    const inScope: CompanyRecord[] = [];
    const excluded: ExcludedRecord[] = [];

    for (const record of records) {
      const decision = this.check(record);
      if (decision.inScope) {
        inScope.push(record);
      } else {
        excluded.push({ record, reason: decision.reason });
      }
    }

    return { inScope, excluded };
  }
}
