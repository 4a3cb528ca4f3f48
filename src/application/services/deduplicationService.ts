import {
  populatedFieldCount,
  type CompanyRecord,
  type RecordFlag,
} from "../../core/entities/company";
import type { DomainReuseConflict } from "../../core/entities/pipeline";
import type { GeofenceService } from "./geofenceService";
import type { NormalizationService } from "./normalizationService";

export type DeduplicationOptions = {
  sourcePriority: readonly string[];
  variantNameThreshold: number;
  allowListedDomains: readonly string[];
};

export type DeduplicationResult = {
  merged: CompanyRecord[];
  domainReuseReport: DomainReuseConflict[];
};

type TextField = "state" | "focusAreas" | "description";

const hasText = (value: string | undefined): value is string =>
  value !== undefined && value.trim().length > 0;

/**
 * A name that normalizes to nothing cannot key a company; such records keep their first row id.
 */
export const mergedRecordId = (
  record: Pick<CompanyRecord, "domainKey" | "normalizedName">,
  firstRowId: string,
): string =>
  record.normalizedName.length > 0
    ? `${record.domainKey ?? "-"}|${record.normalizedName}`
    : firstRowId;

/**
 * Merges records describing the same company and reports domains claimed by several companies.
 */
export class DeduplicationService {
  private readonly allowListed: Set<string>;

  constructor(
    private readonly normalizer: NormalizationService,
    private readonly geofence: GeofenceService,
    private readonly options: DeduplicationOptions,
  ) {
    this.allowListed = new Set(
      options.allowListedDomains.map((domain) => domain.toLowerCase()),
    );
  }

  /**
   * Repeats merge passes until one performs no merge, so the output is a fixed point.
   */
  merge(records: CompanyRecord[]): DeduplicationResult {
    let current = records;
    for (;;) {
      const next = this.mergePass(current);
      const settled = next.length === current.length;
      current = next;
      if (settled) {
        break;
      }
    }

    return { merged: current, domainReuseReport: this.reuseReport(current) };
  }

  /**
   * Name variants: equal keys, containment, same first brand token or close spelling.
   */
  namesAreVariants(left: CompanyRecord, right: CompanyRecord): boolean {
    const a = left.normalizedName;
    const b = right.normalizedName;
    if (a.length === 0 || b.length === 0) {
      return false;
    }
    if (a === b) {
      return true;
    }
    const shorter = a.length <= b.length ? a : b;
    const longer = shorter === a ? b : a;
    if (shorter.length >= 3 && longer.includes(shorter)) {
      return true;
    }
    const firstA = a.split(" ")[0];
    const firstB = b.split(" ")[0];
    if (firstA !== undefined && firstA.length >= 3 && firstA === firstB) {
      return true;
    }
    return (
      this.normalizer.nameSimilarity(a, b) >= this.options.variantNameThreshold
    );
  }

  matches(left: CompanyRecord, right: CompanyRecord): boolean {
    if (left.domainKey && right.domainKey) {
      return (
        left.domainKey === right.domainKey && this.namesAreVariants(left, right)
      );
    }
    return (
      left.normalizedName.length > 0 &&
      left.normalizedName === right.normalizedName
    );
  }

  private mergePass(records: CompanyRecord[]): CompanyRecord[] {
    const parent = records.map((_, index) => index);
    const groupDomain = records.map((record) => record.domainKey);

    const find = (index: number): number => {
      let root = index;
      while (parent[root] !== root) {
        root = parent[root] ?? root;
      }
      let cursor = index;
      while (parent[cursor] !== root) {
        const next = parent[cursor] ?? root;
        parent[cursor] = root;
        cursor = next;
      }
      return root;
    };

    const union = (left: number, right: number): void => {
      const rootLeft = find(left);
      const rootRight = find(right);
      if (rootLeft === rootRight) {
        return;
      }
      const domainLeft = groupDomain[rootLeft];
      const domainRight = groupDomain[rootRight];
      if (domainLeft && domainRight && domainLeft !== domainRight) {
        return;
      }
      const [root, child] =
        rootLeft < rootRight ? [rootLeft, rootRight] : [rootRight, rootLeft];
      parent[child] = root;
      groupDomain[root] = domainLeft ?? domainRight;
    };

    const buckets = new Map<string, number[]>();
    records.forEach((record, index) => {
      const keys = [`name:${record.normalizedName}`];
      if (record.domainKey) {
        keys.push(`domain:${record.domainKey}`);
      }
      for (const key of keys) {
        buckets.set(key, [...(buckets.get(key) ?? []), index]);
      }
    });

    for (const members of buckets.values()) {
      for (let i = 0; i < members.length; i += 1) {
        for (let j = i + 1; j < members.length; j += 1) {
          const left = members[i];
          const right = members[j];
          if (left === undefined || right === undefined) {
            continue;
          }
          const recordLeft = records[left];
          const recordRight = records[right];
          if (recordLeft && recordRight && this.matches(recordLeft, recordRight)) {
            union(left, right);
          }
        }
      }
    }

    const groups = new Map<number, CompanyRecord[]>();
    records.forEach((record, index) => {
      const root = find(index);
      groups.set(root, [...(groups.get(root) ?? []), record]);
    });

    return [...groups.entries()]
      .sort(([left], [right]) => left - right)
      .map(([, members]) => this.mergeGroup(members));
  }

  private priorityOf(record: CompanyRecord): number {
    const ranks = record.sources
      .map((source) => this.options.sourcePriority.indexOf(source))
      .filter((rank) => rank >= 0);
    return ranks.length > 0
      ? Math.min(...ranks)
      : this.options.sourcePriority.length;
  }

  private mergeGroup(members: CompanyRecord[]): CompanyRecord {
    const ranked = members
      .map((record, order) => ({
        record,
        order,
        populated: populatedFieldCount(record),
        priority: this.priorityOf(record),
      }))
      .sort(
        (left, right) =>
          right.populated - left.populated ||
          left.priority - right.priority ||
          left.order - right.order,
      )
      .map((entry) => entry.record);

    const [survivor, ...others] = ranked;
    if (!survivor) {
      throw new Error("Cannot merge an empty group");
    }

    const merged: CompanyRecord = {
      ...survivor,
      cityCandidates: [...survivor.cityCandidates],
      sources: [...new Set(ranked.flatMap((record) => record.sources))],
      geofenceOverride: ranked.some((record) => record.geofenceOverride),
    };

    if (!hasText(merged.website)) {
      const donor = others.find((record) => hasText(record.website));
      if (donor) {
        merged.website = donor.website;
        merged.domainKey = donor.domainKey;
      }
    }

    if (!hasText(merged.address)) {
      const donor = others.find((record) => hasText(record.address));
      if (donor) {
        merged.address = donor.address;
        merged.addressOrigin = donor.addressOrigin;
        merged.placeId = donor.placeId;
      }
    }

    if (!merged.location) {
      merged.location = others.find((record) => record.location)?.location;
    }

    if (merged.stage === "Unknown") {
      merged.stage =
        others.find((record) => record.stage !== "Unknown")?.stage ?? "Unknown";
    }

    const textFields: TextField[] = ["state", "focusAreas", "description"];
    for (const field of textFields) {
      if (!hasText(merged[field])) {
        merged[field] = others.find((record) => hasText(record[field]))?.[field];
      }
    }

    this.resolveCity(merged, ranked);
    merged.id = mergedRecordId(merged, members[0]?.id ?? survivor.id);
    return merged;
  }

  private resolveCity(merged: CompanyRecord, ranked: CompanyRecord[]): void {
    const distinct: string[] = [];
    for (const city of ranked.flatMap((record) => [
      record.city,
      ...record.cityCandidates,
    ])) {
      if (hasText(city) && !distinct.some((seen) => this.geofence.sameCity(seen, city))) {
        distinct.push(city);
      }
    }

    const addressCity = this.geofence.cityFromAddress(merged.address);
    const flags = new Set<RecordFlag>(
      ranked
        .flatMap((record) => record.flags)
        .filter(
          (flag) => flag !== "city_conflict" && flag !== "city_address_mismatch",
        ),
    );

    if (distinct.length > 1 && addressCity) {
      merged.city = addressCity;
      merged.cityCandidates = [];
    } else if (distinct.length > 1) {
      merged.city = "";
      merged.cityCandidates = distinct;
      flags.add("city_conflict");
    } else {
      merged.city = distinct[0] ?? addressCity;
      merged.cityCandidates = [];
    }

    if (
      hasText(merged.city) &&
      addressCity &&
      !this.geofence.sameCity(merged.city, addressCity)
    ) {
      flags.add("city_address_mismatch");
    }
    merged.flags = [...flags];
  }

  private reuseReport(records: CompanyRecord[]): DomainReuseConflict[] {
    const byDomain = new Map<string, CompanyRecord[]>();
    for (const record of records) {
      if (record.domainKey) {
        byDomain.set(record.domainKey, [
          ...(byDomain.get(record.domainKey) ?? []),
          record,
        ]);
      }
    }

    return [...byDomain.entries()]
      .filter(([, claimants]) => claimants.length > 1)
      .map(([domainKey, claimants]) => ({
        domainKey,
        recordIds: claimants.map((record) => record.id),
        names: claimants.map((record) => record.name),
        allowListed: this.allowListed.has(domainKey),
      }));
  }
}
