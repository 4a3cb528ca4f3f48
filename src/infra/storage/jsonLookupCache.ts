import { readFile } from "node:fs/promises";
import pLimit from "p-limit";
import type {
  ClockPort,
  LookupCacheEntry,
  LookupCachePort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { isMissingFileError, writeFileAtomic } from "./atomicFile";
import { lookupCacheFileSchema } from "./schemas";

type StoredEntry = {
  storedAt: string;
  entry: LookupCacheEntry;
};

/**
 * Lookup responses persisted in one JSON file; entries older than the TTL are treated as misses.
 */
export class JsonLookupCache implements LookupCachePort {
  private loading?: Promise<Map<string, StoredEntry>>;
  private readonly writes = pLimit(1);

  constructor(
    private readonly path: string,
    private readonly ttlMs: number,
    private readonly clock: ClockPort,
  ) {}

  async get(key: string): Promise<LookupCacheEntry | undefined> {
    const stored = (await this.entries()).get(key);
    if (!stored) {
      return undefined;
    }
    const age = this.clock.now().getTime() - Date.parse(stored.storedAt);
    return Number.isFinite(age) && age <= this.ttlMs ? stored.entry : undefined;
  }

  async put(key: string, entry: LookupCacheEntry): Promise<void> {
    const entries = await this.entries();
    entries.set(key, { storedAt: this.clock.now().toISOString(), entry });
    await this.writes(() =>
      writeFileAtomic(this.path, JSON.stringify(Object.fromEntries(entries))),
    );
  }

  private entries(): Promise<Map<string, StoredEntry>> {
    this.loading ??= this.load();
    return this.loading;
  }

  private async load(): Promise<Map<string, StoredEntry>> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (error) {
      if (isMissingFileError(error)) {
        return new Map();
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.warn({ path: this.path, error }, "Lookup cache is not valid JSON; starting empty");
      return new Map();
    }

    const parsed = lookupCacheFileSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn(
        { path: this.path, issues: parsed.error.issues.length },
        "Lookup cache has an unexpected shape; starting empty",
      );
      return new Map();
    }
    return new Map(Object.entries(parsed.data));
  }
}
