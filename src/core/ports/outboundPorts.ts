import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type { EnrichmentOutcome, LookupUsage } from "../entities/pipeline";
import type { PlaceCandidate, PlaceDetails } from "./inboundPorts";

export type TableRow = Record<string, string>;

export interface ClockPort {
  now(): Date;
}

export interface SleeperPort {
  sleep(ms: number): Promise<void>;
}

/**
 * Flat-file persistence for source tables and run artifacts.
 */
export interface TabularStorePort {
  readTable(path: string): Promise<Result<TableRow[], AppBoundaryError>>;
  writeTable(
    path: string,
    columns: readonly string[],
    rows: TableRow[],
  ): Promise<void>;
  writeJson(path: string, value: unknown): Promise<void>;
  writeText(path: string, content: string): Promise<void>;
  /**
   * Replaces the destination through a temp file and rename.
   */
  replaceFile(sourcePath: string, destinationPath: string): Promise<void>;
}

export type CheckpointEntry = {
  fingerprint: string;
  completedAt: string;
  outcome: EnrichmentOutcome;
};

/**
 * Persists every settled enrichment outcome keyed by record id.
 */
export interface CheckpointStorePort {
  load(): Promise<Map<string, CheckpointEntry>>;
  save(recordId: string, entry: CheckpointEntry): Promise<void>;
  clear(): Promise<void>;
}

export type LookupCacheEntry =
  | { kind: "search"; value: PlaceCandidate[] }
  | { kind: "details"; value: PlaceDetails };

export interface LookupCachePort {
  get(key: string): Promise<LookupCacheEntry | undefined>;
  put(key: string, entry: LookupCacheEntry): Promise<void>;
}

/**
 * Exposes lookup call counters for the run summary.
 */
export interface LookupUsagePort {
  usage(): LookupUsage;
}
