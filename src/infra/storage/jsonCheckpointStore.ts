import { readFile, rm } from "node:fs/promises";
import pLimit from "p-limit";
import type {
  CheckpointEntry,
  CheckpointStorePort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { isMissingFileError, writeFileAtomic } from "./atomicFile";
import { checkpointFileSchema } from "./schemas";

/**
 * Enrichment outcomes keyed by record id, rewritten atomically after every save.
 */
export class JsonCheckpointStore implements CheckpointStorePort {
  private entries?: Map<string, CheckpointEntry>;
  private readonly writes = pLimit(1);

  constructor(private readonly path: string) {}

  async load(): Promise<Map<string, CheckpointEntry>> {
    this.entries = await this.read();
    return new Map(this.entries);
  }

  async save(recordId: string, entry: CheckpointEntry): Promise<void> {
    this.entries ??= await this.read();
    this.entries.set(recordId, entry);
    const snapshot = JSON.stringify({
      version: 1,
      entries: Object.fromEntries(this.entries),
    });
    await this.writes(() => writeFileAtomic(this.path, snapshot));
  }

  async clear(): Promise<void> {
    this.entries = new Map();
    await this.writes(() => rm(this.path, { force: true }));
  }

  private async read(): Promise<Map<string, CheckpointEntry>> {
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
      logger.warn({ path: this.path, error }, "Checkpoint is not valid JSON; enrichment restarts from scratch");
      return new Map();
    }

    const parsed = checkpointFileSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn(
        { path: this.path, issues: parsed.error.issues.length },
        "Checkpoint has an unexpected shape; enrichment restarts from scratch",
      );
      return new Map();
    }
    return new Map(Object.entries(parsed.data.entries));
  }
}
