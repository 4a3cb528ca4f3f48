import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../core/entities/appError";
import type {
  CheckpointEntry,
  CheckpointStorePort,
  TableRow,
  TabularStorePort,
} from "../core/ports/outboundPorts";

export type WrittenTable = {
  columns: readonly string[];
  rows: TableRow[];
};

/**
 * Keeps tables, JSON and text documents in maps keyed by path.
 */
export class InMemoryTabularStore implements TabularStorePort {
  readonly tables = new Map<string, WrittenTable>();
  readonly json = new Map<string, unknown>();
  readonly text = new Map<string, string>();

  constructor(seed: Record<string, TableRow[]> = {}) {
    for (const [path, rows] of Object.entries(seed)) {
      this.tables.set(path, {
        columns: Object.keys(rows[0] ?? {}),
        rows,
      });
    }
  }

  async readTable(path: string): Promise<Result<TableRow[], AppBoundaryError>> {
    const table = this.tables.get(path);
    return table
      ? ok(table.rows)
      : err({
          source: "storage",
          code: "not_found",
          provider: "memory",
          message: `No table at ${path}`,
          retryable: false,
        });
  }

  async writeTable(
    path: string,
    columns: readonly string[],
    rows: TableRow[],
  ): Promise<void> {
    this.tables.set(path, { columns, rows });
  }

  async writeJson(path: string, value: unknown): Promise<void> {
    this.json.set(path, value);
  }

  async writeText(path: string, content: string): Promise<void> {
    this.text.set(path, content);
  }

  async replaceFile(sourcePath: string, destinationPath: string): Promise<void> {
    const table = this.tables.get(sourcePath);
    if (!table) {
      throw new Error(`No table at ${sourcePath}`);
    }
    this.tables.set(destinationPath, table);
  }
}

export class InMemoryCheckpointStore implements CheckpointStorePort {
  readonly entries = new Map<string, CheckpointEntry>();

  async load(): Promise<Map<string, CheckpointEntry>> {
    return new Map(this.entries);
  }

  async save(recordId: string, entry: CheckpointEntry): Promise<void> {
    this.entries.set(recordId, entry);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }
}
