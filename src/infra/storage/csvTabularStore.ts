import { copyFile, mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { err, ok, type Result } from "neverthrow";
import Papa from "papaparse";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  TableRow,
  TabularStorePort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { isMissingFileError, writeFileAtomic } from "./atomicFile";

/**
 * Parses CSV text with a header row into trimmed string rows.
 */
export const parseCsv = (content: string): TableRow[] => {
  const parsed = Papa.parse<Record<string, unknown>>(content, {
    header: true,
    skipEmptyLines: "greedy",
    transformHeader: (header) => header.trim(),
  });

  if (parsed.errors.length > 0) {
    logger.warn(
      {
        errors: parsed.errors.slice(0, 5).map((error) => ({
          row: error.row,
          message: error.message,
        })),
      },
      "CSV rows with parse errors",
    );
  }

  return parsed.data.map((row) => {
    const clean: TableRow = {};
    for (const [key, value] of Object.entries(row)) {
      clean[key] = typeof value === "string" ? value : "";
    }
    return clean;
  });
};

export const formatCsv = (
  columns: readonly string[],
  rows: TableRow[],
): string =>
  Papa.unparse(
    {
      fields: [...columns],
      data: rows.map((row) => columns.map((column) => row[column] ?? "")),
    },
    { newline: "\n" },
  );

/**
 * Flat-file artifact storage: CSV tables, JSON documents and atomic replacement.
 */
export class CsvTabularStore implements TabularStorePort {
  async readTable(path: string): Promise<Result<TableRow[], AppBoundaryError>> {
    try {
      return ok(parseCsv(await readFile(path, "utf8")));
    } catch (error) {
      return err({
        source: "storage",
        code: isMissingFileError(error) ? "not_found" : "transport_error",
        provider: "csv",
        message: `Cannot read table at ${path}`,
        retryable: false,
        cause: error,
      });
    }
  }

  async writeTable(
    path: string,
    columns: readonly string[],
    rows: TableRow[],
  ): Promise<void> {
    await writeFileAtomic(path, `${formatCsv(columns, rows)}\n`);
  }

  async writeJson(path: string, value: unknown): Promise<void> {
    await writeFileAtomic(path, `${JSON.stringify(value, null, 2)}\n`);
  }

  async writeText(path: string, content: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, "utf8");
  }

  async replaceFile(sourcePath: string, destinationPath: string): Promise<void> {
    await mkdir(dirname(destinationPath), { recursive: true });
    const temporary = `${destinationPath}.${process.pid}.tmp`;
    await copyFile(sourcePath, temporary);
    await rename(temporary, destinationPath);
  }
}
