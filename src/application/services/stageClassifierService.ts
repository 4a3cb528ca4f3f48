import {
  COMPANY_STAGES,
  type CompanyRecord,
  type CompanyStage,
} from "../../core/entities/company";
import type { StageRuleTable } from "../../shared/config/pipelineConfig";

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

type CompiledRule = {
  stage: CompanyStage;
  patterns: RegExp[];
};

/**
 * Applies the versioned stage rule table; first matching rule wins, fallback is Unknown.
 */
export class StageClassifierService {
  private readonly rules: CompiledRule[];
  private readonly aliases: Map<string, CompanyStage>;

  constructor(private readonly table: StageRuleTable) {
    this.rules = table.rules.map((rule) => ({
      stage: rule.stage,
      patterns: rule.keywords.map(
        (keyword) =>
          new RegExp(
            `(^|[^a-z0-9])${escapeRegExp(keyword.toLowerCase())}($|[^a-z0-9])`,
          ),
      ),
    }));
    this.aliases = new Map(
      Object.entries(table.aliases).map(([alias, stage]) => [
        alias.trim().toLowerCase(),
        stage,
      ]),
    );
  }

  get version(): string {
    return this.table.version;
  }

  /**
   * Coerces raw source stage text into the closed set.
   */
  parseStage(raw: string | undefined): CompanyStage {
    const key = raw?.trim().toLowerCase() ?? "";
    if (key.length === 0) {
      return "Unknown";
    }
    return this.aliases.get(key) ?? this.exactStage(key) ?? "Unknown";
  }

  classify(record: CompanyRecord): CompanyStage {
    const text = [record.focusAreas, record.description, record.name]
      .filter((part): part is string => part !== undefined)
      .join(" \n ")
      .toLowerCase();

    return (
      this.rules.find((rule) =>
        rule.patterns.some((pattern) => pattern.test(text)),
      )?.stage ?? "Unknown"
    );
  }

  /**
   * Classifies only records whose stage is Unknown; explicit stages are kept.
   */
  classifyAll(records: CompanyRecord[]): {
    records: CompanyRecord[];
    classified: number;
  } {
    let classified = 0;
    const result = records.map((record) => {
      if (record.stage !== "Unknown") {
        return record;
      }
      const stage = this.classify(record);
      if (stage === "Unknown") {
        return record;
      }
      classified += 1;
      return { ...record, stage };
    });

    return { records: result, classified };
  }

  private exactStage(key: string): CompanyStage | undefined {
    return COMPANY_STAGES.find((stage) => stage.toLowerCase() === key);
  }
}
