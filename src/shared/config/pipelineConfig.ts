import { readFileSync } from "node:fs";
import { z } from "zod";
import { PipelineConfigError } from "../../core/entities/appError";
import { COMPANY_STAGES } from "../../core/entities/company";

const nonEmptyText = z.string().trim().min(1);
const unitInterval = z.number().min(0).max(1);

const pipelineConfigSchema = z.object({
  region: z.object({
    name: nonEmptyText,
    stateTokens: z.array(nonEmptyText).min(1),
    queryHint: nonEmptyText,
    center: z.object({
      lat: z.number().min(-90).max(90),
      lng: z.number().min(-180).max(180),
    }),
    radiusMeters: z.number().positive(),
    radiusBackstop: z.boolean().default(true),
    cityWhitelist: z.array(nonEmptyText).min(1),
    cityAliases: z.record(nonEmptyText).default({}),
    denylist: z.array(nonEmptyText).default([]),
  }),
  domains: z.object({
    aggregators: z.array(nonEmptyText).default([]),
    allowList: z.array(nonEmptyText).default([]),
  }),
  names: z.object({
    legalSuffixes: z.array(nonEmptyText).default([]),
  }),
  dedupe: z.object({
    sourcePriority: z.array(nonEmptyText).default([]),
    variantNameThreshold: unitInterval.default(0.8),
  }),
  enrichment: z.object({
    queryQualifier: z.string().default("biotech"),
    maxCandidates: z.number().int().positive().default(5),
    nameMatchThreshold: unitInterval.default(0.8),
    acceptanceThreshold: unitInterval.default(0.75),
    multiTenantNameThreshold: unitInterval.default(0.9),
    reasoningAcceptanceThreshold: unitInterval.default(0.75),
    reasoningMultiTenantConfidence: unitInterval.default(0.85),
    disallowedTypes: z.array(nonEmptyText).default([]),
    multiTenantAddresses: z.array(nonEmptyText).default([]),
  }),
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type RegionConfig = PipelineConfig["region"];
export type EnrichmentConfig = PipelineConfig["enrichment"];

export const MAPPABLE_FIELDS = [
  "name",
  "website",
  "address",
  "city",
  "state",
  "stage",
  "focusAreas",
  "description",
  "lat",
  "lng",
  "geofenceOverride",
] as const;

export type MappableField = (typeof MAPPABLE_FIELDS)[number];

const sourceDefinitionSchema = z.object({
  tag: nonEmptyText,
  path: nonEmptyText,
  columns: z.object({
    name: nonEmptyText,
    website: nonEmptyText.optional(),
    address: nonEmptyText.optional(),
    city: nonEmptyText.optional(),
    state: nonEmptyText.optional(),
    stage: nonEmptyText.optional(),
    focusAreas: nonEmptyText.optional(),
    description: nonEmptyText.optional(),
    lat: nonEmptyText.optional(),
    lng: nonEmptyText.optional(),
    geofenceOverride: nonEmptyText.optional(),
  }),
});

const sourcesConfigSchema = z.object({
  sources: z.array(sourceDefinitionSchema).min(1),
});

export type SourceDefinition = z.infer<typeof sourceDefinitionSchema>;

const stageRuleTableSchema = z.object({
  version: nonEmptyText,
  aliases: z.record(z.enum(COMPANY_STAGES)).default({}),
  rules: z
    .array(
      z.object({
        stage: z.enum(COMPANY_STAGES),
        keywords: z.array(nonEmptyText).min(1),
      }),
    )
    .min(1),
});

export type StageRuleTable = z.infer<typeof stageRuleTableSchema>;

const readJsonFile = (path: string, label: string): unknown => {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (error) {
    throw new PipelineConfigError(`Cannot read ${label} at ${path}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new PipelineConfigError(`${label} at ${path} is not valid JSON`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
};

const parseWith = <Schema extends z.ZodTypeAny>(
  schema: Schema,
  value: unknown,
  label: string,
): z.infer<Schema> => {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new PipelineConfigError(
      `Invalid ${label}`,
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`,
      ),
    );
  }
  return parsed.data;
};

export const parsePipelineConfig = (value: unknown): PipelineConfig =>
  parseWith(pipelineConfigSchema, value, "pipeline config");

export const parseSourceDefinitions = (value: unknown): SourceDefinition[] => {
  const config = parseWith(sourcesConfigSchema, value, "source mapping");
  const tags = config.sources.map((source) => source.tag);
  const duplicates = tags.filter((tag, index) => tags.indexOf(tag) !== index);
  if (duplicates.length > 0) {
    throw new PipelineConfigError("Duplicate source tags", duplicates);
  }

  return config.sources;
};

export const parseStageRuleTable = (value: unknown): StageRuleTable =>
  parseWith(stageRuleTableSchema, value, "stage rule table");

export const loadPipelineConfig = (path: string): PipelineConfig =>
  parsePipelineConfig(readJsonFile(path, "pipeline config"));

export const loadSourceDefinitions = (path: string): SourceDefinition[] =>
  parseSourceDefinitions(readJsonFile(path, "source mapping"));

export const loadStageRuleTable = (path: string): StageRuleTable =>
  parseStageRuleTable(readJsonFile(path, "stage rule table"));
