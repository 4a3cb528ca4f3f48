import "dotenv/config";
import { z } from "zod";
import { PipelineConfigError } from "../../core/entities/appError";

const supportedPlacesProviders = ["mock", "google"] as const;
const supportedReasonerProviders = ["mock", "ollama"] as const;

export type PlacesProviderName = (typeof supportedPlacesProviders)[number];
export type ReasonerProviderName = (typeof supportedReasonerProviders)[number];

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  PIPELINE_CONFIG_PATH: z.string().default("config/pipeline.json"),
  SOURCES_CONFIG_PATH: z.string().default("config/sources.json"),
  STAGE_RULES_PATH: z.string().default("config/stage-rules.json"),
  STAGING_DIR: z.string().default("data/staging"),
  PRODUCTION_PATH: z.string().default("data/final/companies.csv"),
  CHECKPOINT_PATH: z
    .string()
    .default("data/working/enrichment_checkpoint.json"),
  LOOKUP_CACHE_PATH: z.string().default("data/working/lookup_cache.json"),
  LOOKUP_CACHE_TTL_DAYS: z.coerce.number().int().positive().default(30),
  PLACES_PROVIDER: z.enum(supportedPlacesProviders).default("mock"),
  MOCK_PLACES_PATH: z.string().default("data/fixtures/mock_places.json"),
  GOOGLE_MAPS_BASE_URL: z.string().default("https://maps.googleapis.com"),
  GOOGLE_MAPS_API_KEY: z.string().default(""),
  GOOGLE_MAPS_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  REASONER_PROVIDER: z.enum(supportedReasonerProviders).default("mock"),
  OLLAMA_BASE_URL: z.string().default("http://localhost:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  OLLAMA_CHAT_TIMEOUT_MS: z.coerce.number().int().positive().default(180_000),
  REASONER_MAX_ROUNDS: z.coerce.number().int().positive().default(8),
  ENRICH_CONCURRENCY: z.coerce.number().int().positive().default(4),
  LOOKUP_CONCURRENCY: z.coerce.number().int().positive().default(2),
  LOOKUP_RETRY_ATTEMPTS: z.coerce.number().int().positive().default(3),
  LOOKUP_RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(500),
  PLACES_SEARCH_COST_USD: z.coerce.number().nonnegative().default(0.032),
  PLACES_DETAILS_COST_USD: z.coerce.number().nonnegative().default(0.017),
});

export type AppEnv = z.infer<typeof envSchema>;

/**
 * Parses process env once; an invalid value is a fatal configuration error.
 */
export const parseEnv = (source: NodeJS.ProcessEnv): AppEnv => {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    throw new PipelineConfigError(
      "Invalid environment",
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    );
  }
  return parsed.data;
};

export const env: AppEnv = parseEnv(process.env);
