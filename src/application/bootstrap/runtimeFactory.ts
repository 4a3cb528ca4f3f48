import { ArtifactCodec } from "../services/artifactCodec";
import { CandidateScoringService } from "../services/candidateScoringService";
import { DeduplicationService } from "../services/deduplicationService";
import { EnrichmentRouterService } from "../services/enrichmentRouterService";
import { GeofenceService } from "../services/geofenceService";
import { IngestionService } from "../services/ingestionService";
import { NormalizationService } from "../services/normalizationService";
import { PipelineService } from "../services/pipelineService";
import { PromotionService } from "../services/promotionService";
import { RetryPolicy } from "../services/retryPolicy";
import { StageClassifierService } from "../services/stageClassifierService";
import { ValidationGateService } from "../services/validationGateService";
import { env, type AppEnv } from "../../shared/config/env";
import {
  loadPipelineConfig,
  loadSourceDefinitions,
  loadStageRuleTable,
  type PipelineConfig,
} from "../../shared/config/pipelineConfig";
import type {
  PlaceLookupPort,
  ReasoningPort,
} from "../../core/ports/inboundPorts";
import { OllamaReasoner } from "../../infra/llm/ollamaReasoner";
import {
  MockPlaceLookup,
  loadMockPlaces,
} from "../../infra/mocks/mockPlaceLookup";
import { MockReasoner } from "../../infra/mocks/mockReasoner";
import { CachedPlaceLookup } from "../../infra/places/cachedPlaceLookup";
import { GooglePlacesLookup } from "../../infra/places/googlePlacesLookup";
import { CsvTabularStore } from "../../infra/storage/csvTabularStore";
import { JsonCheckpointStore } from "../../infra/storage/jsonCheckpointStore";
import { JsonLookupCache } from "../../infra/storage/jsonLookupCache";
import { SystemClock, TimerSleeper } from "../../infra/system/systemPorts";

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Resolves the configured lookup adapter; the mock serves the fixture catalogue.
 */
const createPlaceLookup = (appEnv: AppEnv): PlaceLookupPort => {
  if (appEnv.PLACES_PROVIDER === "google") {
    return new GooglePlacesLookup(
      appEnv.GOOGLE_MAPS_BASE_URL,
      appEnv.GOOGLE_MAPS_API_KEY,
      appEnv.GOOGLE_MAPS_TIMEOUT_MS,
    );
  }

  return new MockPlaceLookup(loadMockPlaces(appEnv.MOCK_PLACES_PATH));
};

const createReasoner = (appEnv: AppEnv, config: PipelineConfig): ReasoningPort => {
  if (appEnv.REASONER_PROVIDER === "ollama") {
    return new OllamaReasoner(appEnv.OLLAMA_BASE_URL, appEnv.OLLAMA_CHAT_MODEL, {
      regionName: config.region.name,
      regionCenter: config.region.center,
      maxRounds: appEnv.REASONER_MAX_ROUNDS,
      timeoutMs: appEnv.OLLAMA_CHAT_TIMEOUT_MS,
    });
  }

  return new MockReasoner();
};

/**
 * Centralizes runtime wiring so every CLI command shares one composition root.
 * Configuration files are read here, so a bad file fails before any record is touched.
 */
export const createRuntime = (appEnv: AppEnv = env) => {
  const config = loadPipelineConfig(appEnv.PIPELINE_CONFIG_PATH);
  const sources = loadSourceDefinitions(appEnv.SOURCES_CONFIG_PATH);
  const stageRules = loadStageRuleTable(appEnv.STAGE_RULES_PATH);

  const clock = new SystemClock();
  const store = new CsvTabularStore();
  const checkpoint = new JsonCheckpointStore(appEnv.CHECKPOINT_PATH);

  const normalizer = new NormalizationService({
    legalSuffixes: config.names.legalSuffixes,
    aggregators: config.domains.aggregators,
  });
  const geofence = new GeofenceService(config.region);
  const classifier = new StageClassifierService(stageRules);
  const gate = new ValidationGateService(
    normalizer,
    geofence,
    config.domains.allowList,
  );
  const codec = new ArtifactCodec(normalizer, geofence);

  const lookup = new CachedPlaceLookup(
    createPlaceLookup(appEnv),
    new JsonLookupCache(
      appEnv.LOOKUP_CACHE_PATH,
      appEnv.LOOKUP_CACHE_TTL_DAYS * DAY_MS,
      clock,
    ),
    appEnv.LOOKUP_CONCURRENCY,
    {
      searchUsd: appEnv.PLACES_SEARCH_COST_USD,
      detailsUsd: appEnv.PLACES_DETAILS_COST_USD,
    },
  );
  const router = new EnrichmentRouterService(
    lookup,
    createReasoner(appEnv, config),
    new CandidateScoringService(normalizer, geofence, config.enrichment),
    geofence,
    normalizer,
    new RetryPolicy(
      {
        attempts: appEnv.LOOKUP_RETRY_ATTEMPTS,
        baseDelayMs: appEnv.LOOKUP_RETRY_BASE_DELAY_MS,
      },
      new TimerSleeper(),
    ),
    checkpoint,
    clock,
    {
      concurrency: appEnv.ENRICH_CONCURRENCY,
      queryHint: config.region.queryHint,
      queryQualifier: config.enrichment.queryQualifier,
      maxCandidates: config.enrichment.maxCandidates,
      reasoningAcceptanceThreshold: config.enrichment.reasoningAcceptanceThreshold,
      reasoningMultiTenantConfidence:
        config.enrichment.reasoningMultiTenantConfidence,
    },
  );

  const pipelineService = new PipelineService(
    store,
    new IngestionService(store, normalizer, geofence, classifier),
    new DeduplicationService(normalizer, geofence, {
      sourcePriority: config.dedupe.sourcePriority,
      variantNameThreshold: config.dedupe.variantNameThreshold,
      allowListedDomains: config.domains.allowList,
    }),
    classifier,
    geofence,
    router,
    gate,
    checkpoint,
    lookup,
    codec,
    clock,
    appEnv.STAGING_DIR,
  );
  const promotionService = new PromotionService(
    store,
    gate,
    codec,
    clock,
    appEnv.STAGING_DIR,
    appEnv.PRODUCTION_PATH,
  );

  return {
    config,
    sources,
    stageRuleVersion: classifier.version,
    pipelineService,
    promotionService,
  };
};

export type Runtime = ReturnType<typeof createRuntime>;
