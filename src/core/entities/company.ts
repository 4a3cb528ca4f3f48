export const COMPANY_STAGES = [
  "Preclinical",
  "Phase I",
  "Phase II",
  "Phase III",
  "Commercial",
  "Platform",
  "Tools/Services",
  "Acquired",
  "Public",
  "Unknown",
] as const;

export type CompanyStage = (typeof COMPANY_STAGES)[number];

export const isCompanyStage = (value: string): value is CompanyStage =>
  COMPANY_STAGES.some((stage) => stage === value);

export type RecordFlag = "city_address_mismatch" | "city_conflict";

export type ValidationSource = "path_a" | "path_b";

export type AddressOrigin = "source" | "lookup";

export type LatLng = {
  lat: number;
  lng: number;
};

/**
 * Canonical company row that flows through every pipeline stage.
 */
export type CompanyRecord = {
  id: string;
  name: string;
  normalizedName: string;
  website?: string;
  domainKey?: string;
  address?: string;
  city?: string;
  state?: string;
  cityCandidates: string[];
  stage: CompanyStage;
  focusAreas?: string;
  description?: string;
  sources: string[];
  confidence?: number;
  validationReason?: string;
  validationSource?: ValidationSource;
  placeId?: string;
  addressOrigin?: AddressOrigin;
  location?: LatLng;
  geofenceOverride: boolean;
  lastVerified?: string;
  flags: RecordFlag[];
};

const hasText = (value: string | undefined): boolean =>
  value !== undefined && value.trim().length > 0;

/**
 * Counts populated descriptive fields; dedupe survivors are picked by this number.
 */
export const populatedFieldCount = (record: CompanyRecord): number =>
  [
    hasText(record.name),
    hasText(record.website),
    hasText(record.address),
    hasText(record.city) || record.cityCandidates.length > 0,
    hasText(record.state),
    hasText(record.focusAreas),
    hasText(record.description),
    record.stage !== "Unknown",
    hasText(record.placeId),
    record.location !== undefined,
  ].filter(Boolean).length;

/**
 * Maps confidence to the review tier shown in the working artifact.
 */
export const confidenceTier = (confidence: number | undefined): 1 | 2 | 3 | 4 => {
  if (confidence === undefined) {
    return 4;
  }
  if (confidence >= 0.95) {
    return 1;
  }
  if (confidence >= 0.9) {
    return 2;
  }
  if (confidence >= 0.75) {
    return 3;
  }
  return 4;
};
