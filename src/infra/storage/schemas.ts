import { z } from "zod";
import { COMPANY_STAGES } from "../../core/entities/company";

const latLngSchema = z.object({ lat: z.number(), lng: z.number() });

export const placeCandidateSchema = z.object({
  id: z.string(),
  name: z.string(),
  formattedAddress: z.string().optional(),
  types: z.array(z.string()),
});

export const placeDetailsSchema = placeCandidateSchema.extend({
  website: z.string().optional(),
  operationalStatus: z.enum([
    "operational",
    "closed_temporarily",
    "closed_permanently",
    "unknown",
  ]),
  location: latLngSchema.optional(),
});

export const lookupCacheEntrySchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("search"), value: z.array(placeCandidateSchema) }),
  z.object({ kind: z.literal("details"), value: placeDetailsSchema }),
]);

export const lookupCacheFileSchema = z.record(
  z.object({ storedAt: z.string(), entry: lookupCacheEntrySchema }),
);

export const companyRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  normalizedName: z.string(),
  website: z.string().optional(),
  domainKey: z.string().optional(),
  address: z.string().optional(),
  city: z.string().optional(),
  state: z.string().optional(),
  cityCandidates: z.array(z.string()),
  stage: z.enum(COMPANY_STAGES),
  focusAreas: z.string().optional(),
  description: z.string().optional(),
  sources: z.array(z.string()),
  confidence: z.number().optional(),
  validationReason: z.string().optional(),
  validationSource: z.enum(["path_a", "path_b"]).optional(),
  placeId: z.string().optional(),
  addressOrigin: z.enum(["source", "lookup"]).optional(),
  location: latLngSchema.optional(),
  geofenceOverride: z.boolean(),
  lastVerified: z.string().optional(),
  flags: z.array(z.enum(["city_address_mismatch", "city_conflict"])),
});

export const checkpointFileSchema = z.object({
  version: z.literal(1),
  entries: z.record(
    z.object({
      fingerprint: z.string(),
      completedAt: z.string(),
      outcome: z.object({
        recordId: z.string(),
        path: z.enum(["A", "B"]),
        status: z.enum(["accepted", "review"]),
        record: companyRecordSchema,
        reason: z.string(),
      }),
    }),
  ),
});
