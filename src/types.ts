import type { Context } from "hono";
import type { HttpBindings } from "@hono/node-server";
import { extendZodWithOpenApi } from "@asteasolutions/zod-to-openapi";
import { z } from "zod";
import type { Services } from "./services";

// chanfana patches the zod copy it loads; route schemas come from this one and need .openapi() too
extendZodWithOpenApi(z);

export type AppEnv = {
  Bindings: Partial<HttpBindings>;
  Variables: {
    requestId: string;
    services: Services;
  };
};

export type AppContext = Context<AppEnv>;

// Plant identification API schema definitions

export const PlantTaxonomySchema = z.object({
  family: z.string(),
  genus: z.string(),
});

export const PlantSuggestionSchema = z.object({
  id: z.number(),
  name: z.string(),
  scientific_name: z.string(),
  authorship: z.string().optional(),
  probability: z.number().min(0).max(1),
  common_names: z.array(z.string()),
  details: z.object({
    taxonomy: PlantTaxonomySchema,
    gbif_id: z.number().optional(),
    powo_id: z.string().optional(),
  }),
});

export const PredictedOrganSchema = z.object({
  image: z.string().optional(),
  filename: z.string().optional(),
  organ: z.string(),
  score: z.number(),
});

export const IdentificationResultSchema = z.object({
  best_match: z.string().nullable(),
  is_plant: z.object({
    probability: z.number().min(0).max(1),
    threshold: z.number().min(0).max(1),
    binary: z.boolean(),
  }),
  classification: z.object({
    suggestions: z.array(PlantSuggestionSchema),
  }),
  organs: z.array(z.string()),
  predicted_organs: z.array(PredictedOrganSchema),
  provider: z.string(),
  language: z.string(),
  version: z.string().optional(),
  remaining_requests: z.number().optional(),
  processing_time_ms: z.number(),
});

export const IdentificationResponseSchema = z.object({
  request_id: z.string(),
  status: z.literal("COMPLETED"),
  cached: z.boolean(),
  result: IdentificationResultSchema,
});

export const ErrorResponseSchema = z.object({
  error_kind: z.string(),
  message: z.string(),
});

// Image parts and organ tags as documented in the OpenAPI registry
export const IdentificationFormDataSchema = z.object({
  images: z
    .array(z.string().describe("Binary image file (jpg, jpeg, png or gif)"))
    .min(1, "At least one image is required")
    .max(5, "Maximum 5 images allowed"),
  organ_1: z.string().optional().describe("Organ shown in the first image, defaults to auto"),
  organ_2: z.string().optional().describe("Organ shown in the second image"),
  organ_3: z.string().optional().describe("Organ shown in the third image"),
  organ_4: z.string().optional().describe("Organ shown in the fourth image"),
  organ_5: z.string().optional().describe("Organ shown in the fifth image"),
});

// PlantNet v2 identify response (only the fields we read)
const PlantNetNameSchema = z.object({
  scientificNameWithoutAuthor: z.string(),
  scientificNameAuthorship: z.string().optional(),
  scientificName: z.string().optional(),
});

export const PlantNetResponseSchema = z.object({
  query: z
    .object({
      organs: z.array(z.string()).optional(),
    })
    .passthrough()
    .optional(),
  language: z.string().optional(),
  preferedReferential: z.string().optional(),
  bestMatch: z.string().optional(),
  results: z.array(
    z.object({
      score: z.number(),
      species: PlantNetNameSchema.extend({
        genus: PlantNetNameSchema.optional(),
        family: PlantNetNameSchema.optional(),
        commonNames: z.array(z.string()).default([]),
      }),
      gbif: z.object({ id: z.union([z.string(), z.number()]) }).nullish(),
      powo: z.object({ id: z.string() }).nullish(),
    }),
  ),
  predictedOrgans: z
    .array(
      z.object({
        image: z.string().optional(),
        filename: z.string().optional(),
        organ: z.string(),
        score: z.number(),
      }),
    )
    .default([]),
  version: z.string().optional(),
  remainingIdentificationRequests: z.number().optional(),
});

// Type exports
export type PlantSuggestion = z.infer<typeof PlantSuggestionSchema>;
export type IdentificationResult = z.infer<typeof IdentificationResultSchema>;
export type IdentificationResponse = z.infer<typeof IdentificationResponseSchema>;
export type PlantNetResponse = z.infer<typeof PlantNetResponseSchema>;
