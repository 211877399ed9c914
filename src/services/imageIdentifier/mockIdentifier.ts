import { z } from "zod";
import type { IdentificationResult, PlantSuggestion } from "../../types";
import type { UploadSet } from "../../utils/fileValidation";
import type { ImageIdentifier } from "./interface";
import mockSpeciesData from "./mockSpecies.json";

const MockSpeciesSchema = z.array(
  z.object({
    id: z.number(),
    name: z.string(),
    authorship: z.string(),
    common_names: z.array(z.string()),
    family: z.string(),
    genus: z.string(),
  }),
).min(2);

export const MOCK_PLANT_SPECIES = MockSpeciesSchema.parse(mockSpeciesData);

type MockSpecies = (typeof MOCK_PLANT_SPECIES)[number];

/**
 * Offline stand-in for PlantNet. The same images always produce the same answer, picked from
 * a small fixed species list by summing the payload bytes.
 */
export class MockIdentifier implements ImageIdentifier {
  getName(): string {
    return "Mock Identifier";
  }

  async identify(uploadSet: UploadSet): Promise<IdentificationResult> {
    const startTime = Date.now();

    const seed = uploadSet.reduce(
      (sum, entry) => entry.data.reduce((acc, byte) => (acc + byte) % 1_000_003, sum),
      0,
    );
    const first = MOCK_PLANT_SPECIES[seed % MOCK_PLANT_SPECIES.length];
    const second = MOCK_PLANT_SPECIES[(seed + 1) % MOCK_PLANT_SPECIES.length];

    const suggestions = [
      this.buildSuggestion(first, 0.85 + (seed % 10) / 100),
      this.buildSuggestion(second, 0.05 + (seed % 5) / 100),
    ];

    return {
      best_match: `${first.name} ${first.authorship}`,
      is_plant: {
        probability: 0.97,
        threshold: 0.1,
        binary: true,
      },
      classification: { suggestions },
      organs: uploadSet.map(entry => entry.organ),
      predicted_organs: uploadSet.map(entry => ({
        filename: entry.filename,
        organ: entry.organ === "auto" ? "leaf" : entry.organ,
        score: 0.9,
      })),
      provider: this.getName(),
      language: "en",
      processing_time_ms: Date.now() - startTime,
    };
  }

  private buildSuggestion(species: MockSpecies, probability: number): PlantSuggestion {
    return {
      id: species.id,
      name: species.name,
      scientific_name: `${species.name} ${species.authorship}`,
      authorship: species.authorship,
      probability,
      common_names: species.common_names,
      details: {
        taxonomy: {
          family: species.family,
          genus: species.genus,
        },
        gbif_id: species.id,
      },
    };
  }
}
