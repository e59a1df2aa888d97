import { promises as fs } from "fs";
import * as path from "path";
import { z } from "zod";
import type { SampleDeal } from "../core/dto";
import type { SampleSourcePort } from "../core/ports";
import { sampleDealSchema } from "../core/schemas";

export const DEFAULT_SAMPLES_PATH = path.join(
  __dirname,
  "..",
  "..",
  "data",
  "samples.json"
);

const sampleFileSchema = z.object({
  samples: z.array(sampleDealSchema),
});

/**
 * Sample deals read from a JSON file. The file is read once and cached.
 */
export class FileSampleSource implements SampleSourcePort {
  private cache: Promise<SampleDeal[]> | null = null;

  constructor(private filePath: string = DEFAULT_SAMPLES_PATH) {}

  async list(): Promise<SampleDeal[]> {
    if (!this.cache) {
      this.cache = this.load();
    }
    try {
      return await this.cache;
    } catch (error) {
      this.cache = null; // retry on next call
      throw error;
    }
  }

  async get(id: string): Promise<SampleDeal | null> {
    const samples = await this.list();
    return samples.find((sample) => sample.id === id) ?? null;
  }

  private async load(): Promise<SampleDeal[]> {
    const raw = await fs.readFile(this.filePath, "utf8");

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new Error(
        `Sample file ${this.filePath} is not valid JSON: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }

    const result = sampleFileSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.errors[0];
      throw new Error(
        `Sample file ${this.filePath} is invalid at ${issue.path.join(".")}: ${issue.message}`
      );
    }

    const ids = new Set<string>();
    for (const sample of result.data.samples) {
      if (ids.has(sample.id)) {
        throw new Error(`Sample file ${this.filePath} repeats id ${sample.id}`);
      }
      ids.add(sample.id);
    }

    return result.data.samples;
  }
}
