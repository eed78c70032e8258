import { loadEnv } from "@pagesim/core";
import type { PageId } from "@pagesim/core";
import { z } from "zod";
import { createRandom, randomSeed } from "./random.js";
import type { RandomWorkloadOptions, ReferenceSource } from "./workload-types.js";

const optionsSchema = z.object({
  length: z.number().int().positive().default(20),
  maxPage: z.number().int().positive().default(9),
});

/** Uniformly random references with no locality. */
export class RandomWorkload implements ReferenceSource {
  readonly length: number;
  readonly maxPage: number;
  readonly seed: number;

  constructor(options: RandomWorkloadOptions = {}) {
    const { length, maxPage } = optionsSchema.parse({
      length: options.length,
      maxPage: options.maxPage,
    });
    this.length = length;
    this.maxPage = maxPage;
    this.seed = options.seed ?? loadEnv().PAGESIM_SEED ?? randomSeed();
  }

  get label(): string {
    return `random pages 1-${this.maxPage}`;
  }

  generate(): PageId[] {
    const random = createRandom(this.seed);
    return Array.from({ length: this.length }, () => random.int(1, this.maxPage));
  }
}
