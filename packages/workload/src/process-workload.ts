import { loadEnv, logger } from "@pagesim/core";
import type { PageId } from "@pagesim/core";
import { z } from "zod";
import { createRandom, randomSeed } from "./random.js";
import type {
  ProcessProfile,
  ReferenceSource,
  WorkloadOptions,
} from "./workload-types.js";

const processProfileSchema = z.object({
  pid: z.number().int().nonnegative(),
  name: z.string(),
  memoryMb: z.number().finite().nonnegative(),
});

const lengthSchema = z.number().int().positive();

/** References before this index never introduce a brand-new page. */
const NEW_PAGE_AFTER = 20;
const NEW_PAGE_CHANCE = 0.3;

/**
 * Synthesizes a reference sequence with locality of reference from a
 * process's memory size. A few "hot" pages take most references; larger
 * processes get more pages and stronger locality.
 */
export class ProcessWorkload implements ReferenceSource {
  readonly profile: ProcessProfile;
  readonly length: number;
  readonly seed: number;
  readonly pageCount: number;
  readonly hotPages: PageId[];
  readonly coldPages: PageId[];
  /** Probability that a reference goes to a hot page. */
  readonly locality: number;

  constructor(profile: ProcessProfile, options: WorkloadOptions = {}) {
    this.profile = processProfileSchema.parse(profile);
    this.length = lengthSchema.parse(options.length ?? 30);
    this.seed = options.seed ?? loadEnv().PAGESIM_SEED ?? randomSeed();

    const { memoryMb } = this.profile;
    this.pageCount = Math.min(10, Math.max(4, Math.floor(memoryMb / 50)));
    const hotCount = Math.min(5, this.pageCount);
    this.hotPages = range(1, hotCount);
    this.coldPages = range(hotCount + 1, this.pageCount);
    this.locality = Math.min(0.8, Math.max(0.2, 0.4 + memoryMb / 1000));
  }

  get label(): string {
    return `${this.profile.name} (pid ${this.profile.pid})`;
  }

  generate(): PageId[] {
    const random = createRandom(this.seed);
    const sequence: PageId[] = [];
    const distinct = new Set<PageId>();

    for (let i = 0; i < this.length; i++) {
      let page: PageId;
      if (random.next() < this.locality) {
        page = random.pick(this.hotPages);
      } else if (i > NEW_PAGE_AFTER && random.next() < NEW_PAGE_CHANCE) {
        page = this.pageCount + 1 + distinct.size;
      } else if (this.coldPages.length > 0) {
        page = random.pick(this.coldPages);
      } else {
        page = random.int(1, this.pageCount);
      }
      sequence.push(page);
      distinct.add(page);
    }

    logger.debug(
      {
        pid: this.profile.pid,
        memoryMb: this.profile.memoryMb,
        seed: this.seed,
        length: this.length,
      },
      "generated process workload"
    );
    return sequence;
  }
}

function range(from: number, to: number): number[] {
  const result: number[] = [];
  for (let n = from; n <= to; n++) result.push(n);
  return result;
}
