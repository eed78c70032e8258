import { readFileSync } from "node:fs";
import type { PageId } from "@pagesim/core";
import { z } from "zod";

const examplesSchema = z.record(
  z.string(),
  z.array(z.number().int().nonnegative().safe())
);

function loadExamples(): Record<string, PageId[]> {
  const url = new URL("../data/examples.json", import.meta.url);
  return examplesSchema.parse(JSON.parse(readFileSync(url, "utf8")));
}

/** Built-in reference strings, keyed by name. */
export const EXAMPLE_SEQUENCES: Readonly<Record<string, readonly PageId[]>> =
  loadExamples();

export function getExampleSequence(name: string): PageId[] {
  const sequence = EXAMPLE_SEQUENCES[name];
  if (!sequence) {
    throw new Error(`Unknown example sequence "${name}"`);
  }
  return [...sequence];
}
