import { InvalidReferenceError } from "@pagesim/core";
import type { PageId } from "@pagesim/core";

/**
 * Blank out // line comments and /* * / block comments. Newlines survive and
 * every other character becomes a space, so line and column numbers of the
 * remaining tokens are unchanged.
 */
function stripComments(source: string): string {
  let result = "";
  let i = 0;
  while (i < source.length) {
    if (source[i] === "/" && source[i + 1] === "/") {
      while (i < source.length && source[i] !== "\n") {
        result += " ";
        i++;
      }
    } else if (source[i] === "/" && source[i + 1] === "*") {
      const end = source.indexOf("*/", i + 2);
      const stop = end === -1 ? source.length : end + 2;
      for (; i < stop; i++) {
        result += source[i] === "\n" ? "\n" : " ";
      }
    } else {
      result += source[i];
      i++;
    }
  }
  return result;
}

/**
 * Parse a reference string into page ids.
 *
 * Tokens are separated by commas and/or whitespace:
 *   1, 2, 3, 4
 *   1 2 5 // hot loop
 *
 * Each token must be a non-negative decimal integer no larger than
 * `Number.MAX_SAFE_INTEGER`. Empty input yields an empty sequence.
 */
export function parseReferenceString(source: string): PageId[] {
  const lines = stripComments(source).split("\n");
  const pages: PageId[] = [];

  for (let lineNum = 0; lineNum < lines.length; lineNum++) {
    for (const match of lines[lineNum].matchAll(/[^\s,]+/g)) {
      const token = match[0];
      const page = /^\d+$/.test(token) ? Number.parseInt(token, 10) : NaN;
      if (!Number.isSafeInteger(page)) {
        const column = (match.index ?? 0) + 1;
        throw new InvalidReferenceError(token, lineNum + 1, column);
      }
      pages.push(page);
    }
  }

  return pages;
}

export function formatReferenceString(
  sequence: readonly PageId[],
  separator = ", "
): string {
  return sequence.join(separator);
}
