/**
 * Resource locator generation
 * Turns one index of a path group into the absolute URL of that item
 */

import type { PathGroup } from "../types";
import { ConfigurationError } from "./errors";

// Compiled on first use per group
const compiled = new WeakMap<PathGroup, RegExp>();

/**
 * Compile a configured pattern, surfacing bad regexes as ConfigurationError
 */
export function compilePattern(source: string): RegExp {
  try {
    return new RegExp(source, "g");
  } catch (error) {
    throw new ConfigurationError(
      `Invalid regex "${source}": ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      { cause: error },
    );
  }
}

function patternFor(group: PathGroup): RegExp {
  let regex = compiled.get(group);
  if (!regex) {
    regex = compilePattern(group.pattern);
    compiled.set(group, regex);
  }
  return regex;
}

/**
 * Decimal numeral left-padded with zeros to at least `width` characters
 * (never truncated). A minus sign stays in front and counts toward the width.
 */
export function padNumeral(index: number, width: number): string {
  const sign = index < 0 ? "-" : "";
  const digits = String(Math.abs(index));
  return width > 0 ? `${sign}${digits.padStart(width - sign.length, "0")}` : `${sign}${digits}`;
}

/**
 * Replacement token for one index, e.g. prefix "p" + "0001"
 */
export function replacementToken(group: PathGroup, index: number): string {
  return `${group.prefix}${padNumeral(index, group.zeroFillWidth)}`;
}

/**
 * Whether the group's pattern locates anything in its template.
 * When it does not, every index resolves to the same unchanged path.
 */
export function matchesTemplate(group: PathGroup): boolean {
  const regex = patternFor(group);
  regex.lastIndex = 0;
  return regex.test(group.defaultPath);
}

/**
 * Build `host + defaultPath` with every pattern match replaced by the token
 *
 * @example
 * resolveLocator("https://example.org", { defaultPath: "/img/_P.jpg", pattern: "_P", prefix: "p", zeroFillWidth: 4, ... }, 1)
 * // => "https://example.org/img/p0001.jpg"
 */
export function resolveLocator(
  host: string,
  group: PathGroup,
  index: number,
): string {
  const token = replacementToken(group, index);
  // Function replacer inserts the token literally ("$1" stays "$1")
  const path = group.defaultPath.replace(patternFor(group), () => token);
  return `${host}${path}`;
}
