/**
 * Local filename builders for page images and the run log
 */

import type { NamingSpec } from "../types";
import { padNumeral } from "./resolve-locator";

const INDEX_MIN_WIDTH = 4;

/**
 * Base segments shared by image and log filenames:
 * name segments, then year, then `vol_<volume>`
 */
export function nameSegments(spec: NamingSpec): string[] {
  const segments = [...spec.baseNameSegments];

  if (spec.year !== undefined) {
    segments.push(String(spec.year));
  }
  if (spec.volume) {
    segments.push(`vol_${spec.volume}`);
  }

  return segments;
}

export function joinSegments(segments: string[], extension: string): string {
  return `${segments.join("-")}.${extension.replace(/^\./, "")}`;
}

/**
 * Filename for one page image
 *
 * @example
 * buildImageFilename({ baseNameSegments: ["Sanborn-LOC", "Springfield", "IL"], year: 1925, extension: "jpg" }, 7)
 * // => "Sanborn-LOC-Springfield-IL-1925-0007.jpg"
 */
export function buildImageFilename(
  spec: NamingSpec,
  index: number,
  part?: string,
  extension: string = spec.extension,
): string {
  const segments = nameSegments(spec);
  if (part) {
    segments.push(part);
  }
  segments.push(padNumeral(index, INDEX_MIN_WIDTH));
  return joinSegments(segments, extension);
}

export function buildLogFilename(spec: NamingSpec): string {
  return joinSegments(nameSegments(spec), "log");
}
