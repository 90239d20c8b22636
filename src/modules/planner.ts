/**
 * Planner Module
 * Expands a job into its (group, index) items in fetch order
 */

import type { Job, NamingSpec, PlannedItem } from "../types";
import { buildImageFilename, resolveLocator } from "../utils";

/**
 * Yields items group by group, ascending index within each group.
 * Items are built lazily, one per step of the run.
 */
export function* planBatch(
  job: Job,
  naming: NamingSpec,
): Generator<PlannedItem> {
  for (const [groupIndex, group] of job.groups.entries()) {
    for (let index = group.indexStart; index < group.indexStop; index++) {
      yield {
        groupIndex,
        index,
        locator: resolveLocator(job.host, group, index),
        filename: buildImageFilename(naming, index, group.part),
      };
    }
  }
}
