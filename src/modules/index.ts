/**
 * Pipeline modules export
 */

export { planBatch } from "./planner";
export { run } from "./runner";
export { stats } from "./stats";
