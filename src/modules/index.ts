/**
 * Pipeline modules export
 */

export { loadPairs } from "./loader";
export { applyPair } from "./rewriter";
export { run, findTargetFiles } from "./traversal";
export { stats } from "./stats";
