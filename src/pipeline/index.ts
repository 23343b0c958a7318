export { runScout, buildOnDemandSearches, resolveTargets } from "./on-demand";
export { runSharedPool, buildPoolSearches, matchUser, STALE_AFTER_DAYS } from "./shared-pool";
export { generateRunId, NO_SOURCES_ERROR } from "./common";
export type { PipelineDeps } from "./common";
