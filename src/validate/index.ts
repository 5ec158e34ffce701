export { validate, collectViolations, ValidationFailedError } from "./runner.js";
export type { ValidateOptions } from "./runner.js";
export { CHECK_TIERS, LOCAL_CHECKS, GITHUB_CHECKS, ZULIP_CHECKS, checkNames } from "./registry.js";
export { ErrorLog, errorMessage } from "./error-log.js";
export { teamAncestry, HierarchyCycleError } from "./hierarchy.js";
export type { Check, CheckTiers, LocalCheckFn, GitHubCheckFn, ZulipCheckFn } from "./types.js";
