import type { Data } from "../data/data.js";
import type { GitHubDirectory, ZulipDirectory } from "../directory/types.js";
import type { ErrorLog } from "./error-log.js";

export type LocalCheckFn = (data: Data, log: ErrorLog) => void;
export type GitHubCheckFn = (data: Data, github: GitHubDirectory, log: ErrorLog) => Promise<void>;
export type ZulipCheckFn = (data: Data, zulip: ZulipDirectory, log: ErrorLog) => Promise<void>;

/** A named check. Names are stable: they're what `--skip` matches. */
export interface Check<F> {
  readonly name: string;
  readonly run: F;
}

/** The three tiers, each run in order. */
export interface CheckTiers {
  local: readonly Check<LocalCheckFn>[];
  github: readonly Check<GitHubCheckFn>[];
  zulip: readonly Check<ZulipCheckFn>[];
}
