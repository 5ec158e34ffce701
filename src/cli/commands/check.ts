/**
 * check / list-checks commands.
 */

import type { Command } from "commander";
import type { Logger } from "../../adapters/console-logger.js";
import type { Data } from "../../data/data.js";
import { GitHubApi } from "../../directory/github.js";
import type { GitHubDirectory, ZulipDirectory } from "../../directory/types.js";
import { ZulipApi } from "../../directory/zulip.js";
import { errorMessage } from "../../validate/error-log.js";
import { CHECK_TIERS } from "../../validate/registry.js";
import { collectViolations, validate, ValidationFailedError } from "../../validate/runner.js";
import type { CheckTiers } from "../../validate/types.js";
import { loadOrReport } from "../load.js";

export interface CheckOptions {
  strict?: boolean;
  skip?: string[];
  json?: boolean;
}

/** Overrides for the live directories and log sink. */
export interface CheckDeps {
  github?: GitHubDirectory;
  zulip?: ZulipDirectory;
  logger?: Logger;
}

/**
 * Validate `data` and report the outcome on stdout. Sets a non-zero exit
 * code on violations or a fatal directory failure.
 */
export async function checkData(data: Data, opts: CheckOptions = {}, deps: CheckDeps = {}): Promise<void> {
  const options = {
    strict: opts.strict,
    skip: opts.skip,
    github: deps.github ?? new GitHubApi(),
    zulip: deps.zulip ?? new ZulipApi(),
    logger: deps.logger,
  };

  if (opts.json) {
    try {
      const errors = await collectViolations(data, options);
      console.log(JSON.stringify({ valid: errors.length === 0, errors }, null, 2));
      if (errors.length > 0) process.exitCode = 1;
    } catch (err) {
      console.error(`❌ ${errorMessage(err)}`);
      process.exitCode = 1;
    }
    return;
  }

  try {
    await validate(data, options);
    console.log("✅ Data valid");
  } catch (err) {
    if (err instanceof ValidationFailedError) {
      console.log(`\n❌ ${err.message}`);
    } else {
      console.error(`❌ ${errorMessage(err)}`);
    }
    process.exitCode = 1;
  }
}

/** Print every registered check name, grouped by tier. */
export function listChecks(tiers: CheckTiers = CHECK_TIERS): void {
  const groups: Array<[string, readonly { name: string }[]]> = [
    ["local", tiers.local],
    ["github", tiers.github],
    ["zulip", tiers.zulip],
  ];
  for (const [tier, checks] of groups) {
    console.log(`${tier} (${checks.length}):`);
    for (const check of checks) {
      console.log(`  ${check.name}`);
    }
  }
}

export function registerCheckCommands(program: Command): void {
  program
    .command("check")
    .description("Validate the data directory")
    .option("--strict", "Fail when the GitHub API can't be used", false)
    .option("--skip <names...>", "Check names to skip", [])
    .option("--json", "Print { valid, errors } as JSON", false)
    .action(async (opts: { strict: boolean; skip: string[]; json: boolean }) => {
      const data = await loadOrReport(program.opts<{ data: string }>().data);
      if (!data) return;
      await checkData(data, opts);
    });

  program
    .command("list-checks")
    .description("List every check by tier")
    .action(() => {
      listChecks();
    });
}
