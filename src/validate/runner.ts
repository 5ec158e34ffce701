/**
 * Validation runner.
 *
 * Runs the local checks, then the GitHub checks and the Zulip checks when
 * their directory is usable, all in registry order and one at a time.
 * Every violation from every check is kept; the final list is
 * deduplicated and sorted so output doesn't depend on check order.
 */

import type { Logger } from "../adapters/console-logger.js";
import { ConsoleLogger } from "../adapters/console-logger.js";
import type { Data } from "../data/data.js";
import type { GitHubDirectory, ZulipDirectory } from "../directory/types.js";
import { ErrorLog, errorMessage } from "./error-log.js";
import { CHECK_TIERS, checkNames } from "./registry.js";
import type { Check, CheckTiers } from "./types.js";

/** The aggregate failure of a run; the messages themselves go to the logger. */
export class ValidationFailedError extends Error {
  readonly count: number;

  constructor(count: number) {
    super(`${count} validation errors found`);
    this.name = "ValidationFailedError";
    this.count = count;
  }
}

export interface ValidateOptions {
  /** Treat an unusable GitHub directory as fatal. */
  strict?: boolean;
  /** Check names to skip. */
  skip?: Iterable<string>;
  github: GitHubDirectory;
  zulip: ZulipDirectory;
  logger?: Logger;
  /** Defaults to the registry. */
  tiers?: CheckTiers;
}

interface Probe {
  requireAuth(): Promise<void>;
}

/** Whether a directory is usable. Rethrows the probe failure when `fatal`. */
async function probe(directory: Probe, service: string, logger: Logger, fatal: boolean): Promise<boolean> {
  try {
    await directory.requireAuth();
    return true;
  } catch (err) {
    if (fatal) throw err;
    logger.warn(`couldn't perform checks relying on the ${service} API, some errors will not be detected`);
    logger.warn(`cause: ${errorMessage(err)}`);
    return false;
  }
}

function enabled<F>(checks: readonly Check<F>[], skip: ReadonlySet<string>, logger: Logger): Check<F>[] {
  return checks.filter(check => {
    if (!skip.has(check.name)) return true;
    logger.warn(`skipped check: ${check.name}`);
    return false;
  });
}

/**
 * Run every enabled check and return the final violation list (sorted,
 * deduplicated). Rejects only when `strict` is set and GitHub is unusable.
 */
export async function collectViolations(data: Data, options: ValidateOptions): Promise<string[]> {
  const logger = options.logger ?? new ConsoleLogger();
  const tiers = options.tiers ?? CHECK_TIERS;
  const skip = new Set(options.skip ?? []);

  const known = new Set(checkNames(tiers));
  for (const name of [...skip].sort()) {
    if (!known.has(name)) logger.warn(`unknown check in skip list: ${name}`);
  }

  const log = new ErrorLog();
  // A check that throws outside `collect` loses only its own remaining work.
  const guard = async (name: string, run: () => void | Promise<void>) => {
    try {
      await run();
    } catch (err) {
      log.push(`check \`${name}\` failed: ${errorMessage(err)}`);
    }
  };

  for (const check of enabled(tiers.local, skip, logger)) {
    await guard(check.name, () => check.run(data, log));
  }

  if (await probe(options.github, "GitHub", logger, options.strict ?? false)) {
    for (const check of enabled(tiers.github, skip, logger)) {
      await guard(check.name, () => check.run(data, options.github, log));
    }
  }

  if (await probe(options.zulip, "Zulip", logger, false)) {
    for (const check of enabled(tiers.zulip, skip, logger)) {
      await guard(check.name, () => check.run(data, options.zulip, log));
    }
  }

  return log.finalize();
}

/**
 * Validate `data`. Resolves when there are no violations; otherwise logs
 * each one and rejects with `ValidationFailedError`.
 */
export async function validate(data: Data, options: ValidateOptions): Promise<void> {
  const logger = options.logger ?? new ConsoleLogger();
  const errors = await collectViolations(data, { ...options, logger });
  if (errors.length === 0) return;

  for (const error of errors) {
    logger.error(`validation error: ${error}`);
  }
  throw new ValidationFailedError(errors.length);
}
