/**
 * Data directory configuration (`config.yaml`).
 *
 * Holds the allow-lists the checks compare against and the set of
 * permission names teams and people may be granted.
 */

import { z } from "zod";

export const RosterConfig = z.object({
  /** Domains mailing list addresses may live on. */
  allowedMailingListsDomains: z.array(z.string().min(1)).default([]),
  /** GitHub organizations teams and repos may belong to. */
  allowedGithubOrgs: z.array(z.string().min(1)).default([]),
  /** Plain named permissions (e.g. "perf", "crater"). */
  permissionsBools: z.array(z.string().min(1)).default([]),
  /** Repos that grant `bors.<repo>.review` and `bors.<repo>.try`. */
  permissionsBorsRepos: z.array(z.string().min(1)).default([]),
});
export type RosterConfig = z.infer<typeof RosterConfig>;

/**
 * Every permission name the configuration makes available, in
 * declaration order.
 */
export function availablePermissions(config: RosterConfig): string[] {
  const names = [...config.permissionsBools];
  for (const repo of config.permissionsBorsRepos) {
    names.push(`bors.${repo}.review`, `bors.${repo}.try`);
  }
  return names;
}
