/**
 * Repository schema: one file per repo under `repos/<org>/<name>.yaml`.
 */

import { z } from "zod";

export const RepoPermission = z.enum(["write", "admin", "maintain", "triage"]);
export type RepoPermission = z.infer<typeof RepoPermission>;

export const BranchProtection = z.object({
  pattern: z.string().min(1),
  ciChecks: z.array(z.string()).default([]),
  dismissStaleReview: z.boolean().default(false),
  requiredApprovals: z.number().int().nonnegative().optional(),
});
export type BranchProtection = z.infer<typeof BranchProtection>;

export const RepoAccess = z.object({
  /** GitHub team name → permission level. */
  teams: z.record(z.string(), RepoPermission).default({}),
  /** Person handle → permission level. */
  individuals: z.record(z.string(), RepoPermission).default({}),
});
export type RepoAccess = z.infer<typeof RepoAccess>;

export const Repo = z.object({
  org: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(""),
  /** Bot integrations enabled on the repo. */
  bots: z.array(z.string().min(1)).default([]),
  access: RepoAccess.default({}),
  branchProtections: z.array(BranchProtection).default([]),
});
export type Repo = z.infer<typeof Repo>;
