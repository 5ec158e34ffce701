/**
 * Team schema: one file per team under `teams/<name>.yaml`
 * (archived teams under `teams/archive/`).
 *
 * A team carries its people, its parent link, and the bindings that
 * provision it elsewhere: GitHub teams, mailing lists, Zulip user groups,
 * Discord roles and the rfcbot integration.
 */

import { z } from "zod";

/** Team kinds. `unknown` is never written by hand but is accepted. */
export const TeamKind = z.enum([
  "team",
  "working-group",
  "project-group",
  "marker-team",
  "unknown",
]);
export type TeamKind = z.infer<typeof TeamKind>;

const KIND_LABELS: Record<TeamKind, string> = {
  "team": "team",
  "working-group": "working group",
  "project-group": "project group",
  "marker-team": "marker team",
  "unknown": "unknown team kind",
};

/** Human-readable kind, as used in messages ("working group"). */
export function describeKind(kind: TeamKind): string {
  return KIND_LABELS[kind];
}

/** People of a team, plus the rules that pull in members from elsewhere. */
export const TeamPeople = z.object({
  leads: z.array(z.string()).default([]),
  members: z.array(z.string()).default([]),
  alumni: z.array(z.string()).default([]),
  /** Include the leads of every active `team`. */
  includeTeamLeads: z.boolean().default(false),
  /** Include the leads of every active working group. */
  includeWgLeads: z.boolean().default(false),
  /** Include the leads of every active project group. */
  includeProjectGroupLeads: z.boolean().default(false),
  /** Include the members of every active, non-aggregate `team`. */
  includeAllTeamMembers: z.boolean().default(false),
  /** Include every alumnus, and the people of archived teams. */
  includeAllAlumni: z.boolean().default(false),
  /** Include the effective members of the named teams. */
  includeTeamMembers: z.array(z.string()).default([]),
});
export type TeamPeople = z.infer<typeof TeamPeople>;

/** GitHub team binding; one GitHub team per listed org. */
export const TeamGitHub = z.object({
  orgs: z.array(z.string().min(1)).min(1),
  /** GitHub team name, when it differs from the team name. */
  teamName: z.string().min(1).optional(),
});
export type TeamGitHub = z.infer<typeof TeamGitHub>;

/** Metadata shown on the published website. */
export const TeamWebsite = z.object({
  name: z.string().min(1),
  description: z.string(),
  page: z.string().optional(),
  email: z.string().optional(),
  repo: z.string().optional(),
  discordInvite: z.string().optional(),
  /** Zulip stream name (not a link). */
  zulipStream: z.string().optional(),
  weight: z.number().int().default(0),
});
export type TeamWebsite = z.infer<typeof TeamWebsite>;

/** rfcbot integration: FCP label and people excluded from polls. */
export const TeamRfcbot = z.object({
  label: z.string().min(1),
  name: z.string().min(1),
  ping: z.string().min(1),
  excludeMembers: z.array(z.string()).default([]),
});
export type TeamRfcbot = z.infer<typeof TeamRfcbot>;

export const DiscordRole = z.object({
  name: z.string().min(1),
  color: z.string().optional(),
});
export type DiscordRole = z.infer<typeof DiscordRole>;

/** Mailing list bound to a team. */
export const TeamList = z.object({
  address: z.string().min(1),
  extraPeople: z.array(z.string()).default([]),
  extraEmails: z.array(z.string()).default([]),
  extraTeams: z.array(z.string()).default([]),
  includeTeamMembers: z.boolean().default(true),
});
export type TeamList = z.infer<typeof TeamList>;

/** Zulip user group bound to a team. */
export const TeamZulipGroup = z.object({
  name: z.string().min(1),
  extraPeople: z.array(z.string()).default([]),
  extraZulipIds: z.array(z.number().int().nonnegative()).default([]),
  excludedPeople: z.array(z.string()).default([]),
  includeTeamMembers: z.boolean().default(true),
});
export type TeamZulipGroup = z.infer<typeof TeamZulipGroup>;

export const Team = z.object({
  name: z.string().min(1),
  kind: TeamKind.default("team"),
  /** Parent team name. */
  subteamOf: z.string().min(1).optional(),
  people: TeamPeople.default({}),
  /** Permissions granted to every effective member. */
  permissions: z.array(z.string().min(1)).default([]),
  /** Permissions granted to the leads only. */
  leadsPermissions: z.array(z.string().min(1)).default([]),
  github: TeamGitHub.optional(),
  website: TeamWebsite.optional(),
  rfcbot: TeamRfcbot.optional(),
  discordRoles: z.array(DiscordRole).optional(),
  lists: z.array(TeamList).default([]),
  zulipGroups: z.array(TeamZulipGroup).default([]),
});
export type Team = z.infer<typeof Team>;

/** Teams whose membership is an aggregate of other teams. */
export function isAggregateTeam(team: Team): boolean {
  return team.people.includeAllTeamMembers || team.people.includeAllAlumni;
}

/** Name of the GitHub team a team provisions (same in every org). */
export function githubTeamName(team: Team): string {
  return team.github?.teamName ?? team.name;
}
