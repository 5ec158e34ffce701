/**
 * Team structure checks: names, hierarchy, leads, members, GitHub teams.
 */

import type { Data } from "../../data/data.js";
import type { Team, TeamKind } from "../../schemas/team.js";
import { describeKind } from "../../schemas/team.js";
import type { ErrorLog } from "../error-log.js";
import { teamAncestry } from "../hierarchy.js";

interface PrefixRule {
  kind: TeamKind;
  prefix: string;
  /** Names exempt from this rule only. */
  exceptions: readonly string[];
}

const PREFIX_RULES: readonly PrefixRule[] = [
  { kind: "working-group", prefix: "wg-", exceptions: ["wg-leads"] },
  { kind: "project-group", prefix: "project-", exceptions: ["project-group-leads"] },
];

const TEAM_NAME = /^[\p{L}\p{N}-]+$/u;

function ensurePrefix(team: Team, rule: PrefixRule): void {
  if (rule.exceptions.includes(team.name)) return;
  const hasPrefix = team.name.startsWith(rule.prefix);
  if (team.kind === rule.kind && !hasPrefix) {
    throw new Error(
      `${describeKind(rule.kind)} \`${team.name}\`'s name doesn't start with \`${rule.prefix}\``,
    );
  }
  if (team.kind !== rule.kind && hasPrefix) {
    throw new Error(
      `${describeKind(team.kind)} \`${team.name}\` seems like a ${describeKind(rule.kind)} (since it has the \`${rule.prefix}\` prefix)`,
    );
  }
}

/** Working groups start with `wg-`, project groups with `project-`, and nothing else does. */
export function validateNamePrefixes(data: Data, log: ErrorLog): void {
  log.collect(data.teams(), team => {
    for (const rule of PREFIX_RULES) ensurePrefix(team, rule);
  });
}

/** `subteamOf` resolves, doesn't loop, and nests at most one level below a `team`. */
export function validateSubteamOf(data: Data, log: ErrorLog): void {
  log.collect(data.teams(), team => {
    teamAncestry(data, team);
  });
}

export function validateTeamLeads(data: Data, log: ErrorLog): void {
  log.collect(data.teams(), team => {
    const members = data.effectiveMembers(team);
    log.collect(team.people.leads, lead => {
      if (!members.has(lead)) {
        throw new Error(`\`${lead}\` leads team \`${team.name}\`, but is not a member of it`);
      }
    });
  });
}

export function validateTeamMembers(data: Data, log: ErrorLog): void {
  log.collect(data.teams(), team => {
    log.collect(data.effectiveMembers(team), member => {
      if (!data.person(member)) {
        throw new Error(`person \`${member}\` is member of team \`${team.name}\` but doesn't exist`);
      }
    });
  });
}

export function validateTeamNames(data: Data, log: ErrorLog): void {
  log.collect(data.teams(), team => {
    if (!TEAM_NAME.test(team.name)) {
      throw new Error(`team name \`${team.name}\` can only be alphanumeric with dashes`);
    }
  });
}

/** GitHub teams live in allowed orgs and each `org/name` pair belongs to one team. */
export function validateGithubTeams(data: Data, log: ErrorLog): void {
  const allowed = new Set(data.config.allowedGithubOrgs);
  const found = new Map<string, string>();
  log.collect(data.teams(), team => {
    log.collect(data.githubTeams(team), githubTeam => {
      if (!allowed.has(githubTeam.org)) {
        throw new Error(
          `GitHub organization \`${githubTeam.org}\` isn't allowed (in team \`${team.name}\`)`,
        );
      }
      const key = `${githubTeam.org}/${githubTeam.name}`;
      const other = found.get(key);
      found.set(key, team.name);
      if (other !== undefined) {
        throw new Error(
          `GitHub team \`${key}\` is defined for both the \`${team.name}\` and \`${other}\` teams`,
        );
      }
    });
  });
}

export function validateZulipStreamName(data: Data, log: ErrorLog): void {
  log.collect(data.teams(), team => {
    const stream = team.website?.zulipStream;
    if (stream?.startsWith("https://")) {
      throw new Error(
        `the zulip stream name of the team \`${team.name}\` is a link: only the name is required`,
      );
    }
  });
}

export function validateProjectGroupsHaveParentTeams(data: Data, log: ErrorLog): void {
  log.collect(data.teams(), team => {
    if (team.kind === "project-group" && team.subteamOf === undefined) {
      throw new Error(
        `the project group \`${team.name}\` doesn't have a parent team, but it's required to have one`,
      );
    }
  });
}
