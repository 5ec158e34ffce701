/**
 * Effective membership resolution.
 *
 * A team's effective members are its explicit members plus whatever its
 * include rules pull in from other teams. Resolution is fallible: an
 * include rule may name a team that doesn't exist, or loop back to a team
 * that is already being resolved.
 */

import type { Team, TeamKind } from "../schemas/team.js";
import { isAggregateTeam } from "../schemas/team.js";

/** The part of the data model membership resolution reads. */
export interface MembershipSource {
  team(name: string): Team | undefined;
  teams(): readonly Team[];
  archivedTeams(): readonly Team[];
}

function addLeadsOfKind(source: MembershipSource, kind: TeamKind, into: Set<string>): void {
  for (const team of source.teams()) {
    if (team.kind !== kind) continue;
    for (const lead of team.people.leads) into.add(lead);
  }
}

/**
 * Resolve the effective members of `team`.
 *
 * `path` is the chain of teams currently being resolved; it is how
 * include loops are detected.
 */
export function resolveEffectiveMembers(
  source: MembershipSource,
  team: Team,
  path: readonly string[] = [],
): Set<string> {
  if (path.includes(team.name)) {
    throw new Error(
      `team \`${team.name}\` includes its own members: ${[...path, team.name].join(" => ")}`,
    );
  }
  const chain = [...path, team.name];
  const { people } = team;
  const members = new Set(people.members);

  if (people.includeTeamLeads) addLeadsOfKind(source, "team", members);
  if (people.includeWgLeads) addLeadsOfKind(source, "working-group", members);
  if (people.includeProjectGroupLeads) addLeadsOfKind(source, "project-group", members);

  if (people.includeAllTeamMembers) {
    for (const other of source.teams()) {
      if (other.kind !== "team" || other.name === team.name || isAggregateTeam(other)) continue;
      for (const member of resolveEffectiveMembers(source, other, chain)) members.add(member);
    }
  }

  for (const name of people.includeTeamMembers) {
    const other = source.team(name);
    if (!other) {
      throw new Error(
        `team \`${team.name}\` includes the members of team \`${name}\`, which doesn't exist`,
      );
    }
    for (const member of resolveEffectiveMembers(source, other, chain)) members.add(member);
  }

  if (people.includeAllAlumni) {
    for (const other of source.teams()) {
      for (const alumnus of other.people.alumni) members.add(alumnus);
    }
    for (const archived of source.archivedTeams()) {
      for (const member of archived.people.members) members.add(member);
      for (const alumnus of archived.people.alumni) members.add(alumnus);
    }
  }

  return members;
}
