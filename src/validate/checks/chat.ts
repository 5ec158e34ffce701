/**
 * Chat-platform checks: Discord roles and Zulip user groups.
 */

import type { Data, ZulipGroup, ZulipGroupMember } from "../../data/data.js";
import type { ZulipDirectory } from "../../directory/types.js";
import type { ErrorLog } from "../error-log.js";
import { errorMessage } from "../error-log.js";

/** The team that mirrors every Discord user; exempt from the id check. */
const DISCORD_ALL_TEAM = "all";

/** Every member of a team with Discord roles has a Discord id. */
export function validateDiscordTeamMembersHaveDiscordIds(data: Data, log: ErrorLog): void {
  log.collect(data.teams(), team => {
    if (team.discordRoles === undefined || team.name === DISCORD_ALL_TEAM) return;
    const missing = [...data.effectiveMembers(team)]
      .filter(handle => {
        const person = data.person(handle);
        return person !== undefined && person.discordId === undefined;
      })
      .sort();
    if (missing.length > 0) {
      throw new Error(
        `the following members of the "${team.name}" team do not have discord_ids: ${missing.join(", ")}`,
      );
    }
  });
}

/** Members of a team whose Zulip groups include the team's members have a Zulip id. */
export function validateZulipGroupIds(data: Data, log: ErrorLog): void {
  log.collect(data.teams(), team => {
    if (!team.zulipGroups.some(group => group.includeTeamMembers)) return;
    log.collect(data.effectiveMembers(team), member => {
      const person = data.person(member);
      if (person && person.zulipId === undefined) {
        throw new Error(
          `person \`${person.github}\` in '${team.name}' is a member of a Zulip user group but has no Zulip id`,
        );
      }
    });
  });
}

export function validateZulipGroupExtraPeople(data: Data, log: ErrorLog): void {
  log.collect(data.teams(), team => {
    log.collect(team.zulipGroups, group => {
      log.collect(group.extraPeople, person => {
        if (!data.person(person)) {
          throw new Error(`person \`${person}\` does not exist (in Zulip group \`${group.name}\`)`);
        }
      });
    });
  });
}

/**
 * How a group member shows up when it's missing from Zulip, or undefined
 * when it's known. A member without an id is always missing.
 */
export function missingZulipMember(
  member: ZulipGroupMember,
  knownIds: ReadonlySet<number>,
): string | undefined {
  switch (member.kind) {
    case "id":
      return knownIds.has(member.zulipId) ? undefined : `ID: ${member.zulipId}`;
    case "with-id":
      return knownIds.has(member.zulipId) ? undefined : member.github;
    case "without-id":
      return member.github;
    default: {
      const unreachable: never = member;
      return unreachable;
    }
  }
}

/** Every member of every Zulip group exists on Zulip. */
export async function validateZulipUsers(
  data: Data,
  zulip: ZulipDirectory,
  log: ErrorLog,
): Promise<void> {
  let knownIds: Set<number>;
  try {
    knownIds = new Set((await zulip.getUsers()).map(user => user.userId));
  } catch (err) {
    log.push(`couldn't verify Zulip users: ${errorMessage(err)}`);
    return;
  }

  let groups: Map<string, ZulipGroup>;
  try {
    groups = data.allZulipGroups();
  } catch (err) {
    log.push(`couldn't get all the Zulip groups: ${errorMessage(err)}`);
    return;
  }

  log.collect(groups.values(), group => {
    const missing = new Set<string>();
    for (const member of group.members) {
      const label = missingZulipMember(member, knownIds);
      if (label !== undefined) missing.add(label);
    }
    if (missing.size > 0) {
      throw new Error(
        `the "${group.name}" Zulip group includes members who don't appear on Zulip: ${[...missing].sort().join(", ")}`,
      );
    }
  });
}
