/**
 * Data: read-only query surface over a loaded data directory.
 *
 * Built once by the loader (or directly from parsed entities in tests)
 * and never mutated afterwards. Derived views (effective membership,
 * GitHub teams, lists, Zulip groups, permission holders) are computed on
 * demand; the ones that can fail throw a plain `Error` describing the
 * unresolved reference.
 */

import type { RosterConfig } from "../schemas/config.js";
import { availablePermissions } from "../schemas/config.js";
import type { Person } from "../schemas/person.js";
import type { Repo } from "../schemas/repo.js";
import type { Team } from "../schemas/team.js";
import { githubTeamName } from "../schemas/team.js";
import { resolveEffectiveMembers } from "./members.js";
import type { MembershipSource } from "./members.js";

/** A GitHub team provisioned from a roster team. */
export interface GitHubTeam {
  org: string;
  name: string;
  /** GitHub ids of the effective members that exist as people. */
  members: number[];
}

/** A mailing list with its recipients resolved. */
export interface MailingList {
  address: string;
  /** Handles of the people on the list, sorted. */
  people: string[];
  /** Recipient addresses, sorted and deduplicated. */
  emails: string[];
}

/**
 * A resolved Zulip group member. Three shapes exist: a bare Zulip id
 * (`extraZulipIds`), a person with a Zulip id, and a person without one.
 */
export type ZulipGroupMember =
  | { kind: "id"; zulipId: number }
  | { kind: "with-id"; github: string; zulipId: number }
  | { kind: "without-id"; github: string };

export interface ZulipGroup {
  name: string;
  /** Owning team. */
  team: string;
  includesTeamMembers: boolean;
  members: ZulipGroupMember[];
}

/** Holders of a permission, across direct grants and team grants. */
export interface Permission {
  name: string;
  githubUsers: string[];
  githubIds: number[];
  discordIds: string[];
}

export interface DataSources {
  config: RosterConfig;
  people: readonly Person[];
  teams: readonly Team[];
  archivedTeams?: readonly Team[];
  repos?: readonly Repo[];
}

export class Data implements MembershipSource {
  readonly config: RosterConfig;
  private readonly peopleByHandle = new Map<string, Person>();
  private readonly teamsByName = new Map<string, Team>();
  private readonly archived: readonly Team[];
  private readonly repoList: readonly Repo[];
  private readonly memberCache = new WeakMap<Team, ReadonlySet<string>>();

  constructor(sources: DataSources) {
    this.config = sources.config;
    for (const person of sources.people) {
      if (this.peopleByHandle.has(person.github)) {
        throw new Error(`duplicate person \`${person.github}\``);
      }
      this.peopleByHandle.set(person.github, person);
    }
    for (const team of sources.teams) {
      if (this.teamsByName.has(team.name)) {
        throw new Error(`duplicate team \`${team.name}\``);
      }
      this.teamsByName.set(team.name, team);
    }
    this.archived = sources.archivedTeams ?? [];
    this.repoList = sources.repos ?? [];
  }

  /** Active team by name. Archived teams are not returned. */
  team(name: string): Team | undefined {
    return this.teamsByName.get(name);
  }

  person(handle: string): Person | undefined {
    return this.peopleByHandle.get(handle);
  }

  teams(): readonly Team[] {
    return [...this.teamsByName.values()];
  }

  archivedTeams(): readonly Team[] {
    return this.archived;
  }

  people(): readonly Person[] {
    return [...this.peopleByHandle.values()];
  }

  repos(): readonly Repo[] {
    return this.repoList;
  }

  availablePermissions(): string[] {
    return availablePermissions(this.config);
  }

  /** Effective members of a team (active or archived). Throws when unresolvable. */
  effectiveMembers(team: Team): ReadonlySet<string> {
    const cached = this.memberCache.get(team);
    if (cached) return cached;
    const members = resolveEffectiveMembers(this, team);
    this.memberCache.set(team, members);
    return members;
  }

  /** Union of effective members of every active, non-alumni team. */
  activeMembers(): Set<string> {
    const active = new Set<string>();
    for (const team of this.teams()) {
      if (team.people.includeAllAlumni) continue;
      for (const member of this.effectiveMembers(team)) active.add(member);
    }
    return active;
  }

  githubTeams(team: Team): GitHubTeam[] {
    if (!team.github) return [];
    const name = githubTeamName(team);
    const members: number[] = [];
    for (const handle of this.effectiveMembers(team)) {
      const person = this.person(handle);
      if (person) members.push(person.githubId);
    }
    members.sort((a, b) => a - b);
    return team.github.orgs.map(org => ({ org, name, members: [...members] }));
  }

  /** Every configured `org/team` GitHub team key. Reads raw config only. */
  allGithubTeams(): Set<string> {
    const keys = new Set<string>();
    for (const team of this.teams()) {
      if (!team.github) continue;
      const name = githubTeamName(team);
      for (const org of team.github.orgs) keys.add(`${org}/${name}`);
    }
    return keys;
  }

  lists(team: Team): MailingList[] {
    return team.lists.map(list => {
      const people = new Set<string>();
      if (list.includeTeamMembers) {
        for (const member of this.effectiveMembers(team)) people.add(member);
      }
      for (const extra of list.extraPeople) people.add(extra);
      for (const name of list.extraTeams) {
        const other = this.team(name);
        if (!other) {
          throw new Error(`team \`${name}\` does not exist (in list \`${list.address}\`)`);
        }
        for (const member of this.effectiveMembers(other)) people.add(member);
      }

      const emails = new Set<string>(list.extraEmails);
      for (const handle of people) {
        const email = this.person(handle)?.email;
        if (typeof email === "string") emails.add(email);
      }

      return {
        address: list.address,
        people: [...people].sort(),
        emails: [...emails].sort(),
      };
    });
  }

  /** Every mailing list of every active team, keyed by address. */
  allLists(): Map<string, MailingList> {
    const lists = new Map<string, MailingList>();
    for (const team of this.teams()) {
      for (const list of this.lists(team)) lists.set(list.address, list);
    }
    return lists;
  }

  zulipGroups(team: Team): ZulipGroup[] {
    return team.zulipGroups.map(group => {
      const handles = new Set<string>();
      if (group.includeTeamMembers) {
        for (const member of this.effectiveMembers(team)) handles.add(member);
      }
      for (const extra of group.extraPeople) handles.add(extra);
      for (const excluded of group.excludedPeople) handles.delete(excluded);

      const members = [...handles].sort().map((handle): ZulipGroupMember => {
        const person = this.person(handle);
        if (!person) {
          throw new Error(`person \`${handle}\` in Zulip group \`${group.name}\` doesn't exist`);
        }
        return person.zulipId === undefined
          ? { kind: "without-id", github: handle }
          : { kind: "with-id", github: handle, zulipId: person.zulipId };
      });
      for (const zulipId of group.extraZulipIds) members.push({ kind: "id", zulipId });

      return {
        name: group.name,
        team: team.name,
        includesTeamMembers: group.includeTeamMembers,
        members,
      };
    });
  }

  /** Every Zulip group of every active team, keyed by group name. */
  allZulipGroups(): Map<string, ZulipGroup> {
    const groups = new Map<string, ZulipGroup>();
    for (const team of this.teams()) {
      for (const group of this.zulipGroups(team)) {
        const existing = groups.get(group.name);
        if (existing) {
          throw new Error(
            `Zulip group \`${group.name}\` is defined by both the \`${existing.team}\` and \`${team.name}\` teams`,
          );
        }
        groups.set(group.name, group);
      }
    }
    return groups;
  }

  /** Discord ids of the effective members that have one. */
  discordIds(team: Team): string[] {
    const ids: string[] = [];
    for (const handle of this.effectiveMembers(team)) {
      const id = this.person(handle)?.discordId;
      if (id !== undefined) ids.push(id);
    }
    return ids;
  }

  /**
   * Holders of a permission. Returns undefined for names the config does
   * not make available.
   */
  permission(name: string): Permission | undefined {
    if (!this.availablePermissions().includes(name)) return undefined;

    const handles = new Set<string>();
    for (const person of this.people()) {
      if (person.permissions.includes(name)) handles.add(person.github);
    }
    for (const team of this.teams()) {
      if (team.permissions.includes(name)) {
        for (const member of this.effectiveMembers(team)) handles.add(member);
      }
      if (team.leadsPermissions.includes(name)) {
        for (const lead of team.people.leads) handles.add(lead);
      }
    }

    const holders = [...handles]
      .map(handle => this.person(handle))
      .filter((person): person is Person => person !== undefined)
      .sort((a, b) => a.github.localeCompare(b.github));

    return {
      name,
      githubUsers: holders.map(p => p.github),
      githubIds: holders.map(p => p.githubId),
      discordIds: holders.flatMap(p => (p.discordId === undefined ? [] : [p.discordId])),
    };
  }
}
