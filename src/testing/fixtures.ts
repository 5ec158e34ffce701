/**
 * Entity builders for tests. Everything goes through the zod schemas so
 * defaults match what the loader produces.
 */

import type { z } from "zod";
import { Data } from "../data/data.js";
import { RosterConfig } from "../schemas/config.js";
import { Person } from "../schemas/person.js";
import { Repo } from "../schemas/repo.js";
import { Team } from "../schemas/team.js";

export const TEST_ORG = "example-org";
export const TEST_DOMAIN = "lists.example.org";

/** Stable fake GitHub id derived from the handle. */
export function fakeGithubId(handle: string): number {
  let id = 7;
  for (const ch of handle) id = (id * 31 + ch.charCodeAt(0)) % 1_000_000;
  return id + 1;
}

export function person(github: string, input: Partial<z.input<typeof Person>> = {}): Person {
  return Person.parse({
    name: github,
    github,
    githubId: fakeGithubId(github),
    email: `${github}@example.com`,
    ...input,
  });
}

export function team(name: string, input: Partial<z.input<typeof Team>> = {}): Team {
  return Team.parse({ name, ...input });
}

export function repo(name: string, input: Partial<z.input<typeof Repo>> = {}): Repo {
  return Repo.parse({ org: TEST_ORG, name, ...input });
}

export function config(input: z.input<typeof RosterConfig> = {}): RosterConfig {
  return RosterConfig.parse({
    allowedGithubOrgs: [TEST_ORG],
    allowedMailingListsDomains: [TEST_DOMAIN],
    ...input,
  });
}

export interface TestDataInput {
  config?: RosterConfig;
  people?: Person[];
  teams?: Team[];
  archivedTeams?: Team[];
  repos?: Repo[];
}

export function buildData(input: TestDataInput = {}): Data {
  return new Data({
    config: input.config ?? config(),
    people: input.people ?? [],
    teams: input.teams ?? [],
    archivedTeams: input.archivedTeams ?? [],
    repos: input.repos ?? [],
  });
}
