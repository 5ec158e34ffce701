/**
 * Data directory loader.
 *
 * Layout:
 *   config.yaml
 *   people/<github>.yaml
 *   teams/<name>.yaml
 *   teams/archive/<name>.yaml
 *   repos/<org>/<name>.yaml
 *
 * Every document is parsed with `yaml` and validated with its zod schema.
 * A file that fails either step, or whose name doesn't match the entity
 * key it declares, aborts the load.
 */

import { readFile, readdir } from "node:fs/promises";
import { basename, join } from "node:path";
import { parse as parseYaml } from "yaml";
import type { z } from "zod";
import { RosterConfig } from "../schemas/config.js";
import { Person } from "../schemas/person.js";
import { Repo } from "../schemas/repo.js";
import { Team } from "../schemas/team.js";
import { Data } from "./data.js";

const YAML_EXT = ".yaml";

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** Format zod issues as `path: message` pairs. */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

async function readDocument<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.infer<S>> {
  const raw = await readFile(path, "utf-8");
  let doc: unknown;
  try {
    doc = parseYaml(raw);
  } catch (err) {
    throw new Error(`Invalid YAML in ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const result = schema.safeParse(doc ?? {});
  if (!result.success) {
    throw new Error(`Invalid ${path}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/** Sorted `.yaml` files of a directory; a missing directory is empty. */
async function yamlFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter(e => e.isFile() && e.name.endsWith(YAML_EXT))
      .map(e => join(dir, e.name))
      .sort();
  } catch (err) {
    if (isMissing(err)) return [];
    throw err;
  }
}

async function subdirectories(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.filter(e => e.isDirectory()).map(e => e.name).sort();
  } catch (err) {
    if (isMissing(err)) return [];
    throw err;
  }
}

function expectKey(path: string, actual: string): void {
  const expected = basename(path, YAML_EXT);
  if (expected !== actual) {
    throw new Error(`Invalid ${path}: file name must match \`${actual}\``);
  }
}

async function loadTeams(dir: string): Promise<Team[]> {
  const teams: Team[] = [];
  for (const path of await yamlFiles(dir)) {
    const team = await readDocument(path, Team);
    expectKey(path, team.name);
    teams.push(team);
  }
  return teams;
}

/** Load and validate a whole data directory. */
export async function loadData(root: string): Promise<Data> {
  const config = await readDocument(join(root, "config.yaml"), RosterConfig);

  const people: Person[] = [];
  for (const path of await yamlFiles(join(root, "people"))) {
    const person = await readDocument(path, Person);
    expectKey(path, person.github);
    people.push(person);
  }

  const teams = await loadTeams(join(root, "teams"));
  const archivedTeams = await loadTeams(join(root, "teams", "archive"));

  const repos: Repo[] = [];
  for (const org of await subdirectories(join(root, "repos"))) {
    for (const path of await yamlFiles(join(root, "repos", org))) {
      const repo = await readDocument(path, Repo);
      if (repo.org !== org) {
        throw new Error(`Invalid ${path}: repo org \`${repo.org}\` doesn't match directory \`${org}\``);
      }
      expectKey(path, repo.name);
      repos.push(repo);
    }
  }

  return new Data({ config, people, teams, archivedTeams, repos });
}
