/**
 * add-person command: create `people/<login>.yaml` from a GitHub account.
 */

import { access, mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { Command } from "commander";
import writeFileAtomic from "write-file-atomic";
import { stringify as stringifyYaml } from "yaml";
import { GitHubApi } from "../../directory/github.js";
import type { GitHubDirectory } from "../../directory/types.js";
import { Person } from "../../schemas/person.js";
import { errorMessage } from "../../validate/error-log.js";

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Look up `login` and write a new person file. Never overwrites; the file
 * is named after the login GitHub reports, which may differ in case.
 */
export async function addPerson(dataDir: string, login: string, github: GitHubDirectory): Promise<void> {
  let person: Person;
  try {
    const user = await github.user(login);
    person = Person.parse({
      name: user.name ?? user.login,
      github: user.login,
      githubId: user.id,
      email: user.email,
    });
  } catch (err) {
    console.error(`❌ Failed to look up ${login}: ${errorMessage(err)}`);
    process.exitCode = 1;
    return;
  }

  const dir = join(dataDir, "people");
  const path = join(dir, `${person.github}.yaml`);
  if (await exists(path)) {
    console.error(`❌ people/${person.github}.yaml already exists`);
    process.exitCode = 1;
    return;
  }

  await mkdir(dir, { recursive: true });
  await writeFileAtomic(path, stringifyYaml(person));
  console.log(`✅ Added ${person.github} (id ${person.githubId})`);
}

export function registerAddPersonCommand(program: Command): void {
  program
    .command("add-person <login>")
    .description("Create a person file from a GitHub account")
    .action(async (login: string) => {
      await addPerson(program.opts<{ data: string }>().data, login, new GitHubApi());
    });
}
