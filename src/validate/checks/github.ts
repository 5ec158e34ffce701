/**
 * Checks against the live GitHub directory.
 */

import type { Data } from "../../data/data.js";
import type { GitHubDirectory } from "../../directory/types.js";
import type { Person } from "../../schemas/person.js";
import type { ErrorLog } from "../error-log.js";
import { errorMessage } from "../error-log.js";

/** Each person's handle still matches the current login of their GitHub id. */
export async function validateGithubUsernames(
  data: Data,
  github: GitHubDirectory,
  log: ErrorLog,
): Promise<void> {
  const byId = new Map<number, Person>();
  for (const person of data.people()) byId.set(person.githubId, person);

  let current: Map<number, string>;
  try {
    current = await github.usernames([...byId.keys()]);
  } catch (err) {
    log.push(`couldn't verify GitHub usernames: ${errorMessage(err)}`);
    return;
  }

  log.collect(current, ([id, login]) => {
    const person = byId.get(id);
    if (person && person.github !== login) {
      throw new Error(`user \`${person.github}\` changed username to \`${login}\``);
    }
  });
}
