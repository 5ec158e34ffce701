/**
 * Repository access checks.
 */

import type { Data } from "../../data/data.js";
import type { ErrorLog } from "../error-log.js";

/**
 * Repos live in allowed orgs, team grants name a GitHub team configured
 * for that org, and individual grants name a person.
 */
export function validateRepos(data: Data, log: ErrorLog): void {
  const allowedOrgs = new Set(data.config.allowedGithubOrgs);
  const githubTeams = data.allGithubTeams();

  log.collect(data.repos(), repo => {
    if (!allowedOrgs.has(repo.org)) {
      throw new Error(`The repo '${repo.name}' is in an invalid org '${repo.org}'`);
    }
    log.collect(Object.keys(repo.access.teams), teamName => {
      if (!githubTeams.has(`${repo.org}/${teamName}`)) {
        throw new Error(
          `access for ${repo.org}/${repo.name} is invalid: '${teamName}' is not configured as a GitHub team for the '${repo.org}' org`,
        );
      }
    });
    log.collect(Object.keys(repo.access.individuals), name => {
      if (!data.person(name)) {
        throw new Error(
          `access for ${repo.org}/${repo.name} is invalid: '${name}' is not the name of a person in the team repo`,
        );
      }
    });
  });
}
