/**
 * People checks: alumni consistency, orphaned people, email addresses.
 */

import type { Data } from "../../data/data.js";
import { hasAnyPermission, personEmail } from "../../schemas/person.js";
import type { ErrorLog } from "../error-log.js";
import { errorMessage } from "../error-log.js";

export const ALUMNI_TEAM = "alumni";

/**
 * Members of the `alumni` team are not active anywhere, and people listed
 * as alumni of another team are not also listed explicitly in `alumni`.
 */
export function validateAlumni(data: Data, log: ErrorLog): void {
  let active: Set<string>;
  try {
    active = data.activeMembers();
  } catch (err) {
    log.push(errorMessage(err));
    return;
  }

  const alumniTeam = data.team(ALUMNI_TEAM);
  if (!alumniTeam) return;

  log.collect([alumniTeam], team => {
    const explicit = new Set(team.people.members);

    log.collect(data.effectiveMembers(team), member => {
      if (active.has(member)) {
        throw new Error(`alumni team includes active member '${member}'`);
      }
    });

    const listedElsewhere = data
      .teams()
      .filter(t => t.name !== ALUMNI_TEAM)
      .flatMap(t => t.people.alumni.map(member => ({ team: t.name, member })));

    log.collect(listedElsewhere, ({ team: other, member }) => {
      if (explicit.delete(member)) {
        throw new Error(
          `alumni team explicitly includes member '${member}' who was specified as an alumni already in '${other}'`,
        );
      }
    });
  });
}

/**
 * Every person is referenced by a team (active or archived), holds a
 * permission directly, or is an individual contributor on some repo.
 */
export function validateInactiveMembers(data: Data, log: ErrorLog): void {
  const referenced = new Set<string>();
  log.collect([...data.teams(), ...data.archivedTeams()], team => {
    for (const member of data.effectiveMembers(team)) referenced.add(member);
    for (const alumnus of team.people.alumni) referenced.add(alumnus);
    for (const list of team.lists) {
      for (const person of list.extraPeople) referenced.add(person);
    }
  });

  const individualContributors = new Set(
    data.repos().flatMap(repo => Object.keys(repo.access.individuals)),
  );

  log.collect(data.people(), person => {
    if (referenced.has(person.github)) return;
    if (!hasAnyPermission(person) && !individualContributors.has(person.github)) {
      throw new Error(
        `person \`${person.github}\` is not a member of any team (active or archived), has no permissions, and is not an individual contributor to any repo`,
      );
    }
  });
}

export function validatePeopleAddresses(data: Data, log: ErrorLog): void {
  log.collect(data.people(), person => {
    const email = personEmail(person);
    if (email.state === "present" && !email.address.includes("@")) {
      throw new Error(`invalid email address of \`${person.github}\`: ${email.address}`);
    }
  });
}
