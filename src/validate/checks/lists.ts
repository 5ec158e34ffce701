/**
 * Mailing list checks.
 */

import type { Data } from "../../data/data.js";
import { personEmail } from "../../schemas/person.js";
import type { ErrorLog } from "../error-log.js";

const LIST_ADDRESS = /^[a-zA-Z0-9_.-]+@([a-zA-Z0-9_.-]+)$/;

/** Members of a team with a mailing list have an email address (or opted out). */
export function validateListEmailAddresses(data: Data, log: ErrorLog): void {
  log.collect(data.teams(), team => {
    if (team.lists.length === 0) return;
    log.collect(data.effectiveMembers(team), member => {
      const person = data.person(member);
      if (person && personEmail(person).state === "missing") {
        throw new Error(
          `person \`${person.github}\` is a member of a mailing list but has no email address`,
        );
      }
    });
  });
}

export function validateListExtraPeople(data: Data, log: ErrorLog): void {
  log.collect(data.teams(), team => {
    log.collect(team.lists, list => {
      log.collect(list.extraPeople, person => {
        if (!data.person(person)) {
          throw new Error(`person \`${person}\` does not exist (in list \`${list.address}\`)`);
        }
      });
    });
  });
}

export function validateListExtraTeams(data: Data, log: ErrorLog): void {
  log.collect(data.teams(), team => {
    log.collect(team.lists, list => {
      log.collect(list.extraTeams, name => {
        if (!data.team(name)) {
          throw new Error(`team \`${name}\` does not exist (in list \`${list.address}\`)`);
        }
      });
    });
  });
}

/** List addresses are well-formed and on a domain listed in the config. */
export function validateListAddresses(data: Data, log: ErrorLog): void {
  const domains = new Set(data.config.allowedMailingListsDomains);
  log.collect(data.teams(), team => {
    log.collect(team.lists, list => {
      const match = LIST_ADDRESS.exec(list.address);
      const domain = match?.[1];
      if (domain === undefined) {
        throw new Error(`invalid list address: \`${list.address}\``);
      }
      if (!domains.has(domain)) {
        throw new Error(`list address on a domain we don't own: \`${list.address}\``);
      }
    });
  });
}
