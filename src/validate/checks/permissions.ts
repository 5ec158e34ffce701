/**
 * Permission checks.
 */

import type { Data } from "../../data/data.js";
import { hasDirectPermission } from "../../schemas/person.js";
import type { ErrorLog } from "../error-log.js";

/**
 * Members of a team don't also hold, directly, a permission the team
 * already grants them. One message per (person, permission, team).
 */
export function validateDuplicatePermissions(data: Data, log: ErrorLog): void {
  const available = data.availablePermissions();
  log.collect(data.teams(), team => {
    const granted = available.filter(permission => team.permissions.includes(permission));
    if (granted.length === 0) return;
    log.collect(data.effectiveMembers(team), member => {
      const person = data.person(member);
      if (!person) return;
      log.collect(granted, permission => {
        if (hasDirectPermission(person, permission)) {
          throw new Error(
            `user \`${member}\` has the permission \`${permission}\` both explicitly and through the \`${team.name}\` team`,
          );
        }
      });
    });
  });
}

/** Every granted permission name is one the config makes available. */
export function validatePermissions(data: Data, log: ErrorLog): void {
  const available = new Set(data.availablePermissions());
  const ensureKnown = (permissions: readonly string[], where: string) => {
    log.collect(permissions, permission => {
      if (!available.has(permission)) {
        throw new Error(`unknown permission \`${permission}\` (in ${where})`);
      }
    });
  };

  for (const team of data.teams()) {
    ensureKnown(team.permissions, `team \`${team.name}\``);
    ensureKnown(team.leadsPermissions, `leads of team \`${team.name}\``);
  }
  for (const person of data.people()) {
    ensureKnown(person.permissions, `user \`${person.github}\``);
  }
}
