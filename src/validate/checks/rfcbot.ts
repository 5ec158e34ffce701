/**
 * rfcbot integration checks.
 */

import type { Data } from "../../data/data.js";
import type { ErrorLog } from "../error-log.js";

/** rfcbot labels are unique across teams. */
export function validateRfcbotLabels(data: Data, log: ErrorLog): void {
  const labels = new Set<string>();
  for (const team of data.teams()) {
    if (!team.rfcbot) continue;
    if (labels.has(team.rfcbot.label)) {
      log.push(`duplicate rfcbot label: ${team.rfcbot.label}`);
    }
    labels.add(team.rfcbot.label);
  }
}

/** `rfcbot.excludeMembers` names each current member of the team at most once. */
export function validateRfcbotExcludeMembers(data: Data, log: ErrorLog): void {
  log.collect(data.teams(), team => {
    if (!team.rfcbot) return;
    const members = data.effectiveMembers(team);
    const seen = new Set<string>();
    log.collect(team.rfcbot.excludeMembers, member => {
      if (seen.has(member)) {
        throw new Error(`duplicate member in \`${team.name}\` rfcbot.excludeMembers: ${member}`);
      }
      seen.add(member);
      if (!members.has(member)) {
        throw new Error(
          `person \`${member}\` is not a member of team \`${team.name}\` (in rfcbot.excludeMembers)`,
        );
      }
    });
  });
}
