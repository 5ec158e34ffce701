/**
 * Check registry: every check, by tier, in the order it runs.
 */

import {
  validateDiscordTeamMembersHaveDiscordIds,
  validateZulipGroupExtraPeople,
  validateZulipGroupIds,
  validateZulipUsers,
} from "./checks/chat.js";
import { validateGithubUsernames } from "./checks/github.js";
import {
  validateListAddresses,
  validateListEmailAddresses,
  validateListExtraPeople,
  validateListExtraTeams,
} from "./checks/lists.js";
import { validateAlumni, validateInactiveMembers, validatePeopleAddresses } from "./checks/people.js";
import { validateDuplicatePermissions, validatePermissions } from "./checks/permissions.js";
import { validateRepos } from "./checks/repos.js";
import { validateRfcbotExcludeMembers, validateRfcbotLabels } from "./checks/rfcbot.js";
import {
  validateGithubTeams,
  validateNamePrefixes,
  validateProjectGroupsHaveParentTeams,
  validateSubteamOf,
  validateTeamLeads,
  validateTeamMembers,
  validateTeamNames,
  validateZulipStreamName,
} from "./checks/teams.js";
import type { Check, CheckTiers, GitHubCheckFn, LocalCheckFn, ZulipCheckFn } from "./types.js";

/** Checks that only read the data model. */
export const LOCAL_CHECKS: readonly Check<LocalCheckFn>[] = [
  { name: "name-prefixes", run: validateNamePrefixes },
  { name: "subteam-of", run: validateSubteamOf },
  { name: "team-leads", run: validateTeamLeads },
  { name: "team-members", run: validateTeamMembers },
  { name: "alumni", run: validateAlumni },
  { name: "inactive-members", run: validateInactiveMembers },
  { name: "list-email-addresses", run: validateListEmailAddresses },
  { name: "list-extra-people", run: validateListExtraPeople },
  { name: "list-extra-teams", run: validateListExtraTeams },
  { name: "list-addresses", run: validateListAddresses },
  { name: "people-addresses", run: validatePeopleAddresses },
  { name: "duplicate-permissions", run: validateDuplicatePermissions },
  { name: "permissions", run: validatePermissions },
  { name: "rfcbot-labels", run: validateRfcbotLabels },
  { name: "rfcbot-exclude-members", run: validateRfcbotExcludeMembers },
  { name: "team-names", run: validateTeamNames },
  { name: "github-teams", run: validateGithubTeams },
  { name: "zulip-stream-name", run: validateZulipStreamName },
  { name: "project-groups-have-parent-teams", run: validateProjectGroupsHaveParentTeams },
  { name: "discord-team-members-have-discord-ids", run: validateDiscordTeamMembersHaveDiscordIds },
  { name: "zulip-group-ids", run: validateZulipGroupIds },
  { name: "zulip-group-extra-people", run: validateZulipGroupExtraPeople },
  { name: "repos", run: validateRepos },
];

/** Checks that query the GitHub API. */
export const GITHUB_CHECKS: readonly Check<GitHubCheckFn>[] = [
  { name: "github-usernames", run: validateGithubUsernames },
];

/** Checks that query the Zulip API. */
export const ZULIP_CHECKS: readonly Check<ZulipCheckFn>[] = [
  { name: "zulip-users", run: validateZulipUsers },
];

export const CHECK_TIERS: CheckTiers = {
  local: LOCAL_CHECKS,
  github: GITHUB_CHECKS,
  zulip: ZULIP_CHECKS,
};

export function checkNames(tiers: CheckTiers = CHECK_TIERS): string[] {
  return [...tiers.local, ...tiers.github, ...tiers.zulip].map(check => check.name);
}
