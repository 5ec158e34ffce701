/**
 * Schema barrel export: all Zod schemas for the roster data directory.
 */

export { RosterConfig, availablePermissions } from "./config.js";

export {
  Person,
  personEmail,
  hasDirectPermission,
  hasAnyPermission,
} from "./person.js";
export type { PersonEmail } from "./person.js";

export {
  TeamKind,
  TeamPeople,
  TeamGitHub,
  TeamWebsite,
  TeamRfcbot,
  DiscordRole,
  TeamList,
  TeamZulipGroup,
  Team,
  describeKind,
  isAggregateTeam,
  githubTeamName,
} from "./team.js";

export {
  RepoPermission,
  BranchProtection,
  RepoAccess,
  Repo,
} from "./repo.js";
