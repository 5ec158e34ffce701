export { Data } from "./data.js";
export type {
  DataSources,
  GitHubTeam,
  MailingList,
  Permission,
  ZulipGroup,
  ZulipGroupMember,
} from "./data.js";
export { resolveEffectiveMembers } from "./members.js";
export type { MembershipSource } from "./members.js";
export { loadData, formatIssues } from "./loader.js";
