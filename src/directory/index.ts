export { GitHubApi, userNodeId } from "./github.js";
export type { GitHubApiOptions } from "./github.js";
export { ZulipApi } from "./zulip.js";
export type { ZulipApiOptions } from "./zulip.js";
export { requestJson, DEFAULT_TIMEOUT_MS } from "./http.js";
export type { JsonRequest } from "./http.js";
export type { GitHubDirectory, GitHubUser, ZulipDirectory, ZulipUser } from "./types.js";
