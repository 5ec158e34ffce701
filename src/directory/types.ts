/**
 * Directory adapter contracts: what the checks need from GitHub and Zulip.
 */

export interface GitHubUser {
  id: number;
  login: string;
  name?: string;
  email?: string;
}

/** Code-hosting directory. */
export interface GitHubDirectory {
  /** Rejects when the API can't be used (no credentials). */
  requireAuth(): Promise<void>;
  /** Current login of each account id; unknown ids are absent from the map. */
  usernames(ids: readonly number[]): Promise<Map<number, string>>;
  user(login: string): Promise<GitHubUser>;
}

export interface ZulipUser {
  userId: number;
  email: string;
  fullName: string;
}

/** Chat-platform directory. */
export interface ZulipDirectory {
  /** Rejects when the API can't be used (no credentials). */
  requireAuth(): Promise<void>;
  getUsers(): Promise<ZulipUser[]>;
}
