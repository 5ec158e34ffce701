/**
 * GitHub directory adapter.
 *
 * Usernames are resolved in batches through the GraphQL `nodes` query,
 * which takes legacy global node ids (`04:User<id>`, base64-encoded).
 */

import { z } from "zod";
import { requestJson } from "./http.js";
import type { GitHubDirectory, GitHubUser } from "./types.js";

const USERNAMES_BATCH = 100;

const USERNAMES_QUERY = `query($ids: [ID!]!) {
  nodes(ids: $ids) {
    ... on User { databaseId login }
  }
}`;

const UsernamesResponse = z.object({
  data: z
    .object({
      nodes: z.array(
        z.object({ databaseId: z.number().int().optional(), login: z.string().optional() }).nullable(),
      ),
    })
    .nullable()
    .optional(),
  errors: z.array(z.object({ message: z.string() })).optional(),
});

const UserResponse = z.object({
  id: z.number().int(),
  login: z.string(),
  name: z.string().nullable().optional(),
  email: z.string().nullable().optional(),
});

export interface GitHubApiOptions {
  /** Defaults to `GITHUB_TOKEN`. */
  token?: string;
  apiUrl?: string;
  timeoutMs?: number;
}

/** Legacy global node id of a user account. */
export function userNodeId(id: number): string {
  return Buffer.from(`04:User${id}`).toString("base64");
}

export class GitHubApi implements GitHubDirectory {
  private readonly token: string | undefined;
  private readonly apiUrl: string;
  private readonly timeoutMs: number | undefined;

  constructor(opts: GitHubApiOptions = {}) {
    this.token = opts.token ?? process.env["GITHUB_TOKEN"];
    this.apiUrl = (opts.apiUrl ?? "https://api.github.com").replace(/\/+$/, "");
    this.timeoutMs = opts.timeoutMs;
  }

  async requireAuth(): Promise<void> {
    this.headers();
  }

  async usernames(ids: readonly number[]): Promise<Map<number, string>> {
    const result = new Map<number, string>();
    for (let start = 0; start < ids.length; start += USERNAMES_BATCH) {
      const batch = ids.slice(start, start + USERNAMES_BATCH);
      const response = await requestJson(`${this.apiUrl}/graphql`, UsernamesResponse, {
        method: "POST",
        headers: { ...this.headers(), "Content-Type": "application/json" },
        body: JSON.stringify({ query: USERNAMES_QUERY, variables: { ids: batch.map(userNodeId) } }),
        timeoutMs: this.timeoutMs,
      });

      // Unresolvable ids (deleted accounts) come back as null nodes plus errors.
      if (!response.data) {
        const messages = (response.errors ?? []).map(e => e.message).join("; ");
        throw new Error(`GitHub GraphQL query failed: ${messages || "no data returned"}`);
      }
      for (const node of response.data.nodes) {
        if (node?.databaseId !== undefined && node.login !== undefined) {
          result.set(node.databaseId, node.login);
        }
      }
    }
    return result;
  }

  async user(login: string): Promise<GitHubUser> {
    const user = await requestJson(`${this.apiUrl}/users/${encodeURIComponent(login)}`, UserResponse, {
      headers: this.headers(),
      timeoutMs: this.timeoutMs,
    });
    return {
      id: user.id,
      login: user.login,
      name: user.name ?? undefined,
      email: user.email ?? undefined,
    };
  }

  private headers(): Record<string, string> {
    if (!this.token) {
      throw new Error("missing environment variable GITHUB_TOKEN");
    }
    return {
      Authorization: `Bearer ${this.token}`,
      Accept: "application/vnd.github+json",
      "User-Agent": "org-roster",
    };
  }
}
