/**
 * Zulip directory adapter (REST API, HTTP basic auth with a bot API key).
 */

import { z } from "zod";
import { requestJson } from "./http.js";
import type { ZulipDirectory, ZulipUser } from "./types.js";

const UsersResponse = z.object({
  result: z.literal("success"),
  members: z.array(
    z.object({
      user_id: z.number().int(),
      email: z.string(),
      full_name: z.string(),
    }),
  ),
});

export interface ZulipApiOptions {
  /** Server URL; defaults to `ZULIP_SITE`. */
  site?: string;
  /** Bot email; defaults to `ZULIP_USERNAME`. */
  username?: string;
  /** Bot API key; defaults to `ZULIP_TOKEN`. */
  token?: string;
  timeoutMs?: number;
}

interface ZulipCredentials {
  site: string;
  username: string;
  token: string;
}

export class ZulipApi implements ZulipDirectory {
  private readonly site: string | undefined;
  private readonly username: string | undefined;
  private readonly token: string | undefined;
  private readonly timeoutMs: number | undefined;

  constructor(opts: ZulipApiOptions = {}) {
    this.site = opts.site ?? process.env["ZULIP_SITE"];
    this.username = opts.username ?? process.env["ZULIP_USERNAME"];
    this.token = opts.token ?? process.env["ZULIP_TOKEN"];
    this.timeoutMs = opts.timeoutMs;
  }

  async requireAuth(): Promise<void> {
    this.credentials();
  }

  async getUsers(): Promise<ZulipUser[]> {
    const { site, username, token } = this.credentials();
    const auth = Buffer.from(`${username}:${token}`).toString("base64");
    const response = await requestJson(`${site.replace(/\/+$/, "")}/api/v1/users`, UsersResponse, {
      headers: { Authorization: `Basic ${auth}` },
      timeoutMs: this.timeoutMs,
    });
    return response.members.map(m => ({ userId: m.user_id, email: m.email, fullName: m.full_name }));
  }

  private credentials(): ZulipCredentials {
    const missing: string[] = [];
    if (!this.site) missing.push("ZULIP_SITE");
    if (!this.username) missing.push("ZULIP_USERNAME");
    if (!this.token) missing.push("ZULIP_TOKEN");
    if (!this.site || !this.username || !this.token) {
      throw new Error(`missing environment variables: ${missing.join(", ")}`);
    }
    return { site: this.site, username: this.username, token: this.token };
  }
}
