/**
 * Person schema: one file per person under `people/<github>.yaml`.
 *
 * The GitHub handle is the identity key every other entity refers to.
 */

import { z } from "zod";

export const Person = z.object({
  /** Display name. */
  name: z.string().min(1),
  /** GitHub handle (identity key). */
  github: z.string().min(1),
  /** Numeric GitHub account id; survives renames. */
  githubId: z.number().int().nonnegative(),
  /** Numeric Zulip user id. */
  zulipId: z.number().int().nonnegative().optional(),
  /** Discord snowflake, kept as a string (exceeds 2^53). */
  discordId: z.string().regex(/^\d+$/, "Discord id must be numeric").optional(),
  /** Email address; `false` marks a deliberately withheld address. */
  email: z.union([z.string(), z.literal(false)]).optional(),
  /** Permission names granted directly to this person. */
  permissions: z.array(z.string().min(1)).default([]),
});
export type Person = z.infer<typeof Person>;

export type PersonEmail =
  | { state: "present"; address: string }
  | { state: "missing" }
  | { state: "disabled" };

export function personEmail(person: Person): PersonEmail {
  if (person.email === false) return { state: "disabled" };
  if (person.email === undefined) return { state: "missing" };
  return { state: "present", address: person.email };
}

export function hasDirectPermission(person: Person, permission: string): boolean {
  return person.permissions.includes(permission);
}

export function hasAnyPermission(person: Person): boolean {
  return person.permissions.length > 0;
}
