/**
 * Team hierarchy walk.
 *
 * Follows `subteamOf` links from a team up to its root, keeping the path
 * visited. Each step either reaches a name not yet on the path or throws,
 * so the walk always terminates.
 */

import type { Team } from "../schemas/team.js";
import { describeKind } from "../schemas/team.js";

export interface HierarchySource {
  team(name: string): Team | undefined;
}

/** Rotate a cycle so it starts at its smallest name. */
function canonicalCycle(cycle: readonly string[]): string[] {
  let start = 0;
  cycle.forEach((name, i) => {
    if (name < (cycle[start] ?? name)) start = i;
  });
  return [...cycle.slice(start), ...cycle.slice(0, start)];
}

/**
 * A parent chain that loops. The message names the cycle only, starting
 * from its smallest team, so every team that walks into the same cycle
 * reports the same text.
 */
export class HierarchyCycleError extends Error {
  readonly cycle: string[];

  constructor(cycle: readonly string[]) {
    const canonical = canonicalCycle(cycle);
    const first = canonical[0] ?? "";
    super(`team \`${first}\` is a subteam of itself: ${[...canonical, first].join(" => ")}`);
    this.name = "HierarchyCycleError";
    this.cycle = canonical;
  }
}

/**
 * Follow the chain from `from` without kind checks and return the cycle it
 * runs into, if any. Nesting errors are only reported on acyclic chains.
 */
function cycleAhead(source: HierarchySource, path: readonly string[], from: Team): string[] | undefined {
  const chain = [...path];
  let next: Team | undefined = from;
  while (next) {
    const loopStart = chain.indexOf(next.name);
    if (loopStart !== -1) return chain.slice(loopStart);
    chain.push(next.name);
    next = next.subteamOf === undefined ? undefined : source.team(next.subteamOf);
  }
  return undefined;
}

/**
 * Names from `team` up to its root, `team` first.
 *
 * Throws on a cycle, on a parent that doesn't exist, and when a team
 * that isn't of kind `team` hangs under a subteam.
 */
export function teamAncestry(source: HierarchySource, team: Team): string[] {
  const visited: string[] = [];
  let current = team;

  while (current.subteamOf !== undefined) {
    const parentName = current.subteamOf;
    visited.push(current.name);

    const loopStart = visited.indexOf(parentName);
    if (loopStart !== -1) {
      throw new HierarchyCycleError(visited.slice(loopStart));
    }

    const parent = source.team(parentName);
    if (!parent) {
      throw new Error(`the parent of team \`${current.name}\` doesn't exist: \`${parentName}\``);
    }

    if (current.kind !== "team" && parent.subteamOf !== undefined) {
      const cycle = cycleAhead(source, visited, parent);
      if (cycle) throw new HierarchyCycleError(cycle);
      throw new Error(
        `${describeKind(current.kind)} \`${current.name}\` can't be a subteam of a subteam (\`${parent.name}\`)`,
      );
    }

    current = parent;
  }

  visited.push(current.name);
  return visited;
}
