import { describe, it, expect } from "vitest";
import { Team, describeKind, githubTeamName, isAggregateTeam } from "../team.js";

describe("Team", () => {
  it("fills defaults for a minimal team", () => {
    const result = Team.safeParse({ name: "compiler" });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.kind).toBe("team");
      expect(result.data.people.leads).toEqual([]);
      expect(result.data.people.includeAllAlumni).toBe(false);
      expect(result.data.lists).toEqual([]);
      expect(result.data.zulipGroups).toEqual([]);
      expect(result.data.discordRoles).toBeUndefined();
    }
  });

  it("defaults list and Zulip group inclusion to the team's members", () => {
    const team = Team.parse({
      name: "compiler",
      lists: [{ address: "compiler@lists.example.org" }],
      zulipGroups: [{ name: "T-compiler" }],
    });
    expect(team.lists[0]?.includeTeamMembers).toBe(true);
    expect(team.zulipGroups[0]?.includeTeamMembers).toBe(true);
    expect(team.zulipGroups[0]?.extraZulipIds).toEqual([]);
  });

  it("rejects an unknown kind", () => {
    const result = Team.safeParse({ name: "x", kind: "committee" });
    expect(result.success).toBe(false);
  });

  it("rejects a GitHub binding without orgs", () => {
    const result = Team.safeParse({ name: "x", github: { orgs: [] } });
    expect(result.success).toBe(false);
  });
});

describe("team helpers", () => {
  it("describes kinds the way messages spell them", () => {
    expect(describeKind("working-group")).toBe("working group");
    expect(describeKind("project-group")).toBe("project group");
    expect(describeKind("marker-team")).toBe("marker team");
    expect(describeKind("team")).toBe("team");
  });

  it("uses teamName for the GitHub team when set", () => {
    expect(githubTeamName(Team.parse({ name: "wg-async", github: { orgs: ["o"] } }))).toBe("wg-async");
    expect(githubTeamName(Team.parse({ name: "wg-async", github: { orgs: ["o"], teamName: "async" } }))).toBe(
      "async",
    );
  });

  it("treats include-all teams as aggregates", () => {
    expect(isAggregateTeam(Team.parse({ name: "all", people: { includeAllTeamMembers: true } }))).toBe(true);
    expect(isAggregateTeam(Team.parse({ name: "alumni", people: { includeAllAlumni: true } }))).toBe(true);
    expect(isAggregateTeam(Team.parse({ name: "leads", people: { includeTeamLeads: true } }))).toBe(false);
  });
});
