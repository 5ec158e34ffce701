/**
 * Tests for the validation runner: tiers, strict mode, skipping and
 * aggregation.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Team } from "../../schemas/team.js";
import { FakeGitHub, FakeZulip, RecordingLogger, zulipUsers } from "../../testing/fakes.js";
import { buildData, config, person, team } from "../../testing/fixtures.js";
import { GITHUB_CHECKS, LOCAL_CHECKS, ZULIP_CHECKS } from "../registry.js";
import { collectViolations, validate, ValidationFailedError } from "../runner.js";

const people = () => [person("alice", { githubId: 1, zulipId: 1 }), person("bob", { githubId: 2, zulipId: 2 })];

const core = () =>
  team("core", {
    people: { leads: ["alice"], members: ["alice", "bob"] },
    github: { orgs: ["example-org"] },
    lists: [{ address: "core@lists.example.org" }],
    zulipGroups: [{ name: "T-core" }],
  });

describe("validation runner", () => {
  let logger: RecordingLogger;
  let github: FakeGitHub;
  let zulip: FakeZulip;

  beforeEach(() => {
    logger = new RecordingLogger();
    github = new FakeGitHub({ logins: [[1, "alice"], [2, "bob"]] });
    zulip = new FakeZulip({ users: zulipUsers(1, 2) });
  });

  it("passes clean data through every tier", async () => {
    const data = buildData({ people: people(), teams: [core()] });
    await validate(data, { github, zulip, logger });
    expect(logger.errors).toEqual([]);
    expect(logger.warnings).toEqual([]);
    expect(github.queried).toEqual([[1, 2]]);
    expect(zulip.authProbes).toBe(1);
  });

  it("logs each violation and rejects with the count", async () => {
    const data = buildData({
      people: people(),
      teams: [core(), team("ops", { people: { members: ["alice", "ghost"] } })],
    });
    const run = validate(data, { github, zulip, logger });
    await expect(run).rejects.toBeInstanceOf(ValidationFailedError);
    await expect(run).rejects.toMatchObject({ count: 1, message: "1 validation errors found" });
    expect(logger.errors).toEqual(["validation error: person `ghost` is member of team `ops` but doesn't exist"]);
  });

  describe("directory availability", () => {
    const data = () => buildData({ people: people(), teams: [core()] });

    it("warns and skips the GitHub tier when not strict", async () => {
      github = new FakeGitHub({ authError: new Error("missing environment variable GITHUB_TOKEN") });
      expect(await collectViolations(data(), { github, zulip, logger })).toEqual([]);
      expect(logger.warnings).toEqual([
        "couldn't perform checks relying on the GitHub API, some errors will not be detected",
        "cause: missing environment variable GITHUB_TOKEN",
      ]);
      expect(github.queried).toEqual([]);
      expect(zulip.authProbes).toBe(1);
    });

    it("aborts before later tiers when strict", async () => {
      github = new FakeGitHub({ authError: new Error("missing environment variable GITHUB_TOKEN") });
      await expect(validate(data(), { strict: true, github, zulip, logger })).rejects.toThrow(
        "missing environment variable GITHUB_TOKEN",
      );
      expect(zulip.authProbes).toBe(0);
      expect(logger.errors).toEqual([]);
    });

    it("never treats Zulip as fatal", async () => {
      zulip = new FakeZulip({ authError: new Error("missing environment variables: ZULIP_SITE") });
      await validate(data(), { strict: true, github, zulip, logger });
      expect(logger.warnings).toEqual([
        "couldn't perform checks relying on the Zulip API, some errors will not be detected",
        "cause: missing environment variables: ZULIP_SITE",
      ]);
    });
  });

  it("skips checks by name and warns about unknown names", async () => {
    const data = buildData({
      people: people(),
      teams: [core(), team("ops", { people: { members: ["alice", "ghost"] } })],
    });
    const errors = await collectViolations(data, {
      skip: ["team-members", "no-such-check"],
      github,
      zulip,
      logger,
    });
    expect(errors).toEqual([]);
    expect(logger.warnings).toEqual(["unknown check in skip list: no-such-check", "skipped check: team-members"]);
  });

  it("records a check that throws and keeps running the rest", async () => {
    const errors = await collectViolations(buildData(), {
      github,
      zulip,
      logger,
      tiers: {
        local: [
          {
            name: "boom",
            run: () => {
              throw new Error("kaput");
            },
          },
          { name: "after", run: (_data, log) => log.push("after ran") },
        ],
        github: [],
        zulip: [],
      },
    });
    expect(errors).toEqual(["after ran", "check `boom` failed: kaput"]);
  });

  it("reports a root cause found by several checks once", async () => {
    const data = buildData({ teams: [team("core", { people: { includeTeamMembers: ["ghost"] } })] });
    expect(await collectViolations(data, { github, zulip, logger })).toEqual([
      "team `core` includes the members of team `ghost`, which doesn't exist",
    ]);
  });

  it("gives the same result for any check order and across runs", async () => {
    const data = buildData({
      config: config({ permissionsBools: ["perf"] }),
      people: [...people(), person("carol", { email: undefined, permissions: ["perf", "nope"] })],
      teams: [
        core(),
        team("bar", { kind: "working-group", people: { members: ["carol", "ghost"] }, permissions: ["perf"] }),
        team("x", { subteamOf: "y", lists: [{ address: "x@elsewhere.net", extraPeople: ["ghost"] }] }),
        team("y", { subteamOf: "x" }),
      ],
    });
    const shuffled = {
      local: [...LOCAL_CHECKS].reverse(),
      github: GITHUB_CHECKS,
      zulip: ZULIP_CHECKS,
    };

    const first = await collectViolations(data, { github, zulip, logger });
    const second = await collectViolations(data, { github, zulip, logger });
    const reordered = await collectViolations(data, { github, zulip, logger, tiers: shuffled });

    expect(first.length).toBeGreaterThan(5);
    expect(second).toEqual(first);
    expect(reordered).toEqual(first);
    expect([...first].sort()).toEqual(first);
    expect(new Set(first).size).toBe(first.length);
  });

  it("reports duplicate permissions once per triple whatever the team order", async () => {
    const teams = (): Team[] => [
      team("infra", { people: { members: ["alice", "bob"] }, permissions: ["perf"] }),
      team("release", { people: { members: ["alice"] }, permissions: ["perf"] }),
    ];
    const input = {
      config: config({ permissionsBools: ["perf"] }),
      people: [person("alice", { permissions: ["perf"] }), person("bob")],
    };
    const forward = await collectViolations(buildData({ ...input, teams: teams() }), { github, zulip, logger });
    const backward = await collectViolations(buildData({ ...input, teams: teams().reverse() }), {
      github,
      zulip,
      logger,
    });
    expect(forward).toEqual([
      "user `alice` has the permission `perf` both explicitly and through the `infra` team",
      "user `alice` has the permission `perf` both explicitly and through the `release` team",
    ]);
    expect(backward).toEqual(forward);
  });

  it("flags only the working group missing its prefix", async () => {
    const data = buildData({
      teams: [team("wg-foo", { kind: "working-group" }), team("bar", { kind: "working-group" })],
    });
    expect(await collectViolations(data, { github, zulip, logger })).toEqual([
      "working group `bar`'s name doesn't start with `wg-`",
    ]);
  });

  it("flags a project group nested under a subteam only", async () => {
    const data = buildData({
      teams: [
        team("lang"),
        team("lang-ops", { subteamOf: "lang" }),
        team("project-deep", { kind: "project-group", subteamOf: "lang-ops" }),
        team("project-shallow", { kind: "project-group", subteamOf: "lang" }),
      ],
    });
    expect(await collectViolations(data, { github, zulip, logger })).toEqual([
      "project group `project-deep` can't be a subteam of a subteam (`lang-ops`)",
    ]);
  });

  describe("orphaned people", () => {
    const orphan =
      "person `alice` is not a member of any team (active or archived), has no permissions, and is not an individual contributor to any repo";

    it("reports a person nothing refers to until they hold a permission", async () => {
      const without = buildData({ people: [person("alice")] });
      expect(await collectViolations(without, { github, zulip, logger })).toEqual([orphan]);

      const withPermission = buildData({
        config: config({ permissionsBools: ["perf"] }),
        people: [person("alice", { permissions: ["perf"] })],
      });
      expect(await collectViolations(withPermission, { github, zulip, logger })).toEqual([]);
    });

    it("counts archived team membership as a reference", async () => {
      const data = buildData({
        people: [person("alice")],
        archivedTeams: [team("core", { people: { members: ["alice"] } })],
      });
      expect(await collectViolations(data, { github, zulip, logger })).toEqual([]);
    });
  });

  it("reports Zulip group members missing from the directory", async () => {
    zulip = new FakeZulip({ users: zulipUsers(1) });
    const data = buildData({ people: people(), teams: [core()] });
    expect(await collectViolations(data, { github, zulip, logger })).toEqual([
      'the "T-core" Zulip group includes members who don\'t appear on Zulip: bob',
    ]);
  });

  it("reports renamed GitHub accounts", async () => {
    github = new FakeGitHub({ logins: [[1, "alice"], [2, "bobby"]] });
    const data = buildData({ people: people(), teams: [core()] });
    expect(await collectViolations(data, { github, zulip, logger })).toEqual([
      "user `bob` changed username to `bobby`",
    ]);
  });
});
