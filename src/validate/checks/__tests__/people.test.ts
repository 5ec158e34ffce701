import { describe, it, expect } from "vitest";
import type { Data } from "../../../data/data.js";
import { buildData, config, person, repo, team } from "../../../testing/fixtures.js";
import { ErrorLog } from "../../error-log.js";
import { validateAlumni, validateInactiveMembers, validatePeopleAddresses } from "../people.js";

function run(check: (data: Data, log: ErrorLog) => void, data: Data): string[] {
  const log = new ErrorLog();
  check(data, log);
  return log.finalize();
}

const alumniTeam = (members: string[] = []) =>
  team("alumni", { people: { includeAllAlumni: true, members } });

describe("validateAlumni", () => {
  it("rejects an alumnus who is still active", () => {
    const data = buildData({
      teams: [team("core", { people: { members: ["alice"] } }), team("infra", { people: { alumni: ["alice"] } }), alumniTeam()],
    });
    expect(run(validateAlumni, data)).toEqual(["alumni team includes active member 'alice'"]);
  });

  it("rejects explicit alumni entries already recorded elsewhere", () => {
    const data = buildData({
      teams: [team("core", { people: { alumni: ["bob"] } }), alumniTeam(["bob", "carol"])],
    });
    expect(run(validateAlumni, data)).toEqual([
      "alumni team explicitly includes member 'bob' who was specified as an alumni already in 'core'",
    ]);
  });

  it("reports an explicit entry once even when several teams list it", () => {
    const data = buildData({
      teams: [
        team("core", { people: { alumni: ["bob"] } }),
        team("infra", { people: { alumni: ["bob"] } }),
        alumniTeam(["bob"]),
      ],
    });
    expect(run(validateAlumni, data)).toEqual([
      "alumni team explicitly includes member 'bob' who was specified as an alumni already in 'core'",
    ]);
  });

  it("is a no-op without an alumni team", () => {
    const data = buildData({ teams: [team("core", { people: { members: ["alice"], alumni: ["alice"] } })] });
    expect(run(validateAlumni, data)).toEqual([]);
  });

  it("reports unresolvable active membership once", () => {
    const data = buildData({
      teams: [team("core", { people: { includeTeamMembers: ["ghost"] } }), alumniTeam()],
    });
    expect(run(validateAlumni, data)).toEqual([
      "team `core` includes the members of team `ghost`, which doesn't exist",
    ]);
  });
});

describe("validateInactiveMembers", () => {
  const orphanMessage = (handle: string) =>
    `person \`${handle}\` is not a member of any team (active or archived), has no permissions, and is not an individual contributor to any repo`;

  it("reports people nothing refers to", () => {
    const data = buildData({
      people: [person("alice"), person("bob")],
      teams: [team("core", { people: { members: ["alice"] } })],
    });
    expect(run(validateInactiveMembers, data)).toEqual([orphanMessage("bob")]);
  });

  it("counts alumni, archived teams and list extras as references", () => {
    const data = buildData({
      people: [person("alice"), person("bob"), person("carol")],
      teams: [
        team("core", {
          people: { alumni: ["alice"] },
          lists: [{ address: "core@lists.example.org", extraPeople: ["carol"] }],
        }),
      ],
      archivedTeams: [team("old", { people: { members: ["bob"] } })],
    });
    expect(run(validateInactiveMembers, data)).toEqual([]);
  });

  it("accepts a direct permission instead of a team", () => {
    const data = buildData({
      config: config({ permissionsBools: ["perf"] }),
      people: [person("dave", { permissions: ["perf"] }), person("erin")],
    });
    expect(run(validateInactiveMembers, data)).toEqual([orphanMessage("erin")]);
  });

  it("accepts individual repo access instead of a team", () => {
    const data = buildData({
      people: [person("frank")],
      repos: [repo("widgets", { access: { individuals: { frank: "write" } } })],
    });
    expect(run(validateInactiveMembers, data)).toEqual([]);
  });
});

describe("validatePeopleAddresses", () => {
  it("rejects addresses without @ and ignores missing or disabled ones", () => {
    const data = buildData({
      people: [
        person("alice", { email: "alice.example.com" }),
        person("bob", { email: false }),
        person("carol", { email: undefined }),
        person("dave"),
      ],
    });
    expect(run(validatePeopleAddresses, data)).toEqual(["invalid email address of `alice`: alice.example.com"]);
  });
});
