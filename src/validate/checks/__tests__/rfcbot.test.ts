import { describe, it, expect } from "vitest";
import type { Data } from "../../../data/data.js";
import { buildData, team } from "../../../testing/fixtures.js";
import { ErrorLog } from "../../error-log.js";
import { validateRfcbotExcludeMembers, validateRfcbotLabels } from "../rfcbot.js";

function run(check: (data: Data, log: ErrorLog) => void, data: Data): string[] {
  const log = new ErrorLog();
  check(data, log);
  return log.finalize();
}

describe("rfcbot", () => {
  const rfcbot = (label: string, excludeMembers: string[] = []) => ({
    label,
    name: "Team",
    ping: "org/team",
    excludeMembers,
  });

  it("rejects duplicate labels", () => {
    const data = buildData({
      teams: [
        team("lang", { rfcbot: rfcbot("T-lang") }),
        team("lang-mirror", { rfcbot: rfcbot("T-lang") }),
        team("libs", { rfcbot: rfcbot("T-libs") }),
      ],
    });
    expect(run(validateRfcbotLabels, data)).toEqual(["duplicate rfcbot label: T-lang"]);
  });

  it("rejects duplicate and non-member exclusions", () => {
    const data = buildData({
      teams: [team("lang", { people: { members: ["alice"] }, rfcbot: rfcbot("T-lang", ["alice", "alice", "zed"]) })],
    });
    expect(run(validateRfcbotExcludeMembers, data)).toEqual([
      "duplicate member in `lang` rfcbot.excludeMembers: alice",
      "person `zed` is not a member of team `lang` (in rfcbot.excludeMembers)",
    ]);
  });
});
