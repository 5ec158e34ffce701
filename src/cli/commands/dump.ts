/**
 * dump-team / dump-list / dump-permission: print derived views of the data.
 */

import type { Command } from "commander";
import type { Data, MailingList, Permission } from "../../data/data.js";
import { describeKind } from "../../schemas/team.js";
import { errorMessage } from "../../validate/error-log.js";
import { loadOrReport } from "../load.js";

const fmtList = (values: readonly (string | number)[]) => (values.length === 0 ? "-" : values.join(", "));

export function dumpTeam(data: Data, name: string): void {
  const archived = data.archivedTeams().find(t => t.name === name);
  const team = data.team(name) ?? archived;
  if (!team) {
    console.error(`❌ Team not found: ${name}`);
    process.exitCode = 1;
    return;
  }

  try {
    console.log(`${team.name} (${describeKind(team.kind)}${team === archived ? ", archived" : ""})`);
    console.log(`  parent: ${team.subteamOf ?? "-"}`);
    console.log(`  leads: ${fmtList(team.people.leads)}`);
    console.log(`  members: ${fmtList([...data.effectiveMembers(team)].sort())}`);
    console.log(`  alumni: ${fmtList(team.people.alumni)}`);
    for (const gh of data.githubTeams(team)) {
      console.log(`  github: ${gh.org}/${gh.name} (${gh.members.length} members)`);
    }
  } catch (err) {
    console.error(`❌ ${errorMessage(err)}`);
    process.exitCode = 1;
  }
}

export function dumpList(data: Data, address: string): void {
  let list: MailingList | undefined;
  try {
    list = data.allLists().get(address);
  } catch (err) {
    console.error(`❌ ${errorMessage(err)}`);
    process.exitCode = 1;
    return;
  }
  if (!list) {
    console.error(`❌ List not found: ${address}`);
    process.exitCode = 1;
    return;
  }

  console.log(`${list.address} (${list.people.length} people)`);
  for (const handle of list.people) {
    console.log(`  ${handle}`);
  }
}

export function dumpPermission(data: Data, name: string): void {
  let permission: Permission | undefined;
  try {
    permission = data.permission(name);
  } catch (err) {
    console.error(`❌ ${errorMessage(err)}`);
    process.exitCode = 1;
    return;
  }
  if (!permission) {
    console.error(`❌ Unknown permission: ${name}`);
    process.exitCode = 1;
    return;
  }

  console.log(`${permission.name}:`);
  console.log(`  github users: ${fmtList(permission.githubUsers)}`);
  console.log(`  github ids: ${fmtList(permission.githubIds)}`);
  console.log(`  discord ids: ${fmtList(permission.discordIds)}`);
}

export function registerDumpCommands(program: Command): void {
  const dataDir = () => program.opts<{ data: string }>().data;

  program
    .command("dump-team <name>")
    .description("Show a team's kind, parent, people and GitHub teams")
    .action(async (name: string) => {
      const data = await loadOrReport(dataDir());
      if (data) dumpTeam(data, name);
    });

  program
    .command("dump-list <address>")
    .description("Show the resolved members of a mailing list")
    .action(async (address: string) => {
      const data = await loadOrReport(dataDir());
      if (data) dumpList(data, address);
    });

  program
    .command("dump-permission <name>")
    .description("Show who holds a permission")
    .action(async (name: string) => {
      const data = await loadOrReport(dataDir());
      if (data) dumpPermission(data, name);
    });
}
