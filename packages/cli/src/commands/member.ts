import { Command } from "commander";
import { getContext } from "../lib/context.js";
import { exitWithError } from "../lib/errors.js";
import { outputSuccess } from "../lib/json-output.js";

export const memberCommand = new Command("member").description("Manage household members");

memberCommand
  .command("add")
  .description("Add a household member")
  .argument("<name>", "Display name")
  .option("-j, --json", "Output as JSON")
  .action((name: string, options: { json?: boolean }) => {
    const json = options.json;
    try {
      const { householdService } = getContext();
      const member = householdService.addMember(name);

      if (json) {
        outputSuccess(member);
        return;
      }
      console.log(`Added member "${member.displayName}"`);
    } catch (error) {
      exitWithError(error, json);
    }
  });

memberCommand
  .command("list")
  .description("List household members")
  .option("-j, --json", "Output as JSON")
  .action((options: { json?: boolean }) => {
    const json = options.json;
    try {
      const { householdService } = getContext();
      const members = householdService.listMembers();

      if (json) {
        outputSuccess(members);
        return;
      }
      for (const member of members) {
        console.log(`  ${member.displayName}${member.active ? "" : " (inactive)"}`);
      }
    } catch (error) {
      exitWithError(error, json);
    }
  });
