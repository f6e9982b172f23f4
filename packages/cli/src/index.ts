import { createRequire } from "node:module";
import { Command } from "commander";
import { sleepCommand, wakeCommand } from "./commands/activation.js";
import { doneCommand } from "./commands/done.js";
import { exportCommand } from "./commands/export.js";
import { historyCommand } from "./commands/history.js";
import { importCommand } from "./commands/import.js";
import { initCommand } from "./commands/init.js";
import { memberCommand } from "./commands/member.js";
import { rankCommand } from "./commands/rank.js";
import { roomCommand } from "./commands/room.js";
import { taskCommand } from "./commands/task.js";
import { weatherCommand } from "./commands/weather.js";

const require = createRequire(import.meta.url);
const pkg: { version: string } = require("../package.json");

const program = new Command();

program
  .name("hearth")
  .description("Decide which household chores to do now")
  .version(pkg.version);

program.addCommand(initCommand);
program.addCommand(roomCommand);
program.addCommand(memberCommand);
program.addCommand(taskCommand);
program.addCommand(rankCommand);
program.addCommand(doneCommand);
program.addCommand(wakeCommand);
program.addCommand(sleepCommand);
program.addCommand(historyCommand);
program.addCommand(weatherCommand);
program.addCommand(importCommand);
program.addCommand(exportCommand);

await program.parseAsync();
