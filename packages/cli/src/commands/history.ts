import { Command } from "commander";
import { getContext } from "../lib/context.js";
import { exitWithError } from "../lib/errors.js";
import { outputSuccess } from "../lib/json-output.js";
import { parseIntOption } from "../lib/parse.js";

export const historyCommand = new Command("history")
  .description("Show when a task was done")
  .argument("<task>", "Task id or Room/Task name")
  .option("-l, --limit <n>", "Max entries", "20")
  .option("-j, --json", "Output as JSON")
  .action((ref: string, options: { limit: string; json?: boolean }) => {
    const json = options.json;
    try {
      const { taskService } = getContext();
      const task = taskService.resolveTask(ref);
      const entries = taskService.getHistory(task.id, parseIntOption(options.limit, "Limit"));

      if (json) {
        outputSuccess({ task: { id: task.id, room: task.roomName, name: task.name }, entries });
        return;
      }

      console.log(`\n  History for ${task.roomName}/${task.name}\n`);
      if (entries.length === 0) {
        console.log("  Never done.");
      }
      for (const entry of entries) {
        const time = entry.completedAt.toISOString().slice(0, 16).replace("T", " ");
        const by = entry.performer ? ` by ${entry.performer}` : "";
        const comment = entry.comment ? `  "${entry.comment}"` : "";
        console.log(`  ${time}${by}${comment}`);
      }
      console.log();
    } catch (error) {
      exitWithError(error, json);
    }
  });
