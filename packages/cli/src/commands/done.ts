import { Command } from "commander";
import { getContext } from "../lib/context.js";
import { exitWithError } from "../lib/errors.js";
import { outputSuccess } from "../lib/json-output.js";
import { parseInstant } from "../lib/parse.js";

interface DoneOptions {
  by?: string;
  comment?: string;
  at?: string;
  json?: boolean;
}

export const doneCommand = new Command("done")
  .description("Record that a task was done")
  .argument("<task>", "Task id or Room/Task name")
  .option("-b, --by <member>", "Who did it")
  .option("-m, --comment <text>", "Comment for the history")
  .option("--at <iso>", "When it was done (default: now)")
  .option("-j, --json", "Output as JSON")
  .action((ref: string, options: DoneOptions) => {
    const json = options.json;
    try {
      const { taskService } = getContext();
      const task = taskService.resolveTask(ref);
      const completion = taskService.recordCompletion(task.id, {
        performer: options.by,
        comment: options.comment,
        at: options.at !== undefined ? parseInstant(options.at) : undefined,
      });
      const after = taskService.resolveTask(task.id);

      if (json) {
        outputSuccess({ completion, task: after });
        return;
      }

      console.log(`Done: ${task.roomName}/${task.name}`);
      if (options.by && completion.performer === null) {
        console.log(`  Note: '${options.by}' is not a household member, recorded without a performer`);
      }
      if (task.active && !after.active) {
        console.log("  One-off task is now asleep. Wake it with 'hearth wake'.");
      }
    } catch (error) {
      exitWithError(error, json);
    }
  });
