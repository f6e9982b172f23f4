import { Command } from "commander";
import { getContext } from "../lib/context.js";
import { exitWithError } from "../lib/errors.js";
import { outputSuccess } from "../lib/json-output.js";

function activationCommand(name: string, active: boolean, description: string): Command {
  return new Command(name)
    .description(description)
    .argument("<task>", "Task id or Room/Task name")
    .option("-j, --json", "Output as JSON")
    .action((ref: string, options: { json?: boolean }) => {
      const json = options.json;
      try {
        const { taskService } = getContext();
        const task = taskService.setActive(taskService.resolveTask(ref).id, active);

        if (json) {
          outputSuccess(task);
          return;
        }
        console.log(`${active ? "Woke" : "Put to sleep"}: ${task.roomName}/${task.name}`);
      } catch (error) {
        exitWithError(error, json);
      }
    });
}

export const wakeCommand = activationCommand("wake", true, "Reactivate a sleeping task");
export const sleepCommand = activationCommand("sleep", false, "Hide a task until it is woken");
