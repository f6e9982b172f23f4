import { writeFileSync } from "node:fs";
import { Command } from "commander";
import { getContext } from "../lib/context.js";
import { exitWithError } from "../lib/errors.js";
import { outputSuccess } from "../lib/json-output.js";

interface ExportCommandOptions {
  output?: string;
  ids?: boolean;
  json?: boolean;
}

export const exportCommand = new Command("export")
  .description("Export rooms and tasks to markdown")
  .option("-o, --output <file>", "Output file path (default: stdout)")
  .option("--ids", "Include task ids")
  .option("-j, --json", "Output as JSON")
  .action((options: ExportCommandOptions) => {
    const json = options.json;
    try {
      const { config, catalogService, taskService } = getContext();
      const markdown = catalogService.exportCatalog(config.household.name, { includeIds: options.ids });
      const count = taskService.listTasks().length;

      if (options.output) {
        writeFileSync(options.output, markdown);
        if (json) {
          outputSuccess({ file: options.output, tasks: count });
        } else {
          console.log(`Exported ${count} tasks to ${options.output}`);
        }
      } else if (json) {
        outputSuccess({ markdown, tasks: count });
      } else {
        process.stdout.write(markdown);
      }
    } catch (error) {
      exitWithError(error, json);
    }
  });
