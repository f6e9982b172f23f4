import { readFileSync } from "node:fs";
import { Command } from "commander";
import { getContext } from "../lib/context.js";
import { exitWithError } from "../lib/errors.js";
import { outputError, outputSuccess } from "../lib/json-output.js";

export const importCommand = new Command("import")
  .description("Import rooms and tasks from a markdown catalog")
  .argument("<file>", "Markdown file to import")
  .option("-d, --dry-run", "Preview import without writing anything")
  .option("-j, --json", "Output as JSON")
  .action((file: string, options: { dryRun?: boolean; json?: boolean }) => {
    const json = options.json;
    try {
      const { catalogService } = getContext();
      const parseResult = catalogService.parse(readFileSync(file, "utf-8"));

      if (parseResult.errors.length > 0) {
        if (json) {
          outputError(1, `Parse errors: ${parseResult.errors.join(", ")}`);
        }
        console.error("Parse errors:");
        for (const error of parseResult.errors) {
          console.error(`  - ${error}`);
        }
        process.exit(1);
      }

      if (options.dryRun) {
        const taskCount = parseResult.rooms.reduce((sum, room) => sum + room.tasks.length, 0);
        if (json) {
          outputSuccess({
            dryRun: true,
            wouldImport: taskCount,
            rooms: parseResult.rooms.map((r) => ({ name: r.name, tasks: r.tasks.length })),
          });
        } else {
          console.log(`Dry run: would import ${taskCount} tasks`);
          for (const room of parseResult.rooms) {
            console.log(`  ${room.name}: ${room.tasks.length} tasks`);
          }
        }
        return;
      }

      const summary = catalogService.importCatalog(parseResult);

      if (json) {
        outputSuccess(summary);
      } else {
        console.log(
          `Imported ${summary.tasksCreated} new and ${summary.tasksUpdated} updated tasks (${summary.roomsCreated} new rooms)`,
        );
      }
    } catch (error) {
      exitWithError(error, json);
    }
  });
