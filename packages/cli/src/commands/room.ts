import { Command } from "commander";
import { getContext } from "../lib/context.js";
import { exitWithError } from "../lib/errors.js";
import { outputSuccess } from "../lib/json-output.js";
import { parseNumberOption } from "../lib/parse.js";

interface RoomAddOptions {
  area?: string;
  floor?: string;
  exposure?: string;
  floorType?: string;
  json?: boolean;
}

export const roomCommand = new Command("room").description("Manage rooms");

roomCommand
  .command("add")
  .description("Add a room")
  .argument("<name>", "Room name")
  .option("--area <m2>", "Floor area in square metres")
  .option("--floor <floor>", "Storey, e.g. ground or first")
  .option("--exposure <exposure>", "Sun exposure, e.g. south")
  .option("--floor-type <type>", "Floor covering, e.g. tiles or parquet")
  .option("-j, --json", "Output as JSON")
  .action((name: string, options: RoomAddOptions) => {
    const json = options.json;
    try {
      const { householdService } = getContext();
      const room = householdService.addRoom({
        name,
        areaM2: options.area !== undefined ? parseNumberOption(options.area, "Area") : null,
        floor: options.floor ?? null,
        exposure: options.exposure ?? null,
        floorType: options.floorType ?? null,
      });

      if (json) {
        outputSuccess(room);
        return;
      }
      console.log(`Added room [${room.id.slice(0, 8)}] "${room.name}"`);
    } catch (error) {
      exitWithError(error, json);
    }
  });

roomCommand
  .command("list")
  .description("List rooms")
  .option("-j, --json", "Output as JSON")
  .action((options: { json?: boolean }) => {
    const json = options.json;
    try {
      const { householdService, taskService } = getContext();
      const rooms = householdService.listRooms();

      if (json) {
        outputSuccess(rooms);
        return;
      }

      if (rooms.length === 0) {
        console.log("No rooms yet. Add one with 'hearth room add <name>'.");
        return;
      }

      for (const room of rooms) {
        const count = taskService.listTasks({ roomId: room.id }).length;
        const details = [room.floor, room.exposure, room.areaM2 !== null ? `${room.areaM2} m2` : null]
          .filter((d) => d !== null)
          .join(", ");
        console.log(`  ${room.name} (${count} task${count === 1 ? "" : "s"})${details ? `  ${details}` : ""}`);
      }
    } catch (error) {
      exitWithError(error, json);
    }
  });
