import { existsSync, mkdirSync } from "node:fs";
import {
  type Config,
  createDb,
  DEFAULT_CONFIG,
  ExitCode,
  HearthError,
  parseConfig,
  saveConfig,
} from "@hearth/core";
import { Command } from "commander";
import { getPaths } from "../lib/context.js";
import { exitWithError } from "../lib/errors.js";
import { parseNumberOption } from "../lib/parse.js";

interface InitOptions {
  name: string;
  city?: string;
  lat?: string;
  lon?: string;
  timezone?: string;
}

export const initCommand = new Command("init")
  .description("Set up a new household in the current directory")
  .option("-n, --name <name>", "Household name", DEFAULT_CONFIG.household.name)
  .option("--city <city>", "City, for display")
  .option("--lat <latitude>", "Latitude for the weather forecast")
  .option("--lon <longitude>", "Longitude for the weather forecast")
  .option("--timezone <zone>", "IANA time zone for local days and hours")
  .action((options: InitOptions) => {
    try {
      const { dir, dbPath, configPath } = getPaths();

      if (existsSync(dbPath)) {
        throw new HearthError("Household already exists in this directory", ExitCode.CONFLICT);
      }

      const config: Config = parseConfig({
        ...DEFAULT_CONFIG,
        household: {
          name: options.name,
          city: options.city ?? null,
          latitude: options.lat !== undefined ? parseNumberOption(options.lat, "Latitude") : null,
          longitude: options.lon !== undefined ? parseNumberOption(options.lon, "Longitude") : null,
          timeZone: options.timezone ?? DEFAULT_CONFIG.household.timeZone,
        },
      });

      mkdirSync(dir, { recursive: true });
      saveConfig(configPath, config);
      createDb(dbPath).$close();

      console.log(`Initialized household: ${config.household.name}`);
      console.log(`  Database: ${dbPath}`);
      console.log(`  Config: ${configPath}`);
      console.log(`  Time zone: ${config.household.timeZone}`);
      if (config.household.latitude === null) {
        console.log("  Weather: off until latitude and longitude are set in config.json");
      }
    } catch (error) {
      exitWithError(error);
    }
  });
