import { buildContext, suggestAlerts } from "@hearth/core";
import { Command } from "commander";
import { getContext } from "../lib/context.js";
import { exitWithError } from "../lib/errors.js";
import { outputSuccess } from "../lib/json-output.js";
import { fetchHouseholdWeather } from "../lib/weather.js";

export const weatherCommand = new Command("weather")
  .description("Show today's forecast and household weather alerts")
  .option("-j, --json", "Output as JSON")
  .action(async (options: { json?: boolean }) => {
    const json = options.json;
    try {
      const { config } = getContext();
      const summary = await fetchHouseholdWeather(config);
      const ctx = buildContext(new Date(), summary, { timeZone: config.household.timeZone });
      const alerts = suggestAlerts(summary);

      if (json) {
        outputSuccess({
          summary,
          raining: ctx.isRaining,
          windy: ctx.isWindy,
          freezing: ctx.isFreezing,
          alerts,
        });
        return;
      }

      const place = config.household.city ?? config.household.name;
      console.log(`\n  ${place}: ${ctx.weatherText}\n`);
      if (alerts.length === 0) {
        console.log("  No alerts.");
      }
      for (const alert of alerts) {
        console.log(`  ! ${alert.message}`);
      }
      console.log();
    } catch (error) {
      exitWithError(error, json);
    }
  });
