import { type Config, OpenMeteoProvider, type WeatherSummary } from "@hearth/core";

/**
 * Today's forecast for the household, or null when weather is disabled,
 * the household has no coordinates, or the provider failed.
 */
export async function fetchHouseholdWeather(
  config: Config,
  options: { enabled?: boolean } = {},
): Promise<WeatherSummary | null> {
  const { latitude, longitude, timeZone } = config.household;
  if (options.enabled === false || !config.weather.enabled) return null;
  if (latitude === null || longitude === null) return null;

  const provider = new OpenMeteoProvider({ timeZone, timeoutMs: config.weather.timeoutMs });
  return provider.fetchDailySummary(latitude, longitude);
}
