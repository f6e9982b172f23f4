import { localDateParts, systemTimeZone } from "./calendar.js";
import type { EnvironmentContext, WeatherSummary } from "./types.js";

export const RAIN_THRESHOLD_MM = 2.0;
export const WIND_THRESHOLD_KMH = 50.0;
export const FREEZE_THRESHOLD_C = 2.0;

export interface BuildContextOptions {
  /** IANA zone for the local calendar fields. Defaults to the system zone. */
  timeZone?: string;
}

function describeWeather(weather: WeatherSummary | null | undefined): string {
  if (!weather) return "no weather data";

  const parts: string[] = [];
  if (weather.minTempC != null) parts.push(`min ${weather.minTempC}°C`);
  if (weather.maxTempC != null) parts.push(`max ${weather.maxTempC}°C`);
  if (weather.maxWindKmh != null) parts.push(`wind ${weather.maxWindKmh} km/h`);
  if (weather.precipitationMm != null) parts.push(`rain ${weather.precipitationMm} mm`);

  return parts.length > 0 ? parts.join(", ") : "no weather data";
}

/**
 * Missing weather, or any missing field, reads as fair weather so a
 * provider outage never blocks ranking.
 */
export function buildContext(
  now: Date,
  weather: WeatherSummary | null | undefined,
  options: BuildContextOptions = {},
): EnvironmentContext {
  const local = localDateParts(now, options.timeZone ?? systemTimeZone());

  const precipitation = weather?.precipitationMm ?? 0;
  const wind = weather?.maxWindKmh ?? 0;
  const minTemp = weather?.minTempC;

  return {
    isRaining: precipitation > RAIN_THRESHOLD_MM,
    isWindy: wind > WIND_THRESHOLD_KMH,
    isFreezing: minTemp != null && minTemp < FREEZE_THRESHOLD_C,
    weatherText: describeWeather(weather),
    weekdayIndex: local.weekdayIndex,
    hourOfDay: local.hour,
    month: local.month,
  };
}
