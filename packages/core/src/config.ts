import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { type Config, DEFAULT_CONFIG, ExitCode, HearthError } from "./types.js";
import { validateCoordinates, validateLimit, validateTimeZone } from "./validation.js";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readSection(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const section = raw[key];
  if (section === undefined) return {};
  if (!isRecord(section)) {
    throw new HearthError(`Config '${key}' must be an object`, ExitCode.VALIDATION);
  }
  return section;
}

function pick<T>(
  section: Record<string, unknown>,
  key: string,
  fallback: T,
  accept: (value: unknown) => value is T,
): T {
  const value = section[key];
  if (value === undefined) return fallback;
  if (!accept(value)) {
    throw new HearthError(`Config value '${key}' has the wrong type`, ExitCode.VALIDATION);
  }
  return value;
}

const isString = (v: unknown): v is string => typeof v === "string";
const isNumber = (v: unknown): v is number => typeof v === "number";
const isBoolean = (v: unknown): v is boolean => typeof v === "boolean";
const isNullableString = (v: unknown): v is string | null => v === null || typeof v === "string";
const isNullableNumber = (v: unknown): v is number | null => v === null || typeof v === "number";

/**
 * Merge a parsed config object over the defaults, checking every field.
 */
export function parseConfig(raw: unknown): Config {
  if (!isRecord(raw)) {
    throw new HearthError("Config must be a JSON object", ExitCode.VALIDATION);
  }

  const household = readSection(raw, "household");
  const ranking = readSection(raw, "ranking");
  const weather = readSection(raw, "weather");
  const defaults = DEFAULT_CONFIG;

  const config: Config = {
    household: {
      name: pick(household, "name", defaults.household.name, isString),
      city: pick(household, "city", defaults.household.city, isNullableString),
      latitude: pick(household, "latitude", defaults.household.latitude, isNullableNumber),
      longitude: pick(household, "longitude", defaults.household.longitude, isNullableNumber),
      timeZone: validateTimeZone(pick(household, "timeZone", defaults.household.timeZone, isString)),
    },
    ranking: {
      auditLimit: validateLimit(pick(ranking, "auditLimit", defaults.ranking.auditLimit, isNumber)),
    },
    weather: {
      enabled: pick(weather, "enabled", defaults.weather.enabled, isBoolean),
      timeoutMs: pick(weather, "timeoutMs", defaults.weather.timeoutMs, isNumber),
    },
  };

  const { latitude, longitude } = config.household;
  if ((latitude === null) !== (longitude === null)) {
    throw new HearthError("Config needs both latitude and longitude, or neither", ExitCode.VALIDATION);
  }
  if (latitude !== null && longitude !== null) {
    validateCoordinates(latitude, longitude);
  }

  return config;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
}

/**
 * Read `config.json`, falling back to the defaults when the file is missing.
 * HEARTH_TIMEZONE and HEARTH_NO_WEATHER override the file.
 */
export function loadConfig(path: string, options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;

  let raw: unknown = {};
  if (existsSync(path)) {
    try {
      raw = JSON.parse(readFileSync(path, "utf-8"));
    } catch (error) {
      throw new HearthError(
        `Invalid config file ${path}: ${error instanceof Error ? error.message : String(error)}`,
        ExitCode.VALIDATION,
      );
    }
  }

  const config = parseConfig(raw);

  if (env.HEARTH_TIMEZONE) {
    config.household.timeZone = validateTimeZone(env.HEARTH_TIMEZONE);
  }
  if (env.HEARTH_NO_WEATHER === "true") {
    config.weather.enabled = false;
  }

  return config;
}

export function saveConfig(path: string, config: Config): void {
  writeFileSync(path, `${JSON.stringify(config, null, 2)}\n`);
}
