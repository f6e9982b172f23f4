import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { loadConfig, parseConfig, saveConfig } from "./config.js";
import { DEFAULT_CONFIG, ExitCode, HearthError } from "./types.js";

describe("parseConfig", () => {
  test("fills every gap from the defaults", () => {
    expect(parseConfig({})).toEqual(DEFAULT_CONFIG);
  });

  test("keeps provided values", () => {
    const config = parseConfig({
      household: { name: "Cottage", latitude: 48.85, longitude: 2.35, timeZone: "Europe/Paris" },
      ranking: { auditLimit: 5 },
    });

    expect(config.household).toEqual({
      name: "Cottage",
      city: null,
      latitude: 48.85,
      longitude: 2.35,
      timeZone: "Europe/Paris",
    });
    expect(config.ranking.auditLimit).toBe(5);
    expect(config.weather).toEqual(DEFAULT_CONFIG.weather);
  });

  test("rejects a lone coordinate", () => {
    expect(() => parseConfig({ household: { latitude: 10 } })).toThrow(
      "Config needs both latitude and longitude, or neither",
    );
  });

  test("rejects values of the wrong type", () => {
    expect(() => parseConfig({ ranking: { auditLimit: "ten" } })).toThrow(
      "Config value 'auditLimit' has the wrong type",
    );
    expect(() => parseConfig({ weather: true })).toThrow("Config 'weather' must be an object");
  });

  test("rejects an unknown time zone", () => {
    expect(() => parseConfig({ household: { timeZone: "Mars/Olympus" } })).toThrow(
      "Unknown time zone 'Mars/Olympus'",
    );
  });
});

describe("loadConfig", () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), "hearth-config-"));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  test("falls back to defaults when the file is missing", () => {
    expect(loadConfig(join(testDir, "config.json"), { env: {} })).toEqual(DEFAULT_CONFIG);
  });

  test("reads back what was saved", () => {
    const path = join(testDir, "config.json");
    const config = parseConfig({ household: { name: "Flat", city: "Lyon" } });

    saveConfig(path, config);

    expect(loadConfig(path, { env: {} })).toEqual(config);
  });

  test("environment overrides the file", () => {
    const path = join(testDir, "config.json");
    saveConfig(path, parseConfig({ household: { timeZone: "UTC" } }));

    const config = loadConfig(path, {
      env: { HEARTH_TIMEZONE: "Asia/Tokyo", HEARTH_NO_WEATHER: "true" },
    });

    expect(config.household.timeZone).toBe("Asia/Tokyo");
    expect(config.weather.enabled).toBe(false);
  });

  test("reports malformed JSON as a validation error", () => {
    const path = join(testDir, "config.json");
    writeFileSync(path, "{ not json");

    let caught: unknown;
    try {
      loadConfig(path, { env: {} });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(HearthError);
    expect(caught instanceof HearthError && caught.code).toBe(ExitCode.VALIDATION);
  });
});
