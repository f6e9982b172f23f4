import { afterEach, describe, expect, test, vi } from "vitest";
import { OpenMeteoProvider, suggestAlerts } from "./weather.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("OpenMeteoProvider", () => {
  const logger = { warn: vi.fn() };

  afterEach(() => {
    vi.unstubAllGlobals();
    logger.warn.mockReset();
  });

  test("builds a one-day forecast request", () => {
    const provider = new OpenMeteoProvider({ timeZone: "Europe/Paris" });

    const url = new URL(provider.buildUrl(48.85, 2.35));

    expect(url.origin + url.pathname).toBe("https://api.open-meteo.com/v1/forecast");
    expect(url.searchParams.get("latitude")).toBe("48.85");
    expect(url.searchParams.get("longitude")).toBe("2.35");
    expect(url.searchParams.get("forecast_days")).toBe("1");
    expect(url.searchParams.get("timezone")).toBe("Europe/Paris");
    expect(url.searchParams.get("daily")).toBe(
      "temperature_2m_min,temperature_2m_max,windspeed_10m_max,precipitation_sum",
    );
  });

  test("maps the first daily value of each field", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        jsonResponse({
          daily: {
            temperature_2m_min: [1.5],
            temperature_2m_max: [9.2],
            windspeed_10m_max: [35],
            precipitation_sum: [4.1],
          },
        }),
      ),
    );
    const provider = new OpenMeteoProvider({ logger });

    const summary = await provider.fetchDailySummary(48.85, 2.35);

    expect(summary).toEqual({ minTempC: 1.5, maxTempC: 9.2, maxWindKmh: 35, precipitationMm: 4.1 });
    expect(logger.warn).not.toHaveBeenCalled();
  });

  test("missing fields come back as null", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => jsonResponse({ daily: { temperature_2m_min: [null], precipitation_sum: [] } })),
    );
    const provider = new OpenMeteoProvider({ logger });

    const summary = await provider.fetchDailySummary(0, 0);

    expect(summary).toEqual({ minTempC: null, maxTempC: null, maxWindKmh: null, precipitationMm: null });
  });

  test("an HTTP error resolves to null", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ error: true }, 503)));
    const provider = new OpenMeteoProvider({ logger });

    await expect(provider.fetchDailySummary(0, 0)).resolves.toBeNull();
    expect(logger.warn).toHaveBeenCalledWith("Weather unavailable: HTTP 503");
  });

  test("a network failure resolves to null", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new Error("getaddrinfo ENOTFOUND");
      }),
    );
    const provider = new OpenMeteoProvider({ logger });

    await expect(provider.fetchDailySummary(0, 0)).resolves.toBeNull();
    expect(logger.warn).toHaveBeenCalledWith("Weather unavailable: getaddrinfo ENOTFOUND");
  });

  test("a body without a daily section resolves to null", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ hourly: {} })));
    const provider = new OpenMeteoProvider({ logger });

    await expect(provider.fetchDailySummary(0, 0)).resolves.toBeNull();
    expect(logger.warn).toHaveBeenCalledWith("Weather unavailable: response has no daily forecast");
  });
});

describe("suggestAlerts", () => {
  test("no forecast means no alerts", () => {
    expect(suggestAlerts(null)).toEqual([]);
  });

  test("mild weather raises nothing", () => {
    expect(
      suggestAlerts({ minTempC: 8, maxTempC: 20, maxWindKmh: 30, precipitationMm: 2 }),
    ).toEqual([]);
  });

  test("thresholds are inclusive", () => {
    const alerts = suggestAlerts({ minTempC: 0, maxTempC: 28, maxWindKmh: 60, precipitationMm: 10 });

    expect(alerts.map((a) => a.code)).toEqual(["frost", "wind", "rain", "heat"]);
    expect(alerts[0]?.message).toBe("Bring in or protect frost-sensitive plants.");
  });
});
