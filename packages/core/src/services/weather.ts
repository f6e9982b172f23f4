import type { WeatherSummary } from "./eligibility/types.js";

export interface WeatherProvider {
  /** Resolves to null, never rejects, when the forecast is unavailable. */
  fetchDailySummary(latitude: number, longitude: number): Promise<WeatherSummary | null>;
}

export interface Logger {
  warn(message: string): void;
}

export interface OpenMeteoOptions {
  timeZone?: string;
  timeoutMs?: number;
  baseUrl?: string;
  logger?: Logger;
}

const DEFAULT_BASE_URL = "https://api.open-meteo.com/v1/forecast";
const DAILY_FIELDS = [
  "temperature_2m_min",
  "temperature_2m_max",
  "windspeed_10m_max",
  "precipitation_sum",
] as const;

function firstNumber(daily: Record<string, unknown>, field: string): number | null {
  const values = daily[field];
  if (!Array.isArray(values)) return null;
  const [first] = values;
  return typeof first === "number" && Number.isFinite(first) ? first : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Today's forecast from Open-Meteo. Network errors, timeouts, HTTP errors and
 * malformed bodies all resolve to null after a warning.
 */
export class OpenMeteoProvider implements WeatherProvider {
  private timeZone: string;
  private timeoutMs: number;
  private baseUrl: string;
  private logger: Logger;

  constructor(options: OpenMeteoOptions = {}) {
    this.timeZone = options.timeZone ?? "auto";
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.logger = options.logger ?? console;
  }

  buildUrl(latitude: number, longitude: number): string {
    const params = new URLSearchParams({
      latitude: String(latitude),
      longitude: String(longitude),
      daily: DAILY_FIELDS.join(","),
      forecast_days: "1",
      timezone: this.timeZone,
    });
    return `${this.baseUrl}?${params.toString()}`;
  }

  async fetchDailySummary(latitude: number, longitude: number): Promise<WeatherSummary | null> {
    try {
      const res = await fetch(this.buildUrl(latitude, longitude), {
        headers: { Accept: "application/json" },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!res.ok) {
        this.logger.warn(`Weather unavailable: HTTP ${res.status}`);
        return null;
      }

      const body: unknown = await res.json();
      if (!isRecord(body) || !isRecord(body.daily)) {
        this.logger.warn("Weather unavailable: response has no daily forecast");
        return null;
      }

      return {
        minTempC: firstNumber(body.daily, "temperature_2m_min"),
        maxTempC: firstNumber(body.daily, "temperature_2m_max"),
        maxWindKmh: firstNumber(body.daily, "windspeed_10m_max"),
        precipitationMm: firstNumber(body.daily, "precipitation_sum"),
      };
    } catch (error) {
      this.logger.warn(`Weather unavailable: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }
}

export type WeatherAlertCode = "frost" | "wind" | "rain" | "heat";

export interface WeatherAlert {
  code: WeatherAlertCode;
  message: string;
}

export const ALERT_THRESHOLDS = {
  frostMaxC: 0,
  windMinKmh: 60,
  rainMinMm: 10,
  heatMinC: 28,
} as const;

/**
 * Household advice for today's forecast, independent of the task catalog.
 */
export function suggestAlerts(summary: WeatherSummary | null): WeatherAlert[] {
  if (!summary) return [];

  const alerts: WeatherAlert[] = [];
  if (summary.minTempC != null && summary.minTempC <= ALERT_THRESHOLDS.frostMaxC) {
    alerts.push({ code: "frost", message: "Bring in or protect frost-sensitive plants." });
  }
  if (summary.maxWindKmh != null && summary.maxWindKmh >= ALERT_THRESHOLDS.windMinKmh) {
    alerts.push({
      code: "wind",
      message: "Put away loose garden items and park the car in the garage.",
    });
  }
  if (summary.precipitationMm != null && summary.precipitationMm >= ALERT_THRESHOLDS.rainMinMm) {
    alerts.push({ code: "rain", message: "Check the gutters and avoid hanging laundry outside." });
  }
  if (summary.maxTempC != null && summary.maxTempC >= ALERT_THRESHOLDS.heatMinC) {
    alerts.push({
      code: "heat",
      message: "Close sun-facing shutters in the afternoon to keep cool.",
    });
  }
  return alerts;
}
