import { ExitCode, HearthError } from "@hearth/core";

export function parseIntOption(value: string, label: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new HearthError(`${label} must be an integer, got '${value}'`, ExitCode.VALIDATION);
  }
  return parseInt(value, 10);
}

export function parseNumberOption(value: string, label: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new HearthError(`${label} must be a number, got '${value}'`, ExitCode.VALIDATION);
  }
  return parsed;
}

export function parseInstant(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new HearthError(`Invalid date '${value}'. Use ISO 8601`, ExitCode.VALIDATION);
  }
  return date;
}
