export * from "./types.js";
export * from "./validation.js";
export { loadConfig, parseConfig, saveConfig } from "./config.js";
export type { LoadConfigOptions } from "./config.js";
export { createDb, initializeSchema } from "./db/index.js";
export type { CreateDbOptions, DB, DbConfig } from "./db/index.js";
export * from "./services/eligibility/index.js";
export { HouseholdService } from "./services/household.js";
export type { AddRoomInput } from "./services/household.js";
export { COMPLETION_ORIGIN, isOneOff, resolveRule, TaskService } from "./services/task.js";
export type {
  AddTaskInput,
  CatalogOptions,
  ListTasksFilter,
  RecordCompletionInput,
  ResolvedRule,
  RulePatch,
  UpdateTaskInput,
} from "./services/task.js";
export { MarkdownService } from "./services/markdown.js";
export type { ExportOptions, ParsedRoom, ParsedTask, ParseResult } from "./services/markdown.js";
export { CatalogService, toTaskInput } from "./services/catalog.js";
export type { ImportSummary } from "./services/catalog.js";
export {
  DEFAULT_FREQUENCY,
  FREQUENCY_INTERVALS,
  formatFrequency,
  guessAvoidNight,
  guessCategory,
  parseFrequency,
} from "./services/catalog-defaults.js";
export type { ParsedFrequency } from "./services/catalog-defaults.js";
export { ALERT_THRESHOLDS, OpenMeteoProvider, suggestAlerts } from "./services/weather.js";
export type {
  Logger,
  OpenMeteoOptions,
  WeatherAlert,
  WeatherAlertCode,
  WeatherProvider,
} from "./services/weather.js";
