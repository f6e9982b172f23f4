import { existsSync } from "node:fs";
import { join } from "node:path";
import {
  CatalogService,
  type Config,
  createDb,
  type DB,
  ExitCode,
  HearthError,
  HouseholdService,
  loadConfig,
  MarkdownService,
  TaskService,
} from "@hearth/core";

export interface HearthPaths {
  dir: string;
  dbPath: string;
  configPath: string;
}

export interface CliContext {
  db: DB;
  config: Config;
  paths: HearthPaths;
  householdService: HouseholdService;
  taskService: TaskService;
  catalogService: CatalogService;
}

export function getPaths(): HearthPaths {
  const dir = process.env.HEARTH_DIR ?? join(process.cwd(), ".hearth");
  return {
    dir,
    dbPath: join(dir, "household.db"),
    configPath: join(dir, "config.json"),
  };
}

export function getContext(): CliContext {
  const paths = getPaths();

  if (!existsSync(paths.dbPath)) {
    throw new HearthError("No household found. Run 'hearth init' first.", ExitCode.NOT_FOUND);
  }

  const config = loadConfig(paths.configPath);
  const db = createDb(paths.dbPath);
  const householdService = new HouseholdService(db);
  const taskService = new TaskService(db, householdService);
  const catalogService = new CatalogService(householdService, taskService, new MarkdownService());

  return { db, config, paths, householdService, taskService, catalogService };
}
