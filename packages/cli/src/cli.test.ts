import { spawnSync } from "node:child_process";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

const CLI = fileURLToPath(new URL("./index.ts", import.meta.url));
const REPO_ROOT = fileURLToPath(new URL("../../..", import.meta.url));
const WEDNESDAY_MORNING = "2026-07-15T10:00:00Z";

let testDir: string;

function runCli(args: string[], householdDir = join(testDir, ".hearth")) {
  const result = spawnSync(process.execPath, ["--import", "tsx", CLI, ...args], {
    cwd: REPO_ROOT,
    encoding: "utf-8",
    env: {
      ...process.env,
      HEARTH_DIR: householdDir,
      HEARTH_NO_WEATHER: "true",
      HEARTH_TIMEZONE: "UTC",
      NODE_NO_WARNINGS: "1",
    },
  });
  return { stdout: result.stdout, stderr: result.stderr, exitCode: result.status ?? 1 };
}

function run(args: string[]): string {
  const result = runCli(args);
  if (result.exitCode !== 0) {
    throw new Error(`hearth ${args.join(" ")} failed (${result.exitCode}): ${result.stderr}`);
  }
  return result.stdout;
}

function runJson(args: string[]) {
  return JSON.parse(run([...args, "--json"]));
}

describe("CLI Integration", () => {
  beforeEach(() => {
    testDir = mkdtempSync(join(tmpdir(), "hearth-cli-"));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  test("full workflow: init -> add -> rank -> done -> wake", () => {
    expect(run(["init", "--name", "Test Home"])).toContain("Initialized household: Test Home");

    run(["room", "add", "Kitchen"]);
    run(["room", "add", "Garden"]);
    run(["task", "add", "Kitchen", "Wipe counters", "--frequency", "daily", "--hygiene", "4"]);
    run(["task", "add", "Kitchen", "Clean the oven"]);
    run(["task", "add", "Kitchen", "Defrost freezer", "--on", "friday"]);
    run(["task", "add", "Garden", "Water the roses", "--every", "2"]);

    const ranked = runJson(["rank", "--at", WEDNESDAY_MORNING]);
    expect(ranked.success).toBe(true);
    expect(ranked.data.weather).toBe("no weather data");
    expect(
      ranked.data.items.map((i: { task: string; score: number }) => [i.task, i.score]),
    ).toEqual([
      ["Wipe counters", 5080],
      ["Water the roses", 5065],
      ["Clean the oven", 80],
    ]);
    expect(ranked.data.items[2].reasonText).toBe("never done (one-off)");

    const done = run(["done", "Kitchen/Clean the oven", "--by", "Alex", "--at", "2026-07-15T09:00:00Z"]);
    expect(done).toContain("Done: Kitchen/Clean the oven");
    expect(done).toContain("'Alex' is not a household member");
    expect(done).toContain("One-off task is now asleep");

    const afterDone = runJson(["rank", "--at", WEDNESDAY_MORNING, "--all-hidden"]);
    const hidden = afterDone.data.items.filter((i: { visible: boolean }) => !i.visible);
    expect(hidden.map((i: { task: string; reasonText: string; nextDue: string }) => [i.task, i.reasonText, i.nextDue])).toEqual([
      ["Clean the oven", "dormant one-off task", "on demand"],
      ["Defrost freezer", "scheduled for Friday", "in 2 days"],
    ]);

    run(["wake", "Kitchen/Clean the oven"]);
    const afterWake = runJson(["rank", "--at", WEDNESDAY_MORNING, "--room", "Kitchen"]);
    expect(afterWake.data.items.map((i: { task: string; reason: { code: string } }) => [i.task, i.reason.code])).toEqual([
      ["Wipe counters", "OVERDUE"],
      ["Clean the oven", "REACTIVATED"],
    ]);

    const history = runJson(["history", "Kitchen/Clean the oven"]);
    expect(history.data.entries).toHaveLength(1);
    expect(history.data.entries[0].performer).toBeNull();
    expect(history.data.entries[0].completedAt).toBe("2026-07-15T09:00:00.000Z");
  });

  test("rank respects --limit", () => {
    run(["init"]);
    run(["room", "add", "Hall"]);
    run(["task", "add", "Hall", "Dust shelves", "--every", "7"]);
    run(["task", "add", "Hall", "Mop floor", "--every", "3"]);

    const ranked = runJson(["rank", "--at", WEDNESDAY_MORNING, "--limit", "1"]);

    expect(ranked.data.items).toHaveLength(1);
    expect(ranked.data.items[0].task).toBe("Mop floor");
  });

  test("members record who did a task", () => {
    run(["init"]);
    run(["member", "add", "Sam"]);
    run(["room", "add", "Bathroom"]);
    run(["task", "add", "Bathroom", "Scrub the tub", "--frequency", "weekly"]);

    run(["done", "Bathroom/Scrub the tub", "--by", "Sam", "--comment", "used the new brush"]);

    const history = runJson(["history", "Bathroom/Scrub the tub"]);
    expect(history.data.entries[0].performer).toBe("Sam");
    expect(history.data.entries[0].comment).toBe("used the new brush");
  });

  test("import and export a catalog", () => {
    run(["init", "--name", "Flat"]);
    const catalogPath = join(testDir, "catalog.md");
    writeFileSync(
      catalogPath,
      ["# Flat", "", "## Balcony", "- Water the herbs", "    @ daily", "", "## Kitchen", "- Descale kettle", "    @ monthly", ""].join("\n"),
    );

    const imported = runJson(["import", catalogPath]);
    expect(imported.data).toEqual({ roomsCreated: 2, tasksCreated: 2, tasksUpdated: 0 });

    const exportPath = join(testDir, "export.md");
    run(["export", "--output", exportPath]);
    const exported = readFileSync(exportPath, "utf-8");

    expect(exported.split("\n").slice(0, 9)).toEqual([
      "# Flat",
      "",
      "## Balcony",
      "",
      "- Water the herbs",
      "    @ daily",
      "    ! 3",
      "    ~ none",
      "    # watering",
    ]);
  });

  test("import reports parse errors without writing", () => {
    run(["init"]);
    const catalogPath = join(testDir, "bad.md");
    writeFileSync(catalogPath, "## Kitchen\n- Mop\n    @ fortnightly-ish\n");

    const result = runCli(["import", catalogPath]);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toContain('Line 3: Unknown frequency "fortnightly-ish"');
    expect(runJson(["task", "list"]).data).toEqual([]);
  });

  test("commands fail before init", () => {
    const result = runCli(["rank"]);

    expect(result.exitCode).toBe(2);
    expect(result.stderr.trim()).toBe("Error: No household found. Run 'hearth init' first.");
  });

  test("init refuses an existing household", () => {
    run(["init"]);

    const result = runCli(["init"]);

    expect(result.exitCode).toBe(3);
    expect(result.stderr.trim()).toBe("Error: Household already exists in this directory");
  });

  test("duplicate room gives a JSON error envelope", () => {
    run(["init"]);
    run(["room", "add", "Kitchen"]);

    const result = runCli(["room", "add", "Kitchen", "--json"]);

    expect(result.exitCode).toBe(3);
    expect(JSON.parse(result.stdout)).toEqual({
      success: false,
      error: { code: 3, message: "Room 'Kitchen' already exists" },
    });
  });

  test("invalid weekday is a validation error", () => {
    run(["init"]);
    run(["room", "add", "Kitchen"]);

    const result = runCli(["task", "add", "Kitchen", "Bake bread", "--on", "someday"]);

    expect(result.exitCode).toBe(4);
    expect(result.stderr.trim()).toBe(
      "Error: Invalid weekday 'someday'. Use one of: monday, tuesday, wednesday, thursday, friday, saturday, sunday",
    );
  });
});

describe("packaging", () => {
  test("the CLI is started through the workspace script", () => {
    const cliPackage = JSON.parse(readFileSync(join(REPO_ROOT, "packages/cli/package.json"), "utf-8"));
    const rootPackage = JSON.parse(readFileSync(join(REPO_ROOT, "package.json"), "utf-8"));

    expect(cliPackage.bin).toBeUndefined();
    expect(rootPackage.scripts.hearth).toBe("tsx packages/cli/src/index.ts");
  });
});
