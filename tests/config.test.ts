import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, loadConfig, resolveConfig } from "../src/config";

describe("resolveConfig", () => {
  it("overlays valid fields on the defaults", () => {
    expect(resolveConfig({ maxTaskLength: 200, reminderTimePresets: ["08:30"], debug: true })).toEqual({
      ...DEFAULT_CONFIG,
      debug: true,
      maxTaskLength: 200,
      reminderTimePresets: ["08:30"],
    });
  });

  it("keeps defaults for invalid fields", () => {
    expect(
      resolveConfig({
        debug: "yes",
        maxTaskLength: 0,
        logRetentionDays: 2.5,
        reminderTimePresets: ["09:00", "25:00"],
        dialogueSweepCron: "every minute",
      })
    ).toEqual(DEFAULT_CONFIG);
  });

  it("falls back entirely when the document is not an object", () => {
    expect(resolveConfig(["debug"])).toEqual(DEFAULT_CONFIG);
    expect(resolveConfig(null)).toEqual(DEFAULT_CONFIG);
  });
});

describe("loadConfig", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("writes the defaults when the file is missing", () => {
    dir = mkdtempSync(join(tmpdir(), "todo-bot-config-"));
    const path = join(dir, "nested", "bot.json");

    expect(loadConfig(path)).toEqual(DEFAULT_CONFIG);
    const written: unknown = JSON.parse(readFileSync(path, "utf-8"));
    expect(written).toEqual(DEFAULT_CONFIG);
  });

  it("reads an existing file over the defaults", () => {
    dir = mkdtempSync(join(tmpdir(), "todo-bot-config-"));
    const path = join(dir, "bot.json");
    writeFileSync(path, JSON.stringify({ dialogueIdleTimeoutMinutes: 5 }));

    const config = loadConfig(path);

    expect(config.dialogueIdleTimeoutMinutes).toBe(5);
    expect(config.maxTaskLength).toBe(DEFAULT_CONFIG.maxTaskLength);
  });

  it("uses the defaults when the file is not valid JSON", () => {
    dir = mkdtempSync(join(tmpdir(), "todo-bot-config-"));
    const path = join(dir, "bot.json");
    writeFileSync(path, "{ not json");

    expect(loadConfig(path)).toEqual(DEFAULT_CONFIG);
  });
});
