import { mkdirSync, mkdtempSync, readdirSync, readFileSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { beforeEach, describe, expect, it } from "vitest";
import { ConfigError } from "@schedule-sync/core";
import { colorSchemeFromConfig, ConfigStore, DEFAULT_CONFIG, validateConfig, type Config } from "../src/config.js";

function validConfig(): Config {
  return {
    timezone: "Europe/Tirane",
    color_scheme: { "Deep Work": "9", Gym: "11", default: "1" },
    completion_strategies: { enabled: true, method: "color_change", done_color: "8" },
    batch_size: 10,
    calendar_id: "primary"
  };
}

describe("validateConfig", () => {
  it("accepts the defaults and a valid baseline config", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual([]);
    expect(validateConfig(validConfig())).toEqual([]);
    expect(
      validateConfig({ ...DEFAULT_CONFIG, completion_strategies: { enabled: true, method: "color_change", done_color: "8" } })
    ).toEqual([]);
  });

  it("rejects unknown time zones", () => {
    const errors = validateConfig({ ...validConfig(), timezone: "Mars/Olympus" });
    expect(errors).toEqual(['timezone must be an IANA zone name, got "Mars/Olympus"']);
  });

  it("rejects color ids outside the palette", () => {
    const errors = validateConfig({ ...validConfig(), color_scheme: { Gym: "12", default: "1" } });
    expect(errors).toEqual(['color_scheme["Gym"] must be a color id 1-11']);
  });

  it("requires a default color", () => {
    const errors = validateConfig({ ...validConfig(), color_scheme: { Gym: "11" } });
    expect(errors).toEqual(['color_scheme must contain a "default" key']);
  });

  it("rejects unknown completion methods", () => {
    const errors = validateConfig({ ...validConfig(), completion_strategies: { enabled: true, method: "description" } });
    expect(errors).toEqual(["completion_strategies.method must be color_change|title_prefix"]);
  });

  it("rejects a done color shared with a category", () => {
    const errors = validateConfig({
      ...validConfig(),
      color_scheme: [
        { pattern: "Family walk", color: "8" },
        { pattern: "default", color: "8" }
      ]
    });
    expect(errors).toEqual([
      'completion_strategies.done_color collides with color_scheme["Family walk"]',
      'completion_strategies.done_color collides with color_scheme["default"]'
    ]);
  });

  it("checks the collision against an explicit done color", () => {
    const errors = validateConfig({
      ...validConfig(),
      completion_strategies: { enabled: true, method: "color_change", done_color: "11" }
    });
    expect(errors).toEqual(['completion_strategies.done_color collides with color_scheme["Gym"]']);
  });

  it("rejects a non-positive batch size", () => {
    expect(validateConfig({ ...validConfig(), batch_size: 0 })).toEqual(["batch_size must be an integer >= 1"]);
  });
});

describe("colorSchemeFromConfig", () => {
  it("keeps the document's key order as rule order", () => {
    expect(colorSchemeFromConfig(validConfig())).toEqual({
      rules: [
        { pattern: "Deep Work", colorId: "9" },
        { pattern: "Gym", colorId: "11" }
      ],
      defaultColorId: "1"
    });
  });

  it("reads the list form", () => {
    const config: Config = {
      ...validConfig(),
      color_scheme: [
        { pattern: "Gym", color: "11" },
        { pattern: "default", color: "5" }
      ]
    };
    expect(colorSchemeFromConfig(config)).toEqual({ rules: [{ pattern: "Gym", colorId: "11" }], defaultColorId: "5" });
  });
});

describe("ConfigStore", () => {
  let dir: string;
  let path: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "schedule-sync-"));
    path = join(dir, "calendar_config.json");
  });

  it("writes the defaults on first run", () => {
    const store = new ConfigStore(path);

    const first = store.load();
    expect(first.created).toBe(true);
    expect(JSON.parse(readFileSync(path, "utf8"))).toEqual(DEFAULT_CONFIG);

    const second = store.load();
    expect(second.created).toBe(false);
    expect(second.config).toEqual(DEFAULT_CONFIG);
  });

  it("fills missing keys without rewriting the user's file", () => {
    const text = JSON.stringify({
      timezone: "America/New_York",
      color_scheme: { Reading: "2", default: "3" },
      completion_strategies: { enabled: true, method: "color_change" }
    });
    writeFileSync(path, text);

    const { config } = new ConfigStore(path).load();

    expect(config.timezone).toBe("America/New_York");
    expect(config.color_scheme).toEqual({ Reading: "2", default: "3" });
    expect(config.completion_strategies).toEqual({ enabled: true, method: "color_change", done_color: "8" });
    expect(config.batch_size).toBe(50);
    expect(config.calendar_id).toBe("primary");
    expect(readFileSync(path, "utf8")).toBe(text);
  });

  it("refuses a corrupt file and leaves it alone", () => {
    writeFileSync(path, "{ not json");
    expect(() => new ConfigStore(path).load()).toThrow(ConfigError);
    expect(readFileSync(path, "utf8")).toBe("{ not json");
  });

  it("refuses an invalid document", () => {
    writeFileSync(path, JSON.stringify({ ...validConfig(), timezone: "Nowhere/Land" }));
    expect(() => new ConfigStore(path).load()).toThrow('timezone must be an IANA zone name, got "Nowhere/Land"');
  });

  it("saves through a temporary file", () => {
    const store = new ConfigStore(path);
    store.save(validConfig());

    expect(readdirSync(dir)).toEqual(["calendar_config.json"]);
    expect(store.load().config).toEqual(validConfig());
  });

  it("removes the temporary file when the save fails", () => {
    mkdirSync(path);
    writeFileSync(join(path, "keep.txt"), "x");

    expect(() => new ConfigStore(path).save(validConfig())).toThrow();
    expect(readdirSync(dir)).toEqual(["calendar_config.json"]);
  });

  it("reports a missing file when validating", () => {
    expect(new ConfigStore(path).validate()).toEqual([`${path} does not exist`]);
  });
});
