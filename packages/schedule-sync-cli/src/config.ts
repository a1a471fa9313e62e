import { existsSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import {
  ConfigError,
  DEFAULT_BATCH_SIZE,
  DEFAULT_COLOR_KEY,
  DEFAULT_DONE_COLOR_ID,
  errorMessage,
  isColorId,
  isValidTimeZone,
  type ColorScheme,
  type CompletionMethod
} from "@schedule-sync/core";

export const DEFAULT_CONFIG_PATH = "calendar_config.json";

export type ColorSchemeDocument = Record<string, string> | Array<{ pattern: string; color: string }>;

export type Config = {
  timezone: string;
  color_scheme: ColorSchemeDocument;
  completion_strategies: {
    enabled: boolean;
    method: CompletionMethod;
    done_color?: string;
  };
  batch_size?: number;
  calendar_id?: string;
};

export const DEFAULT_CONFIG: Config = {
  timezone: "Europe/Tirane",
  color_scheme: {
    "Spanish video": "10",
    "Spanish writing": "10",
    "Spanish podcast": "10",
    "Deep Work 1": "9",
    "Deep Work 2": "9",
    "Deep Work 1 (deload)": "1",
    "Guitar practice": "6",
    "Guitar free play": "6",
    "Light analytics": "7",
    Gym: "11",
    "Gym (deload)": "4",
    Reflection: "5",
    "Family walk / light analytics": "2",
    default: "1"
  },
  completion_strategies: {
    enabled: true,
    method: "title_prefix",
    done_color: DEFAULT_DONE_COLOR_ID
  },
  batch_size: DEFAULT_BATCH_SIZE,
  calendar_id: "primary"
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCompletionMethod(value: unknown): value is CompletionMethod {
  return value === "color_change" || value === "title_prefix";
}

function readColorScheme(value: unknown, errors: string[]): ColorSchemeDocument | null {
  if (Array.isArray(value)) {
    const rules: Array<{ pattern: string; color: string }> = [];
    for (const [index, rule] of value.entries()) {
      if (!isRecord(rule) || typeof rule.pattern !== "string" || rule.pattern.trim() === "") {
        errors.push(`color_scheme[${index}].pattern must be a non-empty string`);
        continue;
      }
      if (!isColorId(rule.color)) {
        errors.push(`color_scheme[${index}].color must be a color id 1-11`);
        continue;
      }
      rules.push({ pattern: rule.pattern, color: rule.color });
    }
    if (!rules.some((rule) => rule.pattern === DEFAULT_COLOR_KEY)) {
      errors.push(`color_scheme must contain a "${DEFAULT_COLOR_KEY}" rule`);
    }
    return rules;
  }

  if (isRecord(value)) {
    const scheme: Record<string, string> = {};
    for (const [pattern, color] of Object.entries(value)) {
      if (!isColorId(color)) {
        errors.push(`color_scheme["${pattern}"] must be a color id 1-11`);
        continue;
      }
      scheme[pattern] = color;
    }
    if (!(DEFAULT_COLOR_KEY in value)) {
      errors.push(`color_scheme must contain a "${DEFAULT_COLOR_KEY}" key`);
    }
    return scheme;
  }

  errors.push("color_scheme must be an object or an array of { pattern, color }");
  return null;
}

function colorPairs(document: ColorSchemeDocument): Array<readonly [string, string]> {
  return Array.isArray(document) ? document.map((rule) => [rule.pattern, rule.color] as const) : Object.entries(document);
}

/** Validates a parsed config document and narrows it to `Config`. */
export function readConfig(raw: unknown): { config: Config | null; errors: string[] } {
  const errors: string[] = [];
  if (!isRecord(raw)) {
    return { config: null, errors: ["config must be a JSON object"] };
  }

  const timezone = raw.timezone;
  if (typeof timezone !== "string" || !isValidTimeZone(timezone)) {
    errors.push(`timezone must be an IANA zone name, got ${JSON.stringify(timezone)}`);
  }

  const colorScheme = readColorScheme(raw.color_scheme, errors);

  const completion = raw.completion_strategies;
  let completionStrategies: Config["completion_strategies"] | null = null;
  if (!isRecord(completion)) {
    errors.push("completion_strategies must be an object");
  } else {
    const enabled = completion.enabled ?? true;
    const method = completion.method ?? "title_prefix";
    const doneColor = completion.done_color ?? DEFAULT_DONE_COLOR_ID;
    if (typeof enabled !== "boolean") {
      errors.push("completion_strategies.enabled must be a boolean");
    }
    if (!isCompletionMethod(method)) {
      errors.push("completion_strategies.method must be color_change|title_prefix");
    }
    if (!isColorId(doneColor)) {
      errors.push("completion_strategies.done_color must be a color id 1-11");
    }
    if (typeof enabled === "boolean" && isCompletionMethod(method) && isColorId(doneColor)) {
      completionStrategies = { enabled, method, done_color: doneColor };
    }
  }

  // done_color must differ from every category color, default included.
  if (colorScheme && completionStrategies) {
    for (const [pattern, color] of colorPairs(colorScheme)) {
      if (color === completionStrategies.done_color) {
        errors.push(`completion_strategies.done_color collides with color_scheme["${pattern}"]`);
      }
    }
  }

  const batchSize = raw.batch_size ?? DEFAULT_BATCH_SIZE;
  if (typeof batchSize !== "number" || !Number.isInteger(batchSize) || batchSize < 1) {
    errors.push("batch_size must be an integer >= 1");
  }

  const calendarId = raw.calendar_id ?? "primary";
  if (typeof calendarId !== "string" || calendarId.trim() === "") {
    errors.push("calendar_id must be a non-empty string");
  }

  if (
    errors.length > 0 ||
    typeof timezone !== "string" ||
    !colorScheme ||
    !completionStrategies ||
    typeof batchSize !== "number" ||
    typeof calendarId !== "string"
  ) {
    return { config: null, errors };
  }

  return {
    config: {
      timezone,
      color_scheme: colorScheme,
      completion_strategies: completionStrategies,
      batch_size: batchSize,
      calendar_id: calendarId
    },
    errors
  };
}

export function validateConfig(raw: unknown): string[] {
  return readConfig(raw).errors;
}

export function colorSchemeFromConfig(config: Config): ColorScheme {
  let defaultColorId = "1";
  const rules: ColorScheme["rules"] = [];
  for (const [pattern, colorId] of colorPairs(config.color_scheme)) {
    if (pattern === DEFAULT_COLOR_KEY) {
      defaultColorId = colorId;
      continue;
    }
    rules.push({ pattern, colorId });
  }
  return { rules, defaultColorId };
}

/** Fills top-level keys the document lacks; keys the user set are kept as they are. */
function withDefaults(raw: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };
  for (const [key, value] of Object.entries(DEFAULT_CONFIG)) {
    if (!(key in merged)) {
      merged[key] = value;
    }
  }
  return merged;
}

export class ConfigStore {
  constructor(readonly path: string = DEFAULT_CONFIG_PATH) {}

  load(): { config: Config; created: boolean } {
    if (!existsSync(this.path)) {
      this.save(DEFAULT_CONFIG);
      return { config: DEFAULT_CONFIG, created: true };
    }

    const { config, errors } = readConfig(withDefaults(this.readDocument()));
    if (!config) {
      throw new ConfigError(`Config ${this.path} is invalid:\n${errors.join("\n")}`);
    }
    return { config, created: false };
  }

  /** Problems `load()` would reject the file for; a missing file is one of them here. */
  validate(): string[] {
    if (!existsSync(this.path)) {
      return [`${this.path} does not exist`];
    }
    try {
      return validateConfig(withDefaults(this.readDocument()));
    } catch (error) {
      if (error instanceof ConfigError) {
        return [error.message];
      }
      throw error;
    }
  }

  private readDocument(): Record<string, unknown> {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, "utf8"));
    } catch (error) {
      throw new ConfigError(`Cannot read config ${this.path}: ${errorMessage(error)}`, error);
    }
    if (!isRecord(raw)) {
      throw new ConfigError(`Config ${this.path} must contain a JSON object`);
    }
    return raw;
  }

  save(config: Config): void {
    const temp = `${this.path}.${process.pid}.tmp`;
    try {
      writeFileSync(temp, `${JSON.stringify(config, null, 2)}\n`, "utf8");
      renameSync(temp, this.path);
    } catch (error) {
      rmSync(temp, { force: true });
      throw error;
    }
  }
}
