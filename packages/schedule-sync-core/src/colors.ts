import type { ColorScheme } from "./types.js";

// Google Calendar event palette. Ids are opaque; only the names are ours.
export const COLOR_NAMES: Readonly<Record<string, string>> = {
  "1": "Lavender",
  "2": "Sage",
  "3": "Grape",
  "4": "Flamingo",
  "5": "Banana",
  "6": "Tangerine",
  "7": "Peacock",
  "8": "Graphite",
  "9": "Blueberry",
  "10": "Basil",
  "11": "Tomato"
};

export const DEFAULT_COLOR_KEY = "default";

export function isColorId(value: unknown): value is string {
  return typeof value === "string" && Object.hasOwn(COLOR_NAMES, value);
}

export function colorName(colorId: string): string {
  return COLOR_NAMES[colorId] ?? "Unknown";
}

export function resolveColor(name: string, scheme: ColorScheme): string {
  const needle = name.trim().toLowerCase();

  const exact = scheme.rules.find((rule) => rule.pattern.trim().toLowerCase() === needle);
  if (exact) {
    return exact.colorId;
  }

  const contained = scheme.rules.find((rule) => {
    const pattern = rule.pattern.trim().toLowerCase();
    return pattern.length > 0 && needle.includes(pattern);
  });
  return contained?.colorId ?? scheme.defaultColorId;
}
