import { readFileSync } from "node:fs";
import { describe, expect, it } from "vitest";
import { parseCalendarConfig } from "../apps/planner/src/config.js";

function rawConfig(): Record<string, unknown> {
  const parsed: unknown = JSON.parse(readFileSync("./config/calendar.json", "utf8"));
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new Error("calendar config fixture is not an object");
  }
  return { ...parsed };
}

describe("calendar config", () => {
  it("loads the shipped configuration as a frozen value", () => {
    const config = parseCalendarConfig(rawConfig());
    expect(config.holidays).toHaveLength(17);
    expect(config.brand.products).toEqual(["Ancient Soil", "Plant Juice", "Bloom Juice", "Worm Castings"]);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.brand.products)).toBe(true);
  });

  it("rejects two holidays on the same date", () => {
    const raw = rawConfig();
    const holidays = Array.isArray(raw.holidays) ? raw.holidays : [];
    raw.holidays = [
      ...holidays,
      { month: 12, day: 25, name: "Second Christmas", focus: "duplicate", theme: "Duplicate" },
    ];

    expect(() => parseCalendarConfig(raw)).toThrow(/duplicate holiday date 12-25/);
  });

  it("rejects a seasonal theme table of the wrong size", () => {
    const raw = rawConfig();
    raw.seasonalThemes = { spring: ["a"], summer: ["b"], fall: ["c"], winter: ["d"] };

    expect(() => parseCalendarConfig(raw)).toThrow(/^Invalid calendar config: seasonalThemes\.spring/);
  });
});
