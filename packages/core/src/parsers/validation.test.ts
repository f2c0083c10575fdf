import { describe, it, expect } from "vitest";
import {
  VALIDATION,
  isValidHeartRate,
  isValidTemperature,
  isValidBodyweight,
  isValidBodyfat,
  isValidRpe,
  isValidControlPause,
  isValidReps,
  checkEntryLimits,
} from "./validation.js";

const NOW = new Date(2026, 0, 10, 8, 0);

describe("validation constants", () => {
  it("has sensible heart rate bounds", () => {
    expect(VALIDATION.HEART_RATE_MAX).toBe(300);
  });

  it("has a 1-10 RPE scale", () => {
    expect(VALIDATION.RPE_MIN).toBe(1);
    expect(VALIDATION.RPE_MAX).toBe(10);
  });
});

describe("isValidHeartRate", () => {
  it("accepts whole numbers between 0 and 300 exclusive", () => {
    expect(isValidHeartRate(1)).toBe(true);
    expect(isValidHeartRate(58)).toBe(true);
    expect(isValidHeartRate(299)).toBe(true);
  });

  it("rejects zero, 300 and fractions", () => {
    expect(isValidHeartRate(0)).toBe(false);
    expect(isValidHeartRate(300)).toBe(false);
    expect(isValidHeartRate(60.5)).toBe(false);
  });
});

describe("isValidTemperature", () => {
  it("accepts values strictly between 30 and 45", () => {
    expect(isValidTemperature(36.6)).toBe(true);
    expect(isValidTemperature(30)).toBe(false);
    expect(isValidTemperature(45)).toBe(false);
  });
});

describe("isValidBodyweight and isValidBodyfat", () => {
  it("bounds bodyweight to 0-500", () => {
    expect(isValidBodyweight(80)).toBe(true);
    expect(isValidBodyweight(0)).toBe(false);
    expect(isValidBodyweight(500)).toBe(false);
  });

  it("bounds body fat to 0-100", () => {
    expect(isValidBodyfat(15)).toBe(true);
    expect(isValidBodyfat(100)).toBe(false);
  });
});

describe("isValidRpe", () => {
  it("includes both ends of the scale", () => {
    expect(isValidRpe(1)).toBe(true);
    expect(isValidRpe(10)).toBe(true);
    expect(isValidRpe(7.5)).toBe(true);
  });

  it("rejects values off the scale", () => {
    expect(isValidRpe(0)).toBe(false);
    expect(isValidRpe(10.5)).toBe(false);
  });
});

describe("isValidControlPause", () => {
  it("accepts 1-599 whole seconds", () => {
    expect(isValidControlPause(1)).toBe(true);
    expect(isValidControlPause(599)).toBe(true);
  });

  it("rejects 0, 600 and fractions", () => {
    expect(isValidControlPause(0)).toBe(false);
    expect(isValidControlPause(600)).toBe(false);
    expect(isValidControlPause(30.5)).toBe(false);
  });
});

describe("isValidReps", () => {
  it("requires at least one positive whole set", () => {
    expect(isValidReps([5, 5, 5])).toBe(true);
    expect(isValidReps([])).toBe(false);
    expect(isValidReps([5, 0])).toBe(false);
    expect(isValidReps([2.5])).toBe(false);
  });

  it("caps sets at 100 and reps per set at 10000", () => {
    expect(isValidReps(Array.from({ length: 100 }, () => 10000))).toBe(true);
    expect(isValidReps(Array.from({ length: 101 }, () => 5))).toBe(false);
    expect(isValidReps([10001])).toBe(false);
  });
});

describe("checkEntryLimits", () => {
  it("returns nothing for plausible entries", () => {
    expect(
      checkEntryLimits({ type: "hr", bpm: 58, conditions: null, timestamp: NOW, tags: null })
    ).toEqual([]);
    expect(
      checkEntryLimits({
        type: "exercise",
        name: "squat",
        weightKg: 100,
        reps: [5, 5, 5],
        rpe: 8,
        timestamp: NOW,
        tags: null,
      })
    ).toEqual([]);
  });

  it("flags an implausible heart rate", () => {
    expect(
      checkEntryLimits({ type: "hr", bpm: 350, conditions: null, timestamp: NOW, tags: null })
    ).toEqual(["heart rate 350 bpm is outside 1-299"]);
  });

  it("flags an implausible temperature", () => {
    expect(
      checkEntryLimits({ type: "temp", celsius: 98.6, conditions: null, timestamp: NOW, tags: null })
    ).toEqual(["temperature 98.6°C is outside 30-45"]);
  });

  it("flags each bad bodyweight field", () => {
    expect(
      checkEntryLimits({ type: "weight", kg: 800, bodyfatPct: 120, timestamp: NOW, tags: null })
    ).toEqual(["bodyweight 800kg is out of range", "body fat 120% is out of range"]);
  });

  it("flags a zero HRV", () => {
    expect(
      checkEntryLimits({ type: "hrv", ms: 0, metric: "rmssd", conditions: null, timestamp: NOW, tags: null })
    ).toEqual(["HRV must be positive"]);
  });
});
