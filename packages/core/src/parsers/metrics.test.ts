import { describe, it, expect } from "vitest";
import {
  parseHeartRate,
  parseHrv,
  parseTemperature,
  parseBodyweight,
  parseControlPause,
} from "./metrics.js";
import type { ParseContext } from "./context.js";
import { AliasTable } from "../aliases/index.js";
import {
  EntryParseError,
  InapplicableConditionError,
  MissingValueError,
} from "../errors.js";

const NOW = new Date(2026, 0, 10, 14, 30);

const context: ParseContext = {
  timestamp: NOW,
  tags: ["oura"],
  aliases: AliasTable.fromConfig({
    hrv_metrics: { sd: "sdnn" },
    conditions: { rest: "resting", pp: "postprandial", mouth: "oral" },
  }),
};

function tokens(text: string): string[] {
  return text === "" ? [] : text.split(" ");
}

describe("parseHeartRate", () => {
  it("parses bpm and carries timestamp and tags", () => {
    expect(parseHeartRate(tokens("72"), context)).toEqual({
      type: "hr",
      bpm: 72,
      conditions: null,
      timestamp: NOW,
      tags: ["oura"],
    });
  });

  it("orders conditions by dimension priority", () => {
    expect(parseHeartRate(tokens("58 postprandial resting"), context).conditions).toBe(
      "resting,postprandial"
    );
  });

  it("resolves condition aliases", () => {
    expect(parseHeartRate(tokens("85 pp rest"), context).conditions).toBe("resting,postprandial");
  });

  it("ignores words that are not conditions", () => {
    expect(parseHeartRate(tokens("70 walking"), context).conditions).toBeNull();
  });

  it("rejects a technique condition", () => {
    expect(() => parseHeartRate(tokens("58 oral"), context)).toThrow(InapplicableConditionError);
  });

  it("requires a bpm value", () => {
    try {
      parseHeartRate([], context);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MissingValueError);
      if (error instanceof MissingValueError) {
        expect(error.code).toBe("missing_value");
        expect(error.entryType).toBe("hr");
        expect(error.message).toBe("Heart rate needs BPM value");
      }
    }
  });

  it("rejects a non-integer bpm", () => {
    expect(() => parseHeartRate(tokens("58.5"), context)).toThrow("Invalid BPM value: '58.5'");
    expect(() => parseHeartRate(tokens("fast"), context)).toThrow(EntryParseError);
  });

  it("rejects a bpm beyond the safe integer range", () => {
    expect(() => parseHeartRate(["99999999999999999999"], context)).toThrow(
      "Invalid BPM value: '99999999999999999999'"
    );
  });
});

describe("parseHrv", () => {
  it("defaults the metric to rmssd", () => {
    const entry = parseHrv(tokens("45"), context);
    expect(entry.ms).toBe(45);
    expect(entry.metric).toBe("rmssd");
    expect(entry.conditions).toBeNull();
  });

  it("recognizes an explicit metric", () => {
    expect(parseHrv(tokens("50 sdnn"), context).metric).toBe("sdnn");
  });

  it("resolves metric aliases", () => {
    expect(parseHrv(tokens("50 sd"), context).metric).toBe("sdnn");
  });

  it("separates the metric from conditions", () => {
    const entry = parseHrv(tokens("55 morning rmssd rest"), context);
    expect(entry.metric).toBe("rmssd");
    expect(entry.conditions).toBe("resting,morning");
  });

  it("accepts decimals", () => {
    expect(parseHrv(tokens("42.5 rmssd"), context).ms).toBe(42.5);
  });

  it("requires a value", () => {
    expect(() => parseHrv([], context)).toThrow("HRV needs milliseconds value");
  });
});

describe("parseTemperature", () => {
  it("parses celsius", () => {
    expect(parseTemperature(tokens("36.6"), context).celsius).toBe(36.6);
    expect(parseTemperature(tokens("37"), context).celsius).toBe(37);
  });

  it("sorts metabolic before technique whatever the input order", () => {
    expect(parseTemperature(tokens("37.2 oral postprandial"), context).conditions).toBe(
      "postprandial,oral"
    );
    expect(parseTemperature(tokens("37.2 pp mouth"), context).conditions).toBe("postprandial,oral");
  });

  it("rejects two techniques", () => {
    expect(() => parseTemperature(tokens("36.9 oral ear"), context)).toThrow(
      "Cannot specify both 'oral' and 'ear' (technique dimension)"
    );
  });

  it("requires a value", () => {
    expect(() => parseTemperature([], context)).toThrow("Temperature needs Celsius value");
  });

  it("rejects a value that is not a number", () => {
    expect(() => parseTemperature(tokens("warm"), context)).toThrow("Invalid Celsius value: 'warm'");
  });
});

describe("parseBodyweight", () => {
  it("parses kg without body fat", () => {
    expect(parseBodyweight(tokens("82.5"), context)).toEqual({
      type: "weight",
      kg: 82.5,
      bodyfatPct: null,
      timestamp: NOW,
      tags: ["oura"],
    });
  });

  it("reads a bare or %-suffixed body fat", () => {
    expect(parseBodyweight(tokens("85 18"), context).bodyfatPct).toBe(18);
    expect(parseBodyweight(tokens("82 15%"), context).bodyfatPct).toBe(15);
    expect(parseBodyweight(tokens("80 17.5"), context).bodyfatPct).toBe(17.5);
  });

  it("rejects values too large to represent", () => {
    const huge = "9".repeat(400);
    expect(() => parseBodyweight([huge], context)).toThrow(`Invalid kg value: '${huge}'`);
    expect(() => parseBodyweight(["80", huge], context)).toThrow(`Invalid body fat: '${huge}'`);
  });

  it("ignores a trailing word that is not a percentage", () => {
    expect(parseBodyweight(tokens("80 morning"), context).bodyfatPct).toBeNull();
  });

  it("requires a value", () => {
    expect(() => parseBodyweight([], context)).toThrow("Bodyweight needs kg value");
  });
});

describe("parseControlPause", () => {
  it("parses seconds with or without an s suffix", () => {
    expect(parseControlPause(tokens("45"), context).seconds).toBe(45);
    expect(parseControlPause(tokens("60s"), context).seconds).toBe(60);
  });

  it("resolves conditions", () => {
    expect(parseControlPause(tokens("35 morning fasted"), context).conditions).toBe("morning,fasted");
    expect(parseControlPause(tokens("40 afternoon"), context).conditions).toBeNull();
  });

  it("rejects technique conditions", () => {
    expect(() => parseControlPause(tokens("45 ear"), context)).toThrow(
      "Condition 'ear' (technique) does not apply to cp entries"
    );
  });

  it("accepts the bounds just inside 0 and 600", () => {
    expect(parseControlPause(tokens("1"), context).seconds).toBe(1);
    expect(parseControlPause(tokens("599"), context).seconds).toBe(599);
  });

  it("rejects 0 and 600 seconds", () => {
    for (const value of ["0", "600", "900s"]) {
      try {
        parseControlPause([value], context);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(EntryParseError);
        if (error instanceof EntryParseError) {
          expect(error.code).toBe("invalid_seconds");
          expect(error.message).toBe("Seconds must be between 1 and 599");
        }
      }
    }
  });

  it("rejects a non-numeric value", () => {
    expect(() => parseControlPause(tokens("45.5"), context)).toThrow("Invalid seconds value: 45.5");
  });

  it("requires a value", () => {
    expect(() => parseControlPause([], context)).toThrow("Control pause needs seconds value");
  });
});
