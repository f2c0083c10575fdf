/**
 * Health metric entries
 */

import type { BaseEntry } from "./base.js";

/**
 * HRV metric subtypes recognized by the parser
 */
export const HRV_METRICS = ["rmssd", "sdnn"] as const;

export type HrvMetric = (typeof HRV_METRICS)[number];

export const DEFAULT_HRV_METRIC: HrvMetric = "rmssd";

export interface HeartRateEntry extends BaseEntry {
  readonly type: "hr";
  /** Beats per minute */
  readonly bpm: number;
  /** Canonical condition string, e.g. "resting,postprandial" */
  readonly conditions: string | null;
}

export interface HrvEntry extends BaseEntry {
  readonly type: "hrv";
  /** Milliseconds */
  readonly ms: number;
  readonly metric: HrvMetric;
  readonly conditions: string | null;
}

/**
 * Body temperature. The only kind whose conditions may name a
 * measurement technique.
 */
export interface TemperatureEntry extends BaseEntry {
  readonly type: "temp";
  readonly celsius: number;
  readonly conditions: string | null;
}

export interface BodyweightEntry extends BaseEntry {
  readonly type: "weight";
  readonly kg: number;
  readonly bodyfatPct: number | null;
}

/**
 * Breath-hold control pause, in seconds
 */
export interface ControlPauseEntry extends BaseEntry {
  readonly type: "cp";
  readonly seconds: number;
  readonly conditions: string | null;
}
