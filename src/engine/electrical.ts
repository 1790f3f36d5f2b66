import type { LightRecord, RandomSource, Range } from "../types.js";

export const BUS_VOLTAGE_V = 12.0;
export const ON_VOLTAGE_RANGE: Range = { min: 11.5, max: 12.5 };
export const ON_CURRENT_RANGE: Range = { min: 1.0, max: 1.4 };
export const FAULT_LUX = -1;

export function sampleReal(range: Range, random: RandomSource, decimals = 2): number {
  const value = range.min + random() * (range.max - range.min);
  const rounded = Number(value.toFixed(decimals));
  return Math.min(range.max, Math.max(range.min, rounded));
}

// Inclusive on both ends.
export function sampleInt(range: Range, random: RandomSource): number {
  const span = Math.floor(range.max) - Math.ceil(range.min);
  const value = Math.ceil(range.min) + Math.floor(random() * (span + 1));
  return Math.min(Math.floor(range.max), value);
}

export type LightReadings = Omit<LightRecord, "id">;

export function onReadings(luxRange: Range, random: RandomSource): LightReadings {
  return {
    relay_state: "ON",
    voltage: sampleReal(ON_VOLTAGE_RANGE, random),
    current: sampleReal(ON_CURRENT_RANGE, random),
    lux: sampleInt(luxRange, random)
  };
}

export function offReadings(luxRange: Range, random: RandomSource): LightReadings {
  return {
    relay_state: "OFF",
    voltage: 0,
    current: 0,
    lux: sampleInt(luxRange, random)
  };
}

export function faultReadings(): LightReadings {
  return { relay_state: "OFF", voltage: 0, current: 0, lux: FAULT_LUX };
}
