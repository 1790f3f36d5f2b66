import type { HardwareError } from "../errors.js";
import type { Range } from "../types.js";

export type AdapterKind = "simulated" | "gpio";

export interface AmbientReading {
  dark: boolean;
  fault: boolean;
}

export type RelayWriteResult = { ok: true } | { ok: false; error: HardwareError };

export interface LuxProfile {
  dark: Range;
  bright: Range;
}

/**
 * Sensor + relay access for the fleet, addressed by light index (0-based).
 * Implementations never throw from readAmbient/setRelay; failures come back as
 * a fault reading or a failed write result. `on` is always the logical state.
 */
export interface LightIoAdapter {
  readonly kind: AdapterKind;
  readonly luxProfile: LuxProfile;
  open(): void;
  readAmbient(lightIndex: number): AmbientReading;
  setRelay(lightIndex: number, on: boolean): RelayWriteResult;
  close(): void;
}

export const FAULT_READING: AmbientReading = Object.freeze({ dark: false, fault: true });
