import { HardwareError } from "../errors.js";
import { LIGHT_COUNT } from "../store/lightStore.js";
import type { RandomSource } from "../types.js";
import { FAULT_READING } from "./lightIo.js";
import type { AmbientReading, LightIoAdapter, LuxProfile, RelayWriteResult } from "./lightIo.js";

export const SIMULATED_LUX: LuxProfile = {
  dark: { min: 0, max: 50 },
  bright: { min: 450, max: 550 }
};

export class SimulatedLightAdapter implements LightIoAdapter {
  readonly kind = "simulated" as const;
  readonly luxProfile = SIMULATED_LUX;

  private readonly random: RandomSource;
  private readonly relays: boolean[];

  constructor(params: { count?: number; random?: RandomSource } = {}) {
    this.random = params.random ?? Math.random;
    this.relays = new Array<boolean>(params.count ?? LIGHT_COUNT).fill(false);
  }

  open(): void {
    this.relays.fill(false);
  }

  readAmbient(lightIndex: number): AmbientReading {
    if (!this.inRange(lightIndex)) return FAULT_READING;
    return { dark: this.random() < 0.5, fault: false };
  }

  setRelay(lightIndex: number, on: boolean): RelayWriteResult {
    if (!this.inRange(lightIndex)) {
      return {
        ok: false,
        error: new HardwareError(`No simulated relay at index ${lightIndex}`, { lightIndex, operation: "write" })
      };
    }
    this.relays[lightIndex] = on;
    return { ok: true };
  }

  relayStates(): readonly boolean[] {
    return [...this.relays];
  }

  close(): void {
    this.relays.fill(false);
  }

  private inRange(lightIndex: number): boolean {
    return Number.isInteger(lightIndex) && lightIndex >= 0 && lightIndex < this.relays.length;
  }
}
