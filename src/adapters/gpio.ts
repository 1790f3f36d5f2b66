import { HardwareError, errorMessage } from "../errors.js";
import type { LightWiring } from "../lightsConfig.js";
import { logger } from "../utils/logger.js";
import { FAULT_READING } from "./lightIo.js";
import type { AmbientReading, LightIoAdapter, LuxProfile, RelayWriteResult } from "./lightIo.js";
import { type GpioLevel, SysfsGpioLine } from "./sysfsGpio.js";

export const GPIO_LUX: LuxProfile = {
  dark: { min: 0, max: 0 },
  bright: { min: 100, max: 100 }
};

// Relay board is active-low: pulling the line low energizes the coil.
const RELAY_ON_LEVEL: GpioLevel = 0;
const RELAY_OFF_LEVEL: GpioLevel = 1;
// LDR module output: 0 = dark, 1 = bright.
const LDR_DARK_LEVEL: GpioLevel = 0;

interface LightLines {
  relay: SysfsGpioLine;
  ldr: SysfsGpioLine;
}

export class GpioLightAdapter implements LightIoAdapter {
  readonly kind = "gpio" as const;
  readonly luxProfile = GPIO_LUX;

  private readonly lines: LightLines[];
  private opened = false;
  // Lines exported so far, kept so close() can release a partial open().
  private exported: SysfsGpioLine[] = [];

  constructor(params: { root: string; lights: LightWiring[] }) {
    this.lines = params.lights.map((light) => ({
      relay: new SysfsGpioLine({ root: params.root, pin: light.relayPin, direction: "out" }),
      ldr: new SysfsGpioLine({ root: params.root, pin: light.ldrPin, direction: "in" })
    }));
  }

  open(): void {
    if (this.opened) return;
    this.lines.forEach(({ relay, ldr }, lightIndex) => {
      try {
        relay.export();
        this.exported.push(relay);
        relay.write(RELAY_OFF_LEVEL);
        ldr.export();
        this.exported.push(ldr);
      } catch (e) {
        throw new HardwareError(`Failed to set up GPIO for light ${lightIndex + 1}: ${errorMessage(e)}`, {
          lightIndex,
          operation: "open",
          cause: e
        });
      }
    });
    this.opened = true;
    logger.info(
      { relay_pins: this.lines.map((l) => l.relay.pin), ldr_pins: this.lines.map((l) => l.ldr.pin) },
      "GPIO lines ready"
    );
  }

  readAmbient(lightIndex: number): AmbientReading {
    const line = this.opened ? this.lines[lightIndex] : undefined;
    if (!line) {
      logger.warn({ lightIndex }, "LDR read skipped: GPIO not available");
      return FAULT_READING;
    }
    try {
      return { dark: line.ldr.read() === LDR_DARK_LEVEL, fault: false };
    } catch (e) {
      logger.warn({ err: e, lightIndex, pin: line.ldr.pin }, "LDR read failed");
      return FAULT_READING;
    }
  }

  setRelay(lightIndex: number, on: boolean): RelayWriteResult {
    const line = this.opened ? this.lines[lightIndex] : undefined;
    if (!line) {
      return {
        ok: false,
        error: new HardwareError(`Relay ${lightIndex + 1} is not available`, { lightIndex, operation: "write" })
      };
    }
    try {
      line.relay.write(on ? RELAY_ON_LEVEL : RELAY_OFF_LEVEL);
      return { ok: true };
    } catch (e) {
      const error = new HardwareError(`Relay ${lightIndex + 1} write failed: ${errorMessage(e)}`, {
        lightIndex,
        operation: "write",
        cause: e
      });
      logger.warn({ err: e, lightIndex, pin: line.relay.pin }, "Relay write failed");
      return { ok: false, error };
    }
  }

  close(): void {
    if (this.exported.length === 0) return;
    this.opened = false;
    const lines = this.exported;
    this.exported = [];
    for (const line of lines) {
      const steps =
        line.direction === "out"
          ? [() => line.write(RELAY_OFF_LEVEL), () => line.unexport()]
          : [() => line.unexport()];
      for (const step of steps) {
        try {
          step();
        } catch (e) {
          logger.warn({ err: e, pin: line.pin }, "GPIO cleanup step failed");
        }
      }
    }
    logger.info({ pins: lines.map((l) => l.pin) }, "GPIO released, all relays OFF");
  }
}
