import type { AppConfig } from "../config.js";
import type { LightsConfig } from "../lightsConfig.js";
import { GpioLightAdapter } from "./gpio.js";
import type { LightIoAdapter } from "./lightIo.js";
import { SimulatedLightAdapter } from "./simulated.js";

export function createAdapter(
  cfg: Pick<AppConfig, "LIGHT_ADAPTER" | "GPIO_SYSFS_ROOT">,
  lightsConfig: LightsConfig
): LightIoAdapter {
  switch (cfg.LIGHT_ADAPTER) {
    case "gpio":
      return new GpioLightAdapter({ root: cfg.GPIO_SYSFS_ROOT, lights: lightsConfig.lights });
    case "simulated":
      return new SimulatedLightAdapter({ count: lightsConfig.lights.length });
  }
}
