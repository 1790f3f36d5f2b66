import type { LightTable, SystemStats } from "../types.js";
import { BUS_VOLTAGE_V, FAULT_LUX } from "./electrical.js";

export const DEFAULT_CURRENT_WARNING_THRESHOLD_A = 6.0;

/**
 * Fleet totals over the lights that are ON. Bus voltage is constant once any
 * load is present, so it is not summed.
 */
export function computeStats(
  table: LightTable,
  opts: { currentWarningThresholdA?: number } = {}
): SystemStats {
  const threshold = opts.currentWarningThresholdA ?? DEFAULT_CURRENT_WARNING_THRESHOLD_A;
  const on = table.filter((light) => light.relay_state === "ON");

  const totalCurrent = Number(on.reduce((acc, light) => acc + light.current, 0).toFixed(1));
  const totalLux = Math.round(on.reduce((acc, light) => acc + light.lux, 0));

  return {
    total_voltage: on.length > 0 ? BUS_VOLTAGE_V : 0,
    total_current: totalCurrent,
    total_lux: totalLux,
    system_status: totalCurrent > threshold ? "Warning: High Current" : "No Fault",
    lights_on: on.length,
    faulted_lights: table.filter((light) => light.lux === FAULT_LUX).map((light) => light.id)
  };
}
