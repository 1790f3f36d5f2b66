import { createAdapter } from "./adapters/createAdapter.js";
import type { LightIoAdapter } from "./adapters/lightIo.js";
import type { AppConfig } from "./config.js";
import { FAULT_LUX } from "./engine/electrical.js";
import { ReconciliationEngine } from "./engine/reconcile.js";
import { type LightsConfig, faultIndexes, loadLightsConfig } from "./lightsConfig.js";
import { LightStore } from "./store/lightStore.js";
import type { LightRecord, LightTable } from "./types.js";

export interface Controller {
  lightsConfig: LightsConfig;
  adapter: LightIoAdapter;
  store: LightStore;
  engine: ReconciliationEngine;
}

export function createController(cfg: AppConfig): Controller {
  const lightsConfig = loadLightsConfig(cfg.LIGHTS_CONFIG_PATH);
  const adapter = createAdapter(cfg, lightsConfig);
  const store = new LightStore(lightsConfig.lights.length);
  const engine = new ReconciliationEngine({ store, adapter, faultIndexes: faultIndexes(lightsConfig) });
  return { lightsConfig, adapter, store, engine };
}

// Both adapters report bright readings at or above this level.
const BRIGHT_LUX_FLOOR = 100;

export function describeLight(light: LightRecord): string {
  const sensor = light.lux === FAULT_LUX ? "FAILED" : light.lux >= BRIGHT_LUX_FLOOR ? "BRIGHT" : "DARK";
  return `Light ${light.id}: ${light.relay_state} | lux ${light.lux} (${sensor}) | ${light.voltage} V ${light.current} A`;
}

export function describeTable(table: LightTable): string[] {
  return table.map(describeLight);
}
