export type RelayState = "ON" | "OFF";

export type ManualAction = "on" | "off";

export interface LightRecord {
  id: number; // 1..4, display id (index + 1)
  relay_state: RelayState;
  voltage: number;
  current: number;
  lux: number; // -1 = sensor fault / unmeasured
}

export type LightTable = LightRecord[];

export type SystemStatus = "No Fault" | "Warning: High Current";

export interface SystemStats {
  total_voltage: number;
  total_current: number;
  total_lux: number;
  system_status: SystemStatus;
  lights_on: number;
  faulted_lights: number[];
}

export interface ChartSeries {
  labels: string[];
  data: number[];
}

export interface ChartHistory {
  voltage: ChartSeries;
  current: ChartSeries;
}

export interface Range {
  min: number;
  max: number;
}

export type RandomSource = () => number;
