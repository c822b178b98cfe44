// ── Device Types ──

export type DeviceKind = "light" | "thermostat";

export type DeviceStatus = "on" | "off";

export type DeviceCommand =
  | { command: "turn_on" }
  | { command: "turn_off" }
  | { command: "set_brightness"; level: number }
  | { command: "set_target_temperature"; temperature: number };

export interface LightState {
  kind: "light";
  id: string;
  name: string;
  status: DeviceStatus;
  brightness: number;
}

export interface ThermostatState {
  kind: "thermostat";
  id: string;
  name: string;
  status: DeviceStatus;
  targetTemperature: number;
}

export type DeviceState = LightState | ThermostatState;

// ── Sensor Types ──

export type SensorKind = "temperature" | "light" | "motion";

export interface SensorValueMap {
  temperature: number; // °C, 2 decimals
  light: number;       // lux, integer
  motion: boolean;
}

export interface SensorReadings {
  temperature: number;
  lightIntensity: number;
  motion: boolean;
}

// ── Time Series ──

export interface TimeSeriesRecord {
  elapsedSeconds: number;
  temperature: number;
  lightIntensity: number;
  motion: 0 | 1;
}

// ── Rule Types ──

export type ThermostatDecision = "cooling" | "heating" | "stable";

export type LightingDecision = "lights_on" | "timeout_off" | "none";

export type RuleName = "thermostat" | "lighting";

export interface RuleOutcome {
  rule: RuleName;
  decision: ThermostatDecision | LightingDecision;
  commands: DeviceCommand[];
  deviceId: string;
}

// ── Loop Types ──

export type LoopState = "stopped" | "running";
