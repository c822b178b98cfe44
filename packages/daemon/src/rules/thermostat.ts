import type { DeviceCommand, ThermostatDecision } from "@hearth/shared";

export interface ThermostatVerdict {
  decision: ThermostatDecision;
  command: DeviceCommand;
}

/**
 * Heating and cooling both switch the thermostat on; the device has no mode.
 * The band edges count as stable.
 */
export function decideThermostat(
  currentTemperature: number,
  targetTemperature: number,
  band: number,
): ThermostatVerdict {
  if (currentTemperature > targetTemperature + band) {
    return { decision: "cooling", command: { command: "turn_on" } };
  }
  if (currentTemperature < targetTemperature - band) {
    return { decision: "heating", command: { command: "turn_on" } };
  }
  return { decision: "stable", command: { command: "turn_off" } };
}
