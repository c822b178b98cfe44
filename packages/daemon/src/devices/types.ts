import type {
  DeviceCommand,
  DeviceKind,
  DeviceState,
  DeviceStatus,
} from "@hearth/shared";
import type { SmartLight } from "./light.js";
import type { SmartThermostat } from "./thermostat.js";

/**
 * Capability surface every device variant exposes to the rule engine.
 * `applyCommand` returns whether the command took effect; a command outside
 * the variant's capabilities or domain is a no-op that returns false.
 */
export interface ControllableDevice {
  readonly id: string;
  readonly name: string;
  readonly kind: DeviceKind;
  readonly status: DeviceStatus;

  turnOn(): void;
  turnOff(): void;
  applyCommand(command: DeviceCommand): boolean;
  snapshot(): DeviceState;
}

export type SmartDevice = SmartLight | SmartThermostat;
