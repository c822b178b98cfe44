import type { DeviceStatus } from "@hearth/shared";
import type { EventBus } from "../event-bus.js";

interface NamedDevice {
  readonly id: string;
  readonly name: string;
}

export function publishStatus(
  eventBus: EventBus,
  device: NamedDevice,
  status: DeviceStatus,
): void {
  console.log(`[${device.name}] Status changed to: ${status}`);
  eventBus.emit("device:status_changed", {
    deviceId: device.id,
    name: device.name,
    status,
    timestamp: Date.now(),
  });
}

export function publishTunable(
  eventBus: EventBus,
  device: NamedDevice,
  tunable: "brightness" | "targetTemperature",
  value: number,
  message: string,
): void {
  console.log(`[${device.name}] ${message}`);
  eventBus.emit("device:tunable_changed", {
    deviceId: device.id,
    name: device.name,
    tunable,
    value,
    timestamp: Date.now(),
  });
}
