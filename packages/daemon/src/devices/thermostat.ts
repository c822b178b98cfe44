import type { DeviceCommand, DeviceStatus, ThermostatState } from "@hearth/shared";
import type { EventBus } from "../event-bus.js";
import type { ControllableDevice } from "./types.js";
import { publishStatus, publishTunable } from "./notify.js";

export const MIN_TARGET_TEMPERATURE = 18;
export const MAX_TARGET_TEMPERATURE = 30;

export class SmartThermostat implements ControllableDevice {
  readonly kind = "thermostat";

  private currentStatus: DeviceStatus = "off";
  private currentTarget: number;

  constructor(
    readonly id: string,
    readonly name: string,
    private eventBus: EventBus,
    targetTemperature = 24,
  ) {
    this.currentTarget = targetTemperature;
  }

  get status(): DeviceStatus {
    return this.currentStatus;
  }

  get targetTemperature(): number {
    return this.currentTarget;
  }

  turnOn(): void {
    this.currentStatus = "on";
    publishStatus(this.eventBus, this, "on");
  }

  turnOff(): void {
    this.currentStatus = "off";
    publishStatus(this.eventBus, this, "off");
  }

  /** Accepts 18–30 °C inclusive; anything else leaves the target untouched. */
  trySetTargetTemperature(temperature: number): boolean {
    if (!(temperature >= MIN_TARGET_TEMPERATURE && temperature <= MAX_TARGET_TEMPERATURE)) {
      return false;
    }

    this.currentTarget = temperature;
    publishTunable(
      this.eventBus,
      this,
      "targetTemperature",
      temperature,
      `Target temperature set to ${temperature}°C`,
    );
    return true;
  }

  applyCommand(command: DeviceCommand): boolean {
    switch (command.command) {
      case "turn_on":
        this.turnOn();
        return true;
      case "turn_off":
        this.turnOff();
        return true;
      case "set_target_temperature":
        return this.trySetTargetTemperature(command.temperature);
      default:
        return false;
    }
  }

  snapshot(): ThermostatState {
    return {
      kind: this.kind,
      id: this.id,
      name: this.name,
      status: this.currentStatus,
      targetTemperature: this.currentTarget,
    };
  }
}
