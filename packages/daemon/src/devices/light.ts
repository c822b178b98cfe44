import type { DeviceCommand, DeviceStatus, LightState } from "@hearth/shared";
import type { EventBus } from "../event-bus.js";
import type { ControllableDevice } from "./types.js";
import { publishStatus, publishTunable } from "./notify.js";

export const MIN_BRIGHTNESS = 0;
export const MAX_BRIGHTNESS = 100;

export class SmartLight implements ControllableDevice {
  readonly kind = "light";

  private currentStatus: DeviceStatus = "off";
  private currentBrightness: number;

  constructor(
    readonly id: string,
    readonly name: string,
    private eventBus: EventBus,
    brightness = 50,
  ) {
    this.currentBrightness = brightness;
  }

  get status(): DeviceStatus {
    return this.currentStatus;
  }

  get brightness(): number {
    return this.currentBrightness;
  }

  turnOn(): void {
    this.currentStatus = "on";
    publishStatus(this.eventBus, this, "on");
  }

  turnOff(): void {
    this.currentStatus = "off";
    publishStatus(this.eventBus, this, "off");
  }

  /** Accepts 0–100 inclusive; anything else leaves the light untouched. */
  trySetBrightness(level: number): boolean {
    if (!(level >= MIN_BRIGHTNESS && level <= MAX_BRIGHTNESS)) return false;

    this.currentBrightness = level;
    publishTunable(this.eventBus, this, "brightness", level, `Brightness set to ${level}%`);
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
      case "set_brightness":
        return this.trySetBrightness(command.level);
      default:
        return false;
    }
  }

  snapshot(): LightState {
    return {
      kind: this.kind,
      id: this.id,
      name: this.name,
      status: this.currentStatus,
      brightness: this.currentBrightness,
    };
  }
}
