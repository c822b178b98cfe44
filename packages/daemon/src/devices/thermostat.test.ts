import { beforeEach, describe, expect, it, vi } from "vitest";
import { EventBus } from "../event-bus.js";
import { SmartThermostat } from "./thermostat.js";

describe("SmartThermostat", () => {
  let bus: EventBus;
  let thermostat: SmartThermostat;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    bus = new EventBus();
    thermostat = new SmartThermostat("thermostat_1", "Main Thermostat", bus);
  });

  it("starts off with a 24°C target", () => {
    expect(thermostat.status).toBe("off");
    expect(thermostat.targetTemperature).toBe(24);
  });

  describe("trySetTargetTemperature", () => {
    it.each([18, 21.5, 30])("accepts %s", (temperature) => {
      expect(thermostat.trySetTargetTemperature(temperature)).toBe(true);
      expect(thermostat.targetTemperature).toBe(temperature);
    });

    it.each([17.99, 30.01, -5, Number.NaN])("ignores %s", (temperature) => {
      expect(thermostat.trySetTargetTemperature(temperature)).toBe(false);
      expect(thermostat.targetTemperature).toBe(24);
    });

    it("logs and notifies an accepted target", () => {
      const listener = vi.fn();
      bus.on("device:tunable_changed", listener);

      thermostat.trySetTargetTemperature(22);

      expect(console.log).toHaveBeenCalledWith("[Main Thermostat] Target temperature set to 22°C");
      expect(listener).toHaveBeenCalledWith(
        expect.objectContaining({ tunable: "targetTemperature", value: 22 }),
      );
    });

    it("stays silent on a rejected target", () => {
      const listener = vi.fn();
      bus.on("device:tunable_changed", listener);

      thermostat.trySetTargetTemperature(35);

      expect(listener).not.toHaveBeenCalled();
      expect(console.log).not.toHaveBeenCalled();
    });
  });

  describe("applyCommand", () => {
    it("switches status", () => {
      expect(thermostat.applyCommand({ command: "turn_on" })).toBe(true);
      expect(thermostat.status).toBe("on");
      expect(thermostat.applyCommand({ command: "turn_off" })).toBe(true);
      expect(thermostat.status).toBe("off");
    });

    it("does not support brightness", () => {
      expect(thermostat.applyCommand({ command: "set_brightness", level: 70 })).toBe(false);
    });

    it("sets the target through the command union", () => {
      expect(thermostat.applyCommand({ command: "set_target_temperature", temperature: 19 })).toBe(true);
      expect(thermostat.snapshot()).toEqual({
        kind: "thermostat",
        id: "thermostat_1",
        name: "Main Thermostat",
        status: "off",
        targetTemperature: 19,
      });
    });
  });
});
