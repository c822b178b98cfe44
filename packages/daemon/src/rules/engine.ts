import type { DeviceCommand, RuleOutcome } from "@hearth/shared";
import type { EventBus } from "../event-bus.js";
import type { RuleConfig } from "../config.js";
import type { SmartLight } from "../devices/light.js";
import type { SmartThermostat } from "../devices/thermostat.js";
import type { ControllableDevice } from "../devices/types.js";
import { decideThermostat } from "./thermostat.js";
import { decideLighting, type LightingPolicy } from "./lighting.js";

export interface RuleTargets {
  light: SmartLight;
  thermostat: SmartThermostat;
}

export class RuleEngine {
  private lastMotionTime: number;
  private lightingPolicy: LightingPolicy;

  constructor(
    private targets: RuleTargets,
    private rules: RuleConfig,
    private eventBus: EventBus,
    initialMotionTime: number,
  ) {
    this.lastMotionTime = initialMotionTime;
    this.lightingPolicy = {
      lowLightLux: rules.lowLightLux,
      motionBrightness: rules.motionBrightness,
      motionTimeoutMs: rules.motionTimeoutSeconds * 1000,
    };
  }

  getLastMotionTime(): number {
    return this.lastMotionTime;
  }

  applyThermostatRule(currentTemperature: number): RuleOutcome {
    const thermostat = this.targets.thermostat;
    const target = thermostat.targetTemperature;
    const verdict = decideThermostat(currentTemperature, target, this.rules.thermostatBand);

    switch (verdict.decision) {
      case "cooling":
        console.log(`[Thermostat] Cooling needed. Current: ${currentTemperature}°C, Target: ${target}°C`);
        break;
      case "heating":
        console.log(`[Thermostat] Heating needed. Current: ${currentTemperature}°C, Target: ${target}°C`);
        break;
      case "stable":
        console.log(`[Thermostat] Temperature stable. Current: ${currentTemperature}°C`);
        break;
    }

    thermostat.applyCommand(verdict.command);
    return this.report({
      rule: "thermostat",
      decision: verdict.decision,
      commands: [verdict.command],
      deviceId: thermostat.id,
    });
  }

  applyLightingRule(motion: boolean, lux: number, now: number): RuleOutcome {
    const light = this.targets.light;
    const verdict = decideLighting(
      { motion, lux, lightStatus: light.status, now, lastMotionTime: this.lastMotionTime },
      this.lightingPolicy,
    );
    this.lastMotionTime = verdict.lastMotionTime;

    if (verdict.decision === "timeout_off") {
      console.log(
        `[RuleEngine] No motion detected for ${this.rules.motionTimeoutSeconds} seconds. Turning off light.`,
      );
    }

    this.dispatch(light, verdict.commands);
    return this.report({
      rule: "lighting",
      decision: verdict.decision,
      commands: verdict.commands,
      deviceId: light.id,
    });
  }

  private dispatch(device: ControllableDevice, commands: DeviceCommand[]): void {
    for (const command of commands) {
      // Out-of-domain commands are silent no-ops by contract.
      device.applyCommand(command);
    }
  }

  private report(outcome: RuleOutcome): RuleOutcome {
    this.eventBus.emit("rule:fired", { ...outcome, timestamp: Date.now() });
    return outcome;
  }
}
