import type { DeviceCommand, DeviceStatus, LightingDecision } from "@hearth/shared";

export interface LightingInput {
  motion: boolean;
  lux: number;
  lightStatus: DeviceStatus;
  now: number;            // ms
  lastMotionTime: number; // ms
}

export interface LightingPolicy {
  lowLightLux: number;
  motionBrightness: number;
  motionTimeoutMs: number;
}

export interface LightingVerdict {
  decision: LightingDecision;
  commands: DeviceCommand[];
  lastMotionTime: number;
}

export function decideLighting(input: LightingInput, policy: LightingPolicy): LightingVerdict {
  if (input.motion) {
    const commands: DeviceCommand[] =
      input.lux < policy.lowLightLux && input.lightStatus === "off"
        ? [{ command: "turn_on" }, { command: "set_brightness", level: policy.motionBrightness }]
        : [];
    return {
      decision: commands.length > 0 ? "lights_on" : "none",
      commands,
      lastMotionTime: input.now,
    };
  }

  if (input.lightStatus === "on" && input.now - input.lastMotionTime > policy.motionTimeoutMs) {
    return {
      decision: "timeout_off",
      commands: [{ command: "turn_off" }],
      lastMotionTime: input.lastMotionTime,
    };
  }

  return { decision: "none", commands: [], lastMotionTime: input.lastMotionTime };
}
