import type { SensorReadings } from "@hearth/shared";

/**
 * Where sensor samples come from. Hardware in a real install, a random or
 * scripted generator in the simulator.
 */
export interface ValueSource {
  temperature(): number;
  lightLevel(): number;
  motion(): boolean;
}

export const TEMPERATURE_RANGE = { min: 20, max: 30 } as const;
export const LIGHT_RANGE = { min: 100, max: 600 } as const;

/** Uniform samples over the nominal sensor ranges. */
export class RandomValueSource implements ValueSource {
  constructor(private random: () => number = Math.random) {}

  temperature(): number {
    const { min, max } = TEMPERATURE_RANGE;
    return Math.round((min + this.random() * (max - min)) * 100) / 100;
  }

  lightLevel(): number {
    const { min, max } = LIGHT_RANGE;
    return min + Math.floor(this.random() * (max - min + 1));
  }

  motion(): boolean {
    return this.random() < 0.5;
  }
}

type ScriptChannel = "temperature" | "lightLevel" | "motion";

/**
 * Replays a fixed list of readings, one entry per tick. Each channel advances
 * independently, so a tick consumes one entry once all three have been read.
 * Running off the end of the script throws.
 */
export class ScriptedValueSource implements ValueSource {
  private cursor: Record<ScriptChannel, number> = { temperature: 0, lightLevel: 0, motion: 0 };

  constructor(private script: readonly SensorReadings[]) {}

  temperature(): number {
    return this.next("temperature").temperature;
  }

  lightLevel(): number {
    return this.next("lightLevel").lightIntensity;
  }

  motion(): boolean {
    return this.next("motion").motion;
  }

  get remaining(): number {
    const consumed = Math.max(
      this.cursor.temperature,
      this.cursor.lightLevel,
      this.cursor.motion,
    );
    return this.script.length - consumed;
  }

  private next(channel: ScriptChannel): SensorReadings {
    const index = this.cursor[channel];
    const entry = this.script[index];
    if (!entry) {
      throw new Error(`Script exhausted after ${this.script.length} readings`);
    }
    this.cursor[channel] = index + 1;
    return entry;
  }
}
