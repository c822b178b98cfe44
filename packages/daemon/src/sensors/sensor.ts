import type { SensorKind, SensorValueMap } from "@hearth/shared";
import { SensorReadError } from "../errors.js";
import type { ValueSource } from "./value-source.js";

type SamplerMap = { [K in SensorKind]: (source: ValueSource) => SensorValueMap[K] };
type CheckMap = { [K in SensorKind]: (value: SensorValueMap[K]) => boolean };

const SAMPLERS: SamplerMap = {
  temperature: (source) => source.temperature(),
  light: (source) => source.lightLevel(),
  motion: (source) => source.motion(),
};

// Sources can be hardware or user code; reject anything the kind cannot hold.
const CHECKS: CheckMap = {
  temperature: (value) => typeof value === "number" && Number.isFinite(value),
  light: (value) => typeof value === "number" && Number.isInteger(value),
  motion: (value) => typeof value === "boolean",
};

export class Sensor<K extends SensorKind> {
  private current: SensorValueMap[K] | null = null;

  constructor(
    readonly id: string,
    readonly name: string,
    readonly kind: K,
    private source: ValueSource,
  ) {}

  /** Last sample; null before the first read and after a failed one. */
  get value(): SensorValueMap[K] | null {
    return this.current;
  }

  read(): SensorValueMap[K] {
    let sample: SensorValueMap[K];
    try {
      sample = SAMPLERS[this.kind](this.source);
    } catch (err) {
      this.current = null;
      const reason = err instanceof Error ? err.message : String(err);
      throw new SensorReadError(this.id, this.kind, `read failed: ${reason}`, { cause: err });
    }

    if (!CHECKS[this.kind](sample)) {
      this.current = null;
      throw new SensorReadError(this.id, this.kind, `unusable sample ${String(sample)}`);
    }

    this.current = sample;
    return sample;
  }
}

export type AnySensor = Sensor<"temperature"> | Sensor<"light"> | Sensor<"motion">;
