import type { SensorKind } from "@hearth/shared";

/**
 * Base class for every error raised by the controller.
 */
export class HearthError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HearthError";
  }
}

/**
 * A sensor could not produce a usable sample. Fatal for the tick that hit it,
 * never for the loop.
 */
export class SensorReadError extends HearthError {
  constructor(
    readonly sensorId: string,
    readonly kind: SensorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Sensor ${sensorId} (${kind}): ${message}`, options);
    this.name = "SensorReadError";
  }
}

/**
 * The control loop or its coordinator was asked to do something its current
 * state does not allow (starting twice, running a coordinator twice).
 */
export class ControlLoopStateError extends HearthError {
  constructor(message: string) {
    super(message);
    this.name = "ControlLoopStateError";
  }
}

export class ConfigError extends HearthError {
  constructor(readonly issues: string[]) {
    super(`Invalid config: ${issues.join(", ")}`);
    this.name = "ConfigError";
  }
}
