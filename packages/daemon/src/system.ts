import type { HearthConfig } from "./config.js";
import type { EventBus } from "./event-bus.js";
import { SmartLight } from "./devices/light.js";
import { SmartThermostat } from "./devices/thermostat.js";
import type { SmartDevice } from "./devices/types.js";
import { Sensor, type AnySensor } from "./sensors/sensor.js";
import type { ValueSource } from "./sensors/value-source.js";
import { TimeSeriesRecorder } from "./history/recorder.js";

export const LIGHT_ID = "light_1";
export const THERMOSTAT_ID = "thermostat_1";
export const TEMPERATURE_SENSOR_ID = "temp_sensor_1";
export const LIGHT_SENSOR_ID = "light_sensor_1";
export const MOTION_SENSOR_ID = "motion_sensor_1";

/**
 * Everything the control loop owns for one home: the two actuators, the three
 * sensors (also indexed by id) and the recorded series.
 */
export interface HomeSystem {
  devices: ReadonlyMap<string, SmartDevice>;
  sensors: ReadonlyMap<string, AnySensor>;
  light: SmartLight;
  thermostat: SmartThermostat;
  temperatureSensor: Sensor<"temperature">;
  lightSensor: Sensor<"light">;
  motionSensor: Sensor<"motion">;
  recorder: TimeSeriesRecorder;
}

export function createHomeSystem(
  config: Pick<HearthConfig, "defaults">,
  source: ValueSource,
  eventBus: EventBus,
): HomeSystem {
  const light = new SmartLight(LIGHT_ID, "Living Room Light", eventBus, config.defaults.brightness);
  const thermostat = new SmartThermostat(
    THERMOSTAT_ID,
    "Main Thermostat",
    eventBus,
    config.defaults.targetTemperature,
  );

  const temperatureSensor = new Sensor(TEMPERATURE_SENSOR_ID, "Temperature Sensor", "temperature", source);
  const lightSensor = new Sensor(LIGHT_SENSOR_ID, "Light Sensor", "light", source);
  const motionSensor = new Sensor(MOTION_SENSOR_ID, "Motion Sensor", "motion", source);

  const devices = new Map<string, SmartDevice>([
    [light.id, light],
    [thermostat.id, thermostat],
  ]);
  const sensors = new Map<string, AnySensor>([
    [temperatureSensor.id, temperatureSensor],
    [lightSensor.id, lightSensor],
    [motionSensor.id, motionSensor],
  ]);

  console.log(`[Init] ${devices.size} devices, ${sensors.size} sensors`);

  return {
    devices,
    sensors,
    light,
    thermostat,
    temperatureSensor,
    lightSensor,
    motionSensor,
    recorder: new TimeSeriesRecorder(),
  };
}
