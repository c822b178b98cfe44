import { EventEmitter } from "events";
import type {
  DeviceStatus,
  RuleOutcome,
  SensorKind,
  TimeSeriesRecord,
} from "@hearth/shared";
import type { SensorReadError } from "./errors.js";

export interface EventBusEvents {
  "device:status_changed": (data: {
    deviceId: string;
    name: string;
    status: DeviceStatus;
    timestamp: number;
  }) => void;
  "device:tunable_changed": (data: {
    deviceId: string;
    name: string;
    tunable: "brightness" | "targetTemperature";
    value: number;
    timestamp: number;
  }) => void;
  "sensor:read": (data: {
    sensorId: string;
    kind: SensorKind;
    value: number | boolean;
    timestamp: number;
  }) => void;
  "rule:fired": (data: RuleOutcome & { timestamp: number }) => void;
  "tick:completed": (data: {
    runId: string | null;
    tick: number;
    record: TimeSeriesRecord;
  }) => void;
  "tick:failed": (data: {
    runId: string | null;
    tick: number;
    errors: SensorReadError[];
  }) => void;
  "loop:started": (data: {
    runId: string;
    intervalSeconds: number;
    timestamp: number;
  }) => void;
  "loop:stopped": (data: {
    runId: string;
    ticks: number;
    timestamp: number;
  }) => void;
}

export class EventBus {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  on<K extends keyof EventBusEvents>(
    event: K,
    listener: EventBusEvents[K],
  ): void {
    this.emitter.on(event, listener);
  }

  off<K extends keyof EventBusEvents>(
    event: K,
    listener: EventBusEvents[K],
  ): void {
    this.emitter.off(event, listener);
  }

  emit<K extends keyof EventBusEvents>(
    event: K,
    ...args: Parameters<EventBusEvents[K]>
  ): void {
    this.emitter.emit(event, ...args);
  }
}
