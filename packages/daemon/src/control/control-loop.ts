import { v4 as uuid } from "uuid";
import type {
  LoopState,
  RuleOutcome,
  SensorKind,
  SensorValueMap,
  TimeSeriesRecord,
} from "@hearth/shared";
import type { EventBus } from "../event-bus.js";
import type { HomeSystem } from "../system.js";
import type { RuleEngine } from "../rules/engine.js";
import type { Sensor } from "../sensors/sensor.js";
import { systemClock, type Clock } from "../clock.js";
import { ControlLoopStateError, SensorReadError } from "../errors.js";

export interface ControlLoopOptions {
  system: HomeSystem;
  ruleEngine: RuleEngine;
  eventBus: EventBus;
  clock?: Clock;
}

export interface TickResult {
  tick: number;
  record: TimeSeriesRecord | null;
  outcomes: RuleOutcome[];
  errors: SensorReadError[];
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Poll → record → decide, once per interval. The only suspension point is the
 * sleep between ticks, so `stop()` never lands inside a tick.
 */
export class ControlLoop {
  private state: LoopState = "stopped";
  private abort: AbortController | null = null;
  private runId: string | null = null;
  private ticks = 0;
  private readonly startTime: number;
  private lastNow: number;
  private readonly clock: Clock;
  private readonly system: HomeSystem;
  private readonly ruleEngine: RuleEngine;
  private readonly eventBus: EventBus;

  constructor(opts: ControlLoopOptions) {
    this.system = opts.system;
    this.ruleEngine = opts.ruleEngine;
    this.eventBus = opts.eventBus;
    this.clock = opts.clock ?? systemClock;
    this.startTime = this.clock.now();
    this.lastNow = this.startTime;
  }

  get running(): boolean {
    return this.state === "running";
  }

  get tickCount(): number {
    return this.ticks;
  }

  /**
   * Runs until `stop()` is called. The returned promise settles once the loop
   * has fully exited.
   */
  start(intervalSeconds: number): Promise<void> {
    if (this.state === "running") {
      return Promise.reject(new ControlLoopStateError("Control loop is already running"));
    }

    const abort = new AbortController();
    const runId = uuid();
    this.state = "running";
    this.abort = abort;
    this.runId = runId;

    console.log("[ControlLoop] Starting Home Automation System...");
    this.eventBus.emit("loop:started", {
      runId,
      intervalSeconds,
      timestamp: this.clock.now(),
    });

    return this.run(runId, intervalSeconds * 1000, abort);
  }

  /** Idempotent. Wakes the loop from its sleep; a tick in progress always completes. */
  stop(): void {
    if (this.state === "stopped") return;

    this.state = "stopped";
    this.abort?.abort();
    console.log("\n[ControlLoop] Stopping Home Automation System");
  }

  /** One poll → record → decide cycle. */
  tick(): TickResult {
    const tick = ++this.ticks;
    // Never behind the previous tick, even if the clock steps back.
    const now = Math.max(this.clock.now(), this.lastNow);
    this.lastNow = now;
    const elapsedSeconds = roundTo2((now - this.startTime) / 1000);
    const errors: SensorReadError[] = [];

    console.log("\n--- Reading Sensor Data ---");
    const temperature = this.readSensor(this.system.temperatureSensor, errors);
    const lightIntensity = this.readSensor(this.system.lightSensor, errors);
    const motion = this.readSensor(this.system.motionSensor, errors);

    let record: TimeSeriesRecord | null = null;
    if (temperature !== null && lightIntensity !== null && motion !== null) {
      record = { elapsedSeconds, temperature, lightIntensity, motion: motion ? 1 : 0 };
      this.system.recorder.append(record);
    } else {
      this.eventBus.emit("tick:failed", { runId: this.runId, tick, errors });
    }

    // Rules run only on inputs read this tick.
    const outcomes: RuleOutcome[] = [];
    if (temperature !== null) {
      outcomes.push(this.ruleEngine.applyThermostatRule(temperature));
    }
    if (motion !== null && lightIntensity !== null) {
      outcomes.push(this.ruleEngine.applyLightingRule(motion, lightIntensity, now));
    }

    if (record) {
      this.eventBus.emit("tick:completed", { runId: this.runId, tick, record });
    }
    return { tick, record, outcomes, errors };
  }

  private async run(runId: string, intervalMs: number, abort: AbortController): Promise<void> {
    const firstTick = this.ticks;
    try {
      while (!abort.signal.aborted) {
        this.tick();
        if (abort.signal.aborted) break;
        await sleep(intervalMs, abort.signal);
      }
    } finally {
      // A later start() may already own the loop state.
      if (this.abort === abort) {
        this.state = "stopped";
        this.abort = null;
      }
      const ticks = this.ticks - firstTick;
      this.eventBus.emit("loop:stopped", { runId, ticks, timestamp: this.clock.now() });
      console.log(`[ControlLoop] Stopped after ${ticks} ticks`);
    }
  }

  private readSensor<K extends SensorKind>(
    sensor: Sensor<K>,
    errors: SensorReadError[],
  ): SensorValueMap[K] | null {
    try {
      const value = sensor.read();
      console.log(`${sensor.name}: ${String(value)}`);
      this.eventBus.emit("sensor:read", {
        sensorId: sensor.id,
        kind: sensor.kind,
        value,
        timestamp: this.clock.now(),
      });
      return value;
    } catch (err) {
      if (!(err instanceof SensorReadError)) throw err;
      console.error(`[ControlLoop] ${err.message}`);
      errors.push(err);
      return null;
    }
  }
}
