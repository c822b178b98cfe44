import type { TimeSeriesRecord } from "@hearth/shared";
import type { ControlLoop } from "../control/control-loop.js";
import type { TimeSeriesRecorder } from "../history/recorder.js";
import type { RenderSink } from "../history/chart-renderer.js";
import { ControlLoopStateError } from "../errors.js";

export interface LifecycleOptions {
  loop: ControlLoop;
  recorder: TimeSeriesRecorder;
  sink: RenderSink;
  intervalSeconds: number;
}

/**
 * Runs the control loop in the background, waits for a stop signal, then
 * stops the loop, waits for it to exit and hands the series to the sink.
 */
export class LifecycleCoordinator {
  private used = false;

  constructor(private opts: LifecycleOptions) {}

  async run(stopSignal: Promise<unknown>): Promise<readonly TimeSeriesRecord[]> {
    const { loop, recorder, sink, intervalSeconds } = this.opts;
    if (this.used) {
      throw new ControlLoopStateError("Lifecycle coordinator has already run");
    }
    // Stopping and joining are only ours to do for a run started here.
    if (loop.running) {
      throw new ControlLoopStateError("Control loop is already running");
    }
    this.used = true;

    const loopDone = loop.start(intervalSeconds);
    console.log("[Lifecycle] System is running. Press Ctrl+C to stop.");

    try {
      await Promise.race([stopSignal, loopDone]);
    } finally {
      loop.stop();
      // Join before export: no row can be appended after this point.
      await loopDone;
    }

    const series = recorder.export();
    try {
      await sink.render(series);
    } catch (error) {
      console.error("[Lifecycle] Render sink failed:", error);
      throw error;
    }

    console.log("[Lifecycle] System stopped gracefully.");
    return series;
  }
}
