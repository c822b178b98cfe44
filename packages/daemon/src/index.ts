import { loadConfig } from "./config.js";
import { EventBus } from "./event-bus.js";
import { systemClock } from "./clock.js";
import { createHomeSystem } from "./system.js";
import { RandomValueSource } from "./sensors/value-source.js";
import { RuleEngine } from "./rules/engine.js";
import { ControlLoop } from "./control/control-loop.js";
import { ChartRenderSink } from "./history/chart-renderer.js";
import { LifecycleCoordinator } from "./lifecycle/coordinator.js";
import { waitForShutdownSignal } from "./lifecycle/signals.js";

async function main() {
  console.log("🏠 Hearth — Home Automation Simulator");
  console.log("=====================================\n");

  // 1. Load config
  const config = loadConfig();

  // 2. Init EventBus
  const eventBus = new EventBus();

  // 3. Devices, sensors and recorder
  const system = createHomeSystem(config, new RandomValueSource(), eventBus);

  // 4. Rules and loop share one clock so elapsed time and motion timeout agree
  const ruleEngine = new RuleEngine(
    { light: system.light, thermostat: system.thermostat },
    config.rules,
    eventBus,
    systemClock.now(),
  );
  const loop = new ControlLoop({ system, ruleEngine, eventBus, clock: systemClock });

  // 5. Run until Ctrl+C, then chart what was recorded
  const coordinator = new LifecycleCoordinator({
    loop,
    recorder: system.recorder,
    sink: new ChartRenderSink(config.chart),
    intervalSeconds: config.tickIntervalSeconds,
  });
  await coordinator.run(waitForShutdownSignal());

  console.log("Goodbye!");
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
