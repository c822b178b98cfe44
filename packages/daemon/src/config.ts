import { resolve } from "path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const configSchema = z.object({
  tickIntervalSeconds: z.number().positive(),
  rules: z.object({
    thermostatBand: z.number().nonnegative(),   // ± °C around the target that counts as stable
    lowLightLux: z.number().nonnegative(),      // below this, motion turns the light on
    motionBrightness: z.number().int().min(0).max(100),
    motionTimeoutSeconds: z.number().nonnegative(),
  }),
  defaults: z.object({
    targetTemperature: z.number().min(18).max(30),
    brightness: z.number().int().min(0).max(100),
  }),
  chart: z.object({
    outputDir: z.string().min(1),
    width: z.number().int().positive(),
    height: z.number().int().positive(),
  }),
});

export type HearthConfig = z.infer<typeof configSchema>;
export type RuleConfig = HearthConfig["rules"];
export type ChartConfig = HearthConfig["chart"];

const defaults: HearthConfig = {
  tickIntervalSeconds: 5,
  rules: {
    thermostatBand: 1,
    lowLightLux: 200,
    motionBrightness: 70,
    motionTimeoutSeconds: 30,
  },
  defaults: {
    targetTemperature: 24,
    brightness: 50,
  },
  chart: {
    outputDir: resolve(process.cwd(), "charts"),
    width: 1000,
    height: 600,
  },
};

function numberFromEnv(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  return Number(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): HearthConfig {
  const candidate: HearthConfig = {
    ...defaults,
    tickIntervalSeconds: numberFromEnv(env.HEARTH_TICK_INTERVAL, defaults.tickIntervalSeconds),
    rules: {
      thermostatBand: numberFromEnv(env.HEARTH_THERMOSTAT_BAND, defaults.rules.thermostatBand),
      lowLightLux: numberFromEnv(env.HEARTH_LOW_LIGHT_LUX, defaults.rules.lowLightLux),
      motionBrightness: numberFromEnv(env.HEARTH_MOTION_BRIGHTNESS, defaults.rules.motionBrightness),
      motionTimeoutSeconds: numberFromEnv(env.HEARTH_MOTION_TIMEOUT, defaults.rules.motionTimeoutSeconds),
    },
    defaults: {
      ...defaults.defaults,
      targetTemperature: numberFromEnv(env.HEARTH_TARGET_TEMPERATURE, defaults.defaults.targetTemperature),
    },
    chart: {
      ...defaults.chart,
      outputDir: env.HEARTH_CHART_DIR ? resolve(env.HEARTH_CHART_DIR) : defaults.chart.outputDir,
    },
  };

  const parsed = configSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return parsed.data;
}
