import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { existsSync } from "node:fs";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { TimeSeriesRecord } from "@hearth/shared";
import {
  CHART_TITLE,
  ChartRenderSink,
  buildSeriesChartSpec,
  renderSeriesSvg,
} from "./chart-renderer.js";

const series: TimeSeriesRecord[] = [
  { elapsedSeconds: 0, temperature: 26, lightIntensity: 180, motion: 1 },
  { elapsedSeconds: 5, temperature: 24.5, lightIntensity: 300, motion: 0 },
];

describe("buildSeriesChartSpec", () => {
  it("lays out one line per metric over elapsed time", () => {
    const spec = buildSeriesChartSpec(series, { width: 800, height: 400 });

    expect(spec).toMatchObject({
      title: CHART_TITLE,
      width: 800,
      height: 400,
      data: {
        values: [
          { elapsedSeconds: 0, metric: "Temperature (°C)", value: 26 },
          { elapsedSeconds: 0, metric: "Light Intensity (lux)", value: 180 },
          { elapsedSeconds: 0, metric: "Motion Detected (1=Yes, 0=No)", value: 1 },
          { elapsedSeconds: 5, metric: "Temperature (°C)", value: 24.5 },
          { elapsedSeconds: 5, metric: "Light Intensity (lux)", value: 300 },
          { elapsedSeconds: 5, metric: "Motion Detected (1=Yes, 0=No)", value: 0 },
        ],
      },
      encoding: {
        x: { field: "elapsedSeconds", title: "Time (seconds)" },
        y: { field: "value", title: "Sensor Values" },
        color: {
          field: "metric",
          scale: { range: ["red", "orange", "blue"] },
        },
      },
    });
  });
});

describe("renderSeriesSvg", () => {
  it("produces an SVG document carrying the title", async () => {
    const svg = await renderSeriesSvg(buildSeriesChartSpec(series, { width: 400, height: 200 }));

    expect(svg.startsWith("<svg")).toBe(true);
    expect(svg).toContain(CHART_TITLE);
  });
});

describe("ChartRenderSink", () => {
  let dir: string;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    dir = await mkdtemp(join(tmpdir(), "hearth-chart-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes nothing for an empty series", async () => {
    const outputDir = join(dir, "charts");
    await new ChartRenderSink({ outputDir, width: 400, height: 200 }).render([]);

    expect(existsSync(outputDir)).toBe(false);
    expect(console.log).toHaveBeenCalledWith("[ChartRenderer] No readings recorded, skipping chart");
  });

  it("writes SVG and PNG charts", async () => {
    const outputDir = join(dir, "charts");
    await new ChartRenderSink({ outputDir, width: 400, height: 200 }).render(series);

    const svg = await readFile(join(outputDir, "sensor-readings.svg"), "utf8");
    const png = await readFile(join(outputDir, "sensor-readings.png"));
    expect(svg.startsWith("<svg")).toBe(true);
    expect([...png.subarray(0, 4)]).toEqual([0x89, 0x50, 0x4e, 0x47]);
  });
});
