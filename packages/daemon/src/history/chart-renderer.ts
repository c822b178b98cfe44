import * as vl from "vega-lite";
import type { TopLevelSpec } from "vega-lite";
import * as vega from "vega";
import { Resvg } from "@resvg/resvg-js";
import { mkdir, writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { TimeSeriesRecord } from "@hearth/shared";
import type { ChartConfig } from "../config.js";

export const CHART_TITLE = "Smart Home Sensor Readings Over Time";

export const SERIES = [
  { field: "temperature", label: "Temperature (°C)", color: "red" },
  { field: "lightIntensity", label: "Light Intensity (lux)", color: "orange" },
  { field: "motion", label: "Motion Detected (1=Yes, 0=No)", color: "blue" },
] as const;

export interface RenderSink {
  render(series: readonly TimeSeriesRecord[]): Promise<void>;
}

/**
 * Build a Vega-Lite line chart with one line per metric, sharing the elapsed
 * time axis.
 */
export function buildSeriesChartSpec(
  series: readonly TimeSeriesRecord[],
  size: { width: number; height: number },
): TopLevelSpec {
  const values = series.flatMap((row) =>
    SERIES.map((s) => ({
      elapsedSeconds: row.elapsedSeconds,
      metric: s.label,
      value: row[s.field],
    })),
  );

  return {
    title: CHART_TITLE,
    width: size.width,
    height: size.height,
    background: "white",
    data: { values },
    mark: { type: "line", point: false },
    encoding: {
      x: { field: "elapsedSeconds", type: "quantitative", title: "Time (seconds)" },
      y: { field: "value", type: "quantitative", title: "Sensor Values" },
      color: {
        field: "metric",
        type: "nominal",
        scale: {
          domain: SERIES.map((s) => s.label),
          range: SERIES.map((s) => s.color),
        },
        legend: { title: null },
      },
    },
    config: {
      axis: { grid: true },
    },
  };
}

/**
 * Compile the chart to SVG via Vega's headless renderer.
 */
export async function renderSeriesSvg(spec: TopLevelSpec): Promise<string> {
  const vegaSpec = vl.compile(spec).spec;
  const view = new vega.View(vega.parse(vegaSpec), { renderer: "none" });

  const svg = await view.toSVG();
  view.finalize();
  return svg;
}

export function svgToPng(svg: string): Buffer {
  const resvg = new Resvg(svg, {
    background: "white",
    font: {
      loadSystemFonts: true,
      defaultFontFamily: "sans-serif",
    },
  });
  return Buffer.from(resvg.render().asPng());
}

/** Writes the recorded series as SVG and PNG charts under the configured directory. */
export class ChartRenderSink implements RenderSink {
  constructor(private config: ChartConfig) {}

  async render(series: readonly TimeSeriesRecord[]): Promise<void> {
    if (series.length === 0) {
      console.log("[ChartRenderer] No readings recorded, skipping chart");
      return;
    }

    console.log("\n[ChartRenderer] Generating visualization...");
    const spec = buildSeriesChartSpec(series, this.config);
    const svg = await renderSeriesSvg(spec);
    const png = svgToPng(svg);

    await mkdir(this.config.outputDir, { recursive: true });
    const svgPath = resolve(this.config.outputDir, "sensor-readings.svg");
    const pngPath = resolve(this.config.outputDir, "sensor-readings.png");
    await writeFile(svgPath, svg);
    await writeFile(pngPath, png);
    console.log(`[ChartRenderer] Wrote ${series.length} rows to ${pngPath}`);
  }
}
