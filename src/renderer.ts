import fs from "node:fs";
import path from "node:path";
import { createCanvas, type Canvas } from "@napi-rs/canvas";
import {
  Chart,
  registerables,
  type ChartConfiguration,
  type FontSpec,
  type Plugin,
} from "chart.js";
import { color } from "chart.js/helpers";
import {
  type ChartOverrides,
  type ChartSpec,
  deriveChartSpec,
  visibleAnnotations,
} from "./chartSpec";
import { type Sample, createDataset } from "./dataset";
import { OutputWriteError, RenderBackendError } from "./errors";
import { withPhysicalDpi } from "./png";

Chart.register(...registerables);

export type CanvasFactory = (width: number, height: number) => Canvas;

export type RenderOptions = ChartOverrides & {
  outputPath: string;
};

export type ChartArtifact = {
  path: string;
  format: "png";
  width: number;
  height: number;
  dpi: number;
  bytes: number;
  spec: ChartSpec;
};

type Point = { x: number; y: number };

export class ChartRenderer {
  constructor(private readonly newCanvas: CanvasFactory = (w, h) => createCanvas(w, h)) {}

  /** Validates, renders and writes one PNG. Nothing touches the canvas before validation passes. */
  render(samples: Iterable<Sample>, thresholdMs: number, opts: RenderOptions): ChartArtifact {
    const ds = createDataset(samples);
    const spec = deriveChartSpec(ds, thresholdMs, opts);
    const png = this.rasterize(spec);
    writeArtifact(opts.outputPath, png.buffer);
    return {
      path: opts.outputPath,
      format: "png",
      width: png.width,
      height: png.height,
      dpi: spec.figure.dpi,
      bytes: png.buffer.length,
      spec,
    };
  }

  rasterize(spec: ChartSpec): { buffer: Buffer; width: number; height: number } {
    const live = new Set(Object.values(Chart.instances));
    try {
      const canvas = this.newCanvas(spec.figure.logicalWidth, spec.figure.logicalHeight);
      const chart = new Chart(asCanvasElement(canvas), buildChartConfiguration(spec));
      if (!chart.ctx) throw new Error("canvas returned no 2d context");
      const buffer = withPhysicalDpi(canvas.toBuffer("image/png"), spec.figure.dpi);
      return { buffer, width: canvas.width, height: canvas.height };
    } catch (e) {
      throw new RenderBackendError(e);
    } finally {
      // chart.js registers the instance before its first draw, so a constructor
      // that throws mid-draw still leaves one behind
      for (const c of Object.values(Chart.instances)) {
        if (!live.has(c)) c.destroy();
      }
    }
  }
}

// Outside the DOM chart.js only needs getContext("2d") plus width and height.
function asCanvasElement(canvas: Canvas): HTMLCanvasElement {
  return canvas as unknown as HTMLCanvasElement;
}

/** Writes beside the target and renames, so a failed write leaves nothing behind. */
export function writeArtifact(outputPath: string, bytes: Uint8Array): void {
  const tmp = `${outputPath}.${process.pid}.tmp`;
  try {
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(tmp, bytes);
    fs.renameSync(tmp, outputPath);
  } catch (e) {
    if (fs.existsSync(tmp)) fs.rmSync(tmp, { force: true });
    throw new OutputWriteError(outputPath, e);
  }
}

/** chart.js `order`: lower draws last, so z-order is negated. */
export function drawOrder(zOrder: number): number {
  return -zOrder;
}

/** Any CSS colour chart.js understands, with its alpha replaced. Unparseable input is returned as-is. */
export function withAlpha(value: string, alpha: number): string {
  const c = color(value);
  return c.valid ? c.alpha(alpha).rgbString() : value;
}

export function buildChartConfiguration(spec: ChartSpec): ChartConfiguration<"line", Point[]> {
  const { style, xAxis, yAxis } = spec;
  const font = (size: number, weight: FontSpec["weight"] = "normal"): Partial<FontSpec> => ({
    family: style.fontFamily,
    size,
    weight,
  });
  const shadeColor = withAlpha(style.shade.color, style.shade.alpha);

  return {
    type: "line",
    data: {
      datasets: [
        {
          label: spec.legend.data,
          data: spec.series.map(p => ({ ...p })),
          borderColor: style.data.color,
          backgroundColor: style.data.color,
          borderWidth: style.data.lineWidth,
          borderDash: style.data.dash,
          pointRadius: style.data.markerRadius,
          order: drawOrder(style.data.zOrder),
        },
        {
          label: spec.legend.threshold,
          data: [
            { x: xAxis.min, y: spec.thresholdMs },
            { x: xAxis.max, y: spec.thresholdMs },
          ],
          borderColor: style.threshold.color,
          backgroundColor: style.threshold.color,
          borderWidth: style.threshold.lineWidth,
          borderDash: style.threshold.dash,
          pointRadius: 0,
          order: drawOrder(style.threshold.zOrder),
        },
        {
          label: spec.legend.shade,
          data: spec.series.map(p => ({ x: p.x, y: spec.shade.to })),
          borderColor: shadeColor,
          backgroundColor: shadeColor,
          borderWidth: 0,
          pointRadius: 0,
          fill: { value: spec.shade.from },
          order: drawOrder(style.shade.zOrder),
        },
      ],
    },
    options: {
      responsive: false,
      animation: false,
      events: [],
      devicePixelRatio: spec.figure.pixelRatio,
      layout: { padding: { top: 8, right: 24, bottom: 40, left: 8 } },
      scales: {
        x: {
          type: xAxis.scale,
          min: xAxis.min,
          max: xAxis.max,
          title: {
            display: true,
            text: xAxis.title,
            font: font(style.fontSize.axisTitle, "bold"),
            padding: { top: 10 },
          },
          afterBuildTicks: axis => {
            axis.ticks = axisTicks(spec);
          },
          ticks: {
            autoSkip: false,
            maxRotation: 0,
            font: font(style.fontSize.tick),
            callback: (_value, index, ticks) => ticks[index]?.label ?? "",
          },
          grid: {
            color: ctx => (ctx.tick?.major ? style.grid.majorColor : style.grid.minorColor),
            lineWidth: style.grid.lineWidth,
          },
          border: { dash: style.grid.dash },
        },
        y: {
          type: yAxis.scale,
          min: yAxis.min,
          max: yAxis.max,
          title: {
            display: true,
            text: yAxis.title,
            font: font(style.fontSize.axisTitle, "bold"),
            padding: { bottom: 10 },
          },
          ticks: { font: font(style.fontSize.tick) },
          grid: { color: style.grid.majorColor, lineWidth: style.grid.lineWidth },
          border: { dash: style.grid.dash },
        },
      },
      plugins: {
        title: {
          display: true,
          text: spec.title,
          font: font(style.fontSize.title, "bold"),
          padding: { bottom: 20 },
        },
        legend: {
          position: "top",
          align: "start",
          labels: { font: font(style.fontSize.legend) },
        },
        tooltip: { enabled: false },
      },
    },
    plugins: [backgroundPlugin(style.background), annotationPlugin(spec)],
  };
}

export type AxisTick = { value: number; major: boolean; label: string };

/** Labelled ticks in range, then unlabelled decade subdivisions for the minor grid. */
export function axisTicks(spec: ChartSpec): AxisTick[] {
  const { min, max, ticks, tickLabels, minorTicks } = spec.xAxis;
  const major = ticks
    .map((value, i) => ({ value, major: true, label: tickLabels[i] ?? "" }))
    .filter(t => t.value >= min && t.value <= max);
  const minor = minorTicks.map(value => ({ value, major: false, label: "" }));
  return [...major, ...minor].sort((a, z) => a.value - z.value);
}

function backgroundPlugin(color: string): Plugin<"line"> {
  return {
    id: "background",
    beforeDraw: chart => {
      const { ctx } = chart;
      ctx.save();
      ctx.globalCompositeOperation = "destination-over";
      ctx.fillStyle = color;
      ctx.fillRect(0, 0, chart.width, chart.height);
      ctx.restore();
    },
  };
}

function annotationPlugin(spec: ChartSpec): Plugin<"line"> {
  const { style } = spec;
  return {
    id: "tickAnnotations",
    afterDatasetsDraw: chart => {
      const { ctx, scales } = chart;
      const x = scales.x;
      const y = scales.y;
      if (!x || !y) return;
      ctx.save();
      ctx.textBaseline = "bottom";
      for (const a of visibleAnnotations(spec)) {
        ctx.font = `${a.bold ? "bold " : ""}${a.fontSize}px ${style.fontFamily}`;
        ctx.fillStyle = a.color;
        ctx.textAlign = a.align;
        ctx.fillText(a.text, x.getPixelForValue(a.x), y.getPixelForValue(a.y) + a.offsetY);
      }
      ctx.restore();
    },
    afterDraw: chart => {
      const { ctx } = chart;
      const size = style.fontSize.footnote;
      ctx.save();
      ctx.font = `${size}px ${style.fontFamily}`;
      ctx.fillStyle = style.footnoteColor;
      ctx.textAlign = "right";
      ctx.textBaseline = "bottom";
      const lines = [...spec.footnote].reverse();
      lines.forEach((line, i) => {
        ctx.fillText(line, chart.width - 8, chart.height - 4 - i * size * 1.25);
      });
      ctx.restore();
    },
  };
}
