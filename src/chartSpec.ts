import { type Dataset, maxPlayerCount, maxTickTime } from "./dataset";
import { ConfigError, InvalidThresholdError } from "./errors";

/** Logical pixels per inch; the canvas is scaled by dpi / BASE_DPI on top of this. */
export const BASE_DPI = 100;

export const DEFAULT_TICKS: ReadonlyArray<number> = [1, 10, 100, 1000];

export type Figure = {
  widthIn: number;
  heightIn: number;
  dpi: number;
};

export type LineStyle = {
  color: string;
  lineWidth: number;
  dash: number[];
  // higher draws on top
  zOrder: number;
};

export type ChartStyle = {
  fontFamily: string;
  background: string;
  data: LineStyle & { markerRadius: number };
  threshold: LineStyle;
  shade: { color: string; alpha: number; zOrder: number };
  grid: { majorColor: string; minorColor: string; lineWidth: number; dash: number[] };
  footnoteColor: string;
  fontSize: {
    title: number;
    axisTitle: number;
    tick: number;
    legend: number;
    annotation: number;
    pointLabel: number;
    footnote: number;
  };
};

export const DEFAULT_FIGURE: Figure = { widthIn: 12, heightIn: 7, dpi: 150 };

export const DEFAULT_STYLE: ChartStyle = {
  fontFamily: "DejaVu Sans, Helvetica, Arial, sans-serif",
  background: "#ffffff",
  data: { color: "#1f77b4", lineWidth: 2, dash: [], zOrder: 5, markerRadius: 5 },
  threshold: { color: "#d62728", lineWidth: 2, dash: [8, 5], zOrder: 4 },
  shade: { color: "#ff7f0e", alpha: 0.1, zOrder: 1 },
  grid: {
    majorColor: "rgba(0, 0, 0, 0.2)",
    minorColor: "rgba(0, 0, 0, 0.08)",
    lineWidth: 0.5,
    dash: [4, 4],
  },
  footnoteColor: "#555555",
  fontSize: {
    title: 22,
    axisTitle: 17,
    tick: 13,
    legend: 14,
    annotation: 14,
    pointLabel: 12,
    footnote: 12,
  },
};

export type Annotation = {
  kind: "threshold" | "point";
  text: string;
  // data coordinates
  x: number;
  y: number;
  /** Screen offset in logical px, negative is up. */
  offsetY: number;
  align: "left" | "center";
  color: string;
  bold: boolean;
  fontSize: number;
};

export type ChartSpec = {
  figure: Figure & {
    logicalWidth: number;
    logicalHeight: number;
    pixelRatio: number;
    pixelWidth: number;
    pixelHeight: number;
  };
  style: ChartStyle;
  title: string;
  thresholdMs: number;
  series: ReadonlyArray<{ x: number; y: number }>;
  xAxis: {
    scale: "logarithmic";
    title: string;
    min: number;
    max: number;
    ticks: number[];
    tickLabels: string[];
    minorTicks: number[];
  };
  yAxis: { scale: "linear"; title: string; min: number; max: number };
  shade: { from: number; to: number };
  legend: { data: string; threshold: string; shade: string };
  annotations: Annotation[];
  footnote: string[];
};

export type ChartOverrides = {
  figure?: Partial<Figure>;
  style?: Partial<ChartStyle>;
  defaultTicks?: ReadonlyArray<number>;
};

const countFormat = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

export function formatCount(n: number): string {
  return countFormat.format(n);
}

export function formatTickTime(ms: number): string {
  return `${ms.toFixed(2)} ms`;
}

/** Every dataset count plus the defaults, deduplicated and ascending. */
export function computeTickPositions(
  counts: ReadonlyArray<number>,
  defaults: ReadonlyArray<number> = DEFAULT_TICKS,
): number[] {
  return [...new Set([...counts, ...defaults])].sort((a, z) => a - z);
}

/** 2..9 x 10^k inside [min, max], minus the labelled positions. */
export function minorLogTicks(min: number, max: number, major: ReadonlyArray<number>): number[] {
  const out: number[] = [];
  const taken = new Set(major);
  for (let e = Math.floor(Math.log10(min)); 10 ** e <= max; e++) {
    for (let k = 2; k <= 9; k++) {
      const v = k * 10 ** e;
      if (v >= min && v <= max && !taken.has(v)) out.push(v);
    }
  }
  return out;
}

export function resolveFigure(overrides: Partial<Figure> = {}): ChartSpec["figure"] {
  const fig: Figure = {
    widthIn: overrides.widthIn ?? DEFAULT_FIGURE.widthIn,
    heightIn: overrides.heightIn ?? DEFAULT_FIGURE.heightIn,
    dpi: overrides.dpi ?? DEFAULT_FIGURE.dpi,
  };
  for (const [name, v] of Object.entries(fig)) {
    if (!Number.isFinite(v) || v <= 0) {
      throw new ConfigError(`figure ${name} must be a positive number, got ${v}`);
    }
  }
  const logicalWidth = Math.round(fig.widthIn * BASE_DPI);
  const logicalHeight = Math.round(fig.heightIn * BASE_DPI);
  const pixelRatio = fig.dpi / BASE_DPI;
  return {
    ...fig,
    logicalWidth,
    logicalHeight,
    pixelRatio,
    pixelWidth: Math.floor(logicalWidth * pixelRatio),
    pixelHeight: Math.floor(logicalHeight * pixelRatio),
  };
}

export function deriveChartSpec(
  ds: Dataset,
  thresholdMs: number,
  overrides: ChartOverrides = {},
): ChartSpec {
  if (!Number.isFinite(thresholdMs) || thresholdMs <= 0) {
    throw new InvalidThresholdError(thresholdMs);
  }
  // each spec owns its style; callers may mutate it without touching the defaults
  const style: ChartStyle = structuredClone({ ...DEFAULT_STYLE, ...overrides.style });
  const maxCount = maxPlayerCount(ds);
  const xMin = 1;
  const xMax = maxCount * 1.1;
  const ticks = computeTickPositions(
    ds.map(s => s.playerCount),
    overrides.defaultTicks ?? DEFAULT_TICKS,
  );
  const t = String(thresholdMs);

  const thresholdLabel: Annotation = {
    kind: "threshold",
    text: `${t}ms Tick Limit`,
    x: Math.max(xMin, maxCount * 0.05),
    y: thresholdMs + 2,
    offsetY: 0,
    align: "left",
    color: style.threshold.color,
    bold: true,
    fontSize: style.fontSize.annotation,
  };
  const pointLabels = ds.map((s): Annotation => ({
    kind: "point",
    text: formatTickTime(s.tickTimeMs),
    x: s.playerCount,
    y: s.tickTimeMs,
    offsetY: -10,
    align: "center",
    color: style.data.color,
    bold: false,
    fontSize: style.fontSize.pointLabel,
  }));

  return {
    figure: resolveFigure(overrides.figure),
    style,
    title: "Server Performance Analysis: Tick Time vs Player Count",
    thresholdMs,
    series: ds.map(s => ({ x: s.playerCount, y: s.tickTimeMs })),
    xAxis: {
      scale: "logarithmic",
      title: "Number of Players",
      min: xMin,
      max: xMax,
      ticks,
      tickLabels: ticks.map(formatCount),
      minorTicks: minorLogTicks(xMin, xMax, ticks),
    },
    // fixed on purpose: samples above threshold + 10 are clipped, not rescaled
    yAxis: { scale: "linear", title: "Tick Time (ms)", min: 0, max: thresholdMs + 10 },
    shade: { from: thresholdMs, to: maxTickTime(ds) * 1.2 },
    legend: {
      data: "Measured Tick Time",
      threshold: `${t}ms Threshold`,
      shade: "Under Threshold",
    },
    annotations: [thresholdLabel, ...pointLabels],
    footnote: [
      `Note: Values below ${t}ms indicate optimal server performance.`,
      "Higher values may result in server lag.",
    ],
  };
}

/** Annotations whose anchor lies inside the axes; clipped samples get no label. */
export function visibleAnnotations(spec: ChartSpec): Annotation[] {
  const { xAxis, yAxis } = spec;
  return spec.annotations.filter(
    a => a.x >= xAxis.min && a.x <= xAxis.max && a.y >= yAxis.min && a.y <= yAxis.max,
  );
}
