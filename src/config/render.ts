import { DEFAULT_FIGURE } from "../chartSpec";
import { DEFAULT_THRESHOLD_MS } from "../dataset";
import { ConfigError } from "../errors";

export type RenderConfig = {
  outputPath: string;
  dpi: number;
  thresholdMs: number;
  dataPath?: string;
};

type Env = Record<string, string | undefined>;

/**
 * Render plan. A value given in `flags` wins and its environment variable is never read.
 * Flag values are checked where they are used (threshold and figure validation).
 */
export function loadRenderConfig(
  env: Env = process.env,
  flags: Partial<RenderConfig> = {},
): RenderConfig {
  const cfg: RenderConfig = {
    outputPath: flags.outputPath ?? env.CHART_OUTPUT ?? "performance.png",
    dpi: flags.dpi ?? envNumber(env, "CHART_DPI", DEFAULT_FIGURE.dpi),
    thresholdMs: flags.thresholdMs ?? envNumber(env, "TICK_THRESHOLD_MS", DEFAULT_THRESHOLD_MS),
    dataPath: flags.dataPath ?? (env.CHART_DATA || undefined),
  };
  if (!cfg.outputPath.trim()) throw new ConfigError("output path must not be empty");
  return cfg;
}

function envNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  return requirePositive(name, Number(raw));
}

export function requirePositive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigError(`${name} must be a positive number, got ${value}`);
  }
  return value;
}
