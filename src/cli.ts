import { Command, CommanderError, InvalidArgumentError } from "commander";
import { loadRenderConfig } from "./config/render";
import { DEFAULT_SAMPLES, loadDataset } from "./dataset";
import { errorMessage, isChartError } from "./errors";
import { ChartRenderer } from "./renderer";

type CliOptions = {
  data?: string;
  threshold?: number;
  out?: string;
  dpi?: number;
  width?: number;
  height?: number;
};

function parseNumber(value: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n)) {
    throw new InvalidArgumentError(`not a number: ${value}`);
  }
  return n;
}

export function buildProgram(): Command {
  return new Command()
    .name("plot")
    .description("Render the tick time vs player count chart as a PNG")
    .option("-d, --data <file>", "JSON file with { samples: [{ players, tickTimeMs }] }")
    .option("-t, --threshold <ms>", "Acceptable tick time in ms", parseNumber)
    .option("-o, --out <file>", "Output PNG path")
    .option("--dpi <n>", "Output resolution", parseNumber)
    .option("--width <in>", "Figure width in inches", parseNumber)
    .option("--height <in>", "Figure height in inches", parseNumber)
    .exitOverride();
}

/**
 * Runs one render and returns the process exit code.
 * Flags win over CHART_* / TICK_THRESHOLD_MS from the environment.
 */
export function main(
  argv: string[] = process.argv,
  env: Record<string, string | undefined> = process.env,
  renderer = new ChartRenderer(),
): number {
  const program = buildProgram();
  try {
    program.parse(argv);
    const opts = program.opts<CliOptions>();
    const cfg = loadRenderConfig(env, {
      outputPath: opts.out,
      dpi: opts.dpi,
      thresholdMs: opts.threshold,
      dataPath: opts.data,
    });
    const samples = cfg.dataPath ? loadDataset(cfg.dataPath) : DEFAULT_SAMPLES;

    const artifact = renderer.render(samples, cfg.thresholdMs, {
      outputPath: cfg.outputPath,
      figure: { dpi: cfg.dpi, widthIn: opts.width, heightIn: opts.height },
    });
    console.log(
      `Wrote ${artifact.path} (${artifact.width}x${artifact.height} @ ${artifact.dpi} dpi, ${artifact.bytes} bytes)`,
    );
    return 0;
  } catch (e) {
    // commander already printed usage or the parse error
    if (e instanceof CommanderError) return e.exitCode;
    if (isChartError(e)) {
      console.error(`error [${e.code}]: ${e.message}`);
      return e.exitCode;
    }
    console.error(`error: ${errorMessage(e)}`);
    return 1;
  }
}
