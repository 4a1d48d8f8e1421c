/**
 * Error taxonomy for the chart pipeline.
 * Every failure carries a stable code and the process exit code the CLI reports.
 */

export type ChartErrorCode =
  | "INVALID_DATASET"
  | "INVALID_THRESHOLD"
  | "INVALID_CONFIG"
  | "RENDER_BACKEND_FAILURE"
  | "OUTPUT_WRITE_FAILURE";

export const EXIT_CODES: Record<ChartErrorCode, number> = {
  INVALID_DATASET: 2,
  INVALID_THRESHOLD: 2,
  INVALID_CONFIG: 2,
  RENDER_BACKEND_FAILURE: 3,
  OUTPUT_WRITE_FAILURE: 4,
};

export abstract class ChartError extends Error {
  abstract readonly code: ChartErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

export class InvalidDatasetError extends ChartError {
  readonly code = "INVALID_DATASET";

  constructor(message: string, readonly value?: unknown, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class InvalidThresholdError extends ChartError {
  readonly code = "INVALID_THRESHOLD";

  constructor(readonly value: number) {
    super(`threshold must be a finite number > 0, got ${value}`);
  }
}

export class ConfigError extends ChartError {
  readonly code = "INVALID_CONFIG";
}

/** Canvas or chart.js failure; the backend's own message is kept as-is. */
export class RenderBackendError extends ChartError {
  readonly code = "RENDER_BACKEND_FAILURE";

  constructor(cause: unknown) {
    super(`render backend failed: ${errorMessage(cause)}`, { cause });
  }
}

export class OutputWriteError extends ChartError {
  readonly code = "OUTPUT_WRITE_FAILURE";

  constructor(readonly path: string, cause: unknown) {
    super(`cannot write ${path}: ${errorMessage(cause)}`, { cause });
  }
}

export function isChartError(e: unknown): e is ChartError {
  return e instanceof ChartError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
