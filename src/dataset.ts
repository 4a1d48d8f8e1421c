import fs from "node:fs";
import { InvalidDatasetError, errorMessage } from "./errors";

export type Sample = Readonly<{
  playerCount: number;
  tickTimeMs: number;
}>;

/** Ascending by playerCount, counts unique. Frozen once built. */
export type Dataset = ReadonlyArray<Sample>;

// Tick times in ms
export const DEFAULT_SAMPLES: ReadonlyArray<Sample> = [
  { playerCount: 1, tickTimeMs: 0.24 },
  { playerCount: 10, tickTimeMs: 0.3 },
  { playerCount: 100, tickTimeMs: 0.46 },
  { playerCount: 1000, tickTimeMs: 0.4 },
  { playerCount: 5000, tickTimeMs: 1.42 },
];

export const DEFAULT_THRESHOLD_MS = 50;

export function createDataset(samples: Iterable<Sample>): Dataset {
  const out: Sample[] = [];
  for (const s of samples) {
    const { playerCount, tickTimeMs } = s;
    if (!Number.isInteger(playerCount) || playerCount <= 0) {
      throw new InvalidDatasetError(
        `playerCount must be a positive integer (log scale), got ${playerCount}`,
        playerCount,
      );
    }
    if (!Number.isFinite(tickTimeMs) || tickTimeMs < 0) {
      throw new InvalidDatasetError(
        `tickTimeMs must be a finite number >= 0, got ${tickTimeMs} at playerCount ${playerCount}`,
        tickTimeMs,
      );
    }
    const prev = out[out.length - 1];
    if (prev && playerCount === prev.playerCount) {
      throw new InvalidDatasetError(`duplicate playerCount ${playerCount}`, playerCount);
    }
    if (prev && playerCount < prev.playerCount) {
      throw new InvalidDatasetError(
        `samples must be ascending by playerCount: ${playerCount} after ${prev.playerCount}`,
        playerCount,
      );
    }
    out.push(Object.freeze({ playerCount, tickTimeMs }));
  }
  if (out.length === 0) throw new InvalidDatasetError("dataset is empty", []);
  return Object.freeze(out);
}

/**
 * Reads `{ "samples": [{ "players": 1, "tickTimeMs": 0.24 }, ...] }`.
 */
export function loadDataset(file: string): Dataset {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (e) {
    throw new InvalidDatasetError(`cannot read dataset ${file}: ${errorMessage(e)}`, file, { cause: e });
  }
  return createDataset(parseSamples(raw, file));
}

export function parseSamples(raw: unknown, source = "dataset"): Sample[] {
  const rows = isRecord(raw) ? raw.samples : undefined;
  if (!Array.isArray(rows)) {
    throw new InvalidDatasetError(`${source}: expected an object with a "samples" array`, raw);
  }
  return rows.map((row: unknown, i) => {
    if (!isRecord(row) || typeof row.players !== "number" || typeof row.tickTimeMs !== "number") {
      throw new InvalidDatasetError(
        `${source}: samples[${i}] must have numeric "players" and "tickTimeMs"`,
        row,
      );
    }
    return { playerCount: row.players, tickTimeMs: row.tickTimeMs };
  });
}

export function maxPlayerCount(ds: Dataset): number {
  return Math.max(...ds.map(s => s.playerCount));
}

export function maxTickTime(ds: Dataset): number {
  return Math.max(...ds.map(s => s.tickTimeMs));
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
