import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { type MockInstance, afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { main } from "./cli";

describe("plot cli", () => {
  let dir: string;
  let out: string;
  let log: MockInstance;
  let err: MockInstance;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "tick-chart-cli-"));
    out = path.join(dir, "performance.png");
    log = vi.spyOn(console, "log").mockImplementation(() => {});
    err = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("renders the default dataset with no data flags", () => {
    expect(main(["node", "plot", "--out", out], {})).toBe(0);
    expect(fs.existsSync(out)).toBe(true);
    const bytes = fs.statSync(out).size;
    expect(log).toHaveBeenCalledWith(`Wrote ${out} (1800x1050 @ 150 dpi, ${bytes} bytes)`);
    expect(err).not.toHaveBeenCalled();
  });

  it("takes the output path and dpi from the environment", () => {
    expect(main(["node", "plot"], { CHART_OUTPUT: out, CHART_DPI: "100" })).toBe(0);
    const bytes = fs.statSync(out).size;
    expect(log).toHaveBeenCalledWith(`Wrote ${out} (1200x700 @ 100 dpi, ${bytes} bytes)`);
  });

  it("lets flags win over the environment", () => {
    const env = { CHART_OUTPUT: path.join(dir, "env.png"), CHART_DPI: "100" };
    expect(main(["node", "plot", "-o", out, "--dpi", "50", "--width", "10", "--height", "5"], env)).toBe(0);
    expect(fs.existsSync(out)).toBe(true);
    expect(fs.existsSync(env.CHART_OUTPUT)).toBe(false);
    const bytes = fs.statSync(out).size;
    expect(log).toHaveBeenCalledWith(`Wrote ${out} (500x250 @ 50 dpi, ${bytes} bytes)`);
  });

  it("ignores a malformed environment value when its flag is given", () => {
    const env = { CHART_DPI: "high", TICK_THRESHOLD_MS: "abc" };
    expect(main(["node", "plot", "--out", out, "--dpi", "100", "--threshold", "40"], env)).toBe(0);
    const bytes = fs.statSync(out).size;
    expect(log).toHaveBeenCalledWith(`Wrote ${out} (1200x700 @ 100 dpi, ${bytes} bytes)`);
    expect(err).not.toHaveBeenCalled();
  });

  it("still rejects a malformed environment value nothing overrides", () => {
    expect(main(["node", "plot", "--out", out], { TICK_THRESHOLD_MS: "abc" })).toBe(2);
    expect(err).toHaveBeenCalledWith(
      "error [INVALID_CONFIG]: TICK_THRESHOLD_MS must be a positive number, got NaN",
    );
    expect(fs.existsSync(out)).toBe(false);
  });

  it("reads samples from --data", () => {
    const data = path.join(dir, "ticks.json");
    fs.writeFileSync(
      data,
      JSON.stringify({
        samples: [
          { players: 1, tickTimeMs: 0.5 },
          { players: 250, tickTimeMs: 4 },
        ],
      }),
    );
    expect(main(["node", "plot", "--data", data, "--out", out, "--threshold", "20"], {})).toBe(0);
    expect(fs.existsSync(out)).toBe(true);
  });

  it("exits 2 on an invalid dataset and writes nothing", () => {
    const data = path.join(dir, "dupes.json");
    fs.writeFileSync(
      data,
      JSON.stringify({
        samples: [
          { players: 10, tickTimeMs: 0.5 },
          { players: 10, tickTimeMs: 0.7 },
        ],
      }),
    );
    expect(main(["node", "plot", "--data", data, "--out", out], {})).toBe(2);
    expect(err).toHaveBeenCalledWith("error [INVALID_DATASET]: duplicate playerCount 10");
    expect(fs.existsSync(out)).toBe(false);
  });

  it("exits 2 on a non-positive threshold", () => {
    expect(main(["node", "plot", "--out", out, "--threshold", "0"], {})).toBe(2);
    expect(err).toHaveBeenCalledWith(
      "error [INVALID_THRESHOLD]: threshold must be a finite number > 0, got 0",
    );
  });

  it("exits 4 when the output cannot be written", () => {
    const blocker = path.join(dir, "file");
    fs.writeFileSync(blocker, "");
    expect(main(["node", "plot", "--out", path.join(blocker, "performance.png")], {})).toBe(4);
    expect(err).toHaveBeenCalledTimes(1);
  });

  it("exits non-zero on a malformed flag", () => {
    const stderr = vi.spyOn(process.stderr, "write").mockImplementation(() => true);
    expect(main(["node", "plot", "--dpi", "sharp"], {})).toBe(1);
    expect(stderr).toHaveBeenCalled();
  });
});
