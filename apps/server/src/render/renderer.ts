import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { measureTime, renderMetrics } from "@shared/perf/metrics";
import type { Ohlc, Series } from "@shared/types";

import { describeError, ResourceError } from "../chart/errors";
import { summarize } from "../chart/summary";
import { validateSeries } from "../chart/validate";
import { logger } from "../logger";
import { ChartCanvas } from "./canvas";
import { encodePng } from "./codec";
import type { GlyphFont } from "./glyphs";
import type { ChartOptions } from "./options";
import { buildLayers, runPipeline } from "./pipeline";

const log = logger.child({ module: "render" });

export type CallbackOutcome<R> = { ok: true; value: R } | { ok: false; error: string };

export interface RasterizeOptions {
  font?: GlyphFont;
}

/**
 * Validate, size and paint the chart in memory. Identical inputs always
 * produce identical pixels.
 *
 * @throws DataValidationError before anything is allocated
 */
export function rasterize<T extends Ohlc>(
  series: Series<T>,
  options: ChartOptions<T>,
  { font }: RasterizeOptions = {},
): ChartCanvas {
  validateSeries(series);

  const { result: canvas, durationMs } = measureTime(() => {
    const summary = summarize(series);
    const s = options.settings;

    const chart = new ChartCanvas({
      width: s.width,
      height: s.height,
      margin: s.margin,
      high: summary.high,
      low: summary.low,
      timeSpan: series.length * s.timeUnits,
      background: s.backgroundColour,
      font,
    });

    const timings = runPipeline(chart, series, buildLayers(options));
    log.debug({ bars: series.length, timings }, "chart layers applied");
    return chart;
  });

  renderMetrics.recordRasterize(durationMs);
  return canvas;
}

/**
 * Render, then write the PNG to `destination`.
 */
export async function renderOhlcAndSave<T extends Ohlc>(
  series: Series<T>,
  options: ChartOptions<T>,
  destination: string,
): Promise<void> {
  const canvas = rasterize(series, options);
  await encodePng(canvas, destination);
}

/**
 * Render into a private staging directory and hand the PNG's path to
 * `onComplete`. The directory is removed once `onComplete` settles, whatever
 * the outcome, so the callback must finish with the file before it returns.
 *
 * Validation, staging and codec failures reject. A failing callback does
 * not: its error comes back as `{ ok: false }`. A directory that can't be
 * removed is logged and never replaces the render or callback outcome.
 */
export async function renderOhlc<T extends Ohlc, R>(
  series: Series<T>,
  options: ChartOptions<T>,
  onComplete: (path: string) => R | Promise<R>,
  stagingRoot: string = tmpdir(),
): Promise<CallbackOutcome<R>> {
  validateSeries(series);

  let dir: string;
  try {
    dir = await mkdtemp(join(stagingRoot, "candlecast-"));
  } catch (error) {
    throw new ResourceError(`failed to create staging directory: ${describeError(error)}`, error);
  }

  try {
    const path = join(dir, "chart.png");
    await renderOhlcAndSave(series, options, path);
    log.debug({ path }, "chart staged");

    try {
      return { ok: true, value: await onComplete(path) };
    } catch (error) {
      return { ok: false, error: describeError(error) };
    }
  } finally {
    await removeStaging(dir);
  }
}

async function removeStaging(dir: string): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
  } catch (error) {
    log.warn({ dir, err: error }, "failed to remove staging directory");
  }
}
