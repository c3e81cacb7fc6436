import { renderMetrics, measureTime } from "@shared/perf/metrics";
import type { Ohlc, Series } from "@shared/types";

import type { ChartCanvas } from "./canvas";
import { decimalsFor } from "./format";
import { CandleLayer } from "./layers/candles";
import { CurrentValueLayer } from "./layers/currentValue";
import { GridLines } from "./layers/gridLines";
import type { RenderLayer } from "./layers/layer";
import { TitleLayer } from "./layers/title";
import type { ChartOptions } from "./options";

const DEFAULT_VALUE_DECIMALS = 2;

/**
 * Layers in paint order: grid, candles, current value, extensions in
 * registration order, title last.
 */
export function buildLayers<T extends Ohlc>(options: ChartOptions<T>): RenderLayer<T>[] {
  const s = options.settings;
  const decimals =
    s.vAxis.lineFrequency > 0 ? decimalsFor(s.vAxis.lineFrequency) : DEFAULT_VALUE_DECIMALS;

  return [
    new GridLines({
      vAxis: s.vAxis,
      hAxis: s.hAxis,
      textColour: s.textColour,
      valuePrefix: s.valuePrefix,
      valueSuffix: s.valueSuffix,
    }),
    new CandleLayer({ up: s.upColour, down: s.downColour }),
    new CurrentValueLayer({
      colour: s.currentValueColour,
      decimals,
      valuePrefix: s.valuePrefix,
      valueSuffix: s.valueSuffix,
    }),
    ...options.layers,
    new TitleLayer(s.title, s.textColour),
  ];
}

/**
 * Run every layer against the canvas, one after another.
 * @returns Per-layer durations, in paint order
 */
export function runPipeline<T extends Ohlc>(
  canvas: ChartCanvas,
  series: Series<T>,
  layers: ReadonlyArray<RenderLayer<T>>,
): Array<{ layer: string; durationMs: number }> {
  return layers.map((layer) => {
    const { durationMs } = measureTime(() => layer.apply(canvas, series));
    const name = layer.name();
    renderMetrics.recordLayer(name, durationMs);
    return { layer: name, durationMs };
  });
}
