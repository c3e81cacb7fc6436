import { emaSeries } from "@shared/indicators";
import type { Ohlc, Series } from "@shared/types";
import type { Colour } from "@shared/types/chart";

import type { ChartCanvas } from "../canvas";
import type { RenderLayer } from "./layer";

/**
 * EMA of closes, one point per bar at the bar's centre. Warm-up bars have
 * no value and are not joined.
 */
export class MovingAverageLayer<T extends Ohlc = Ohlc> implements RenderLayer<T> {
  constructor(
    private readonly period: number,
    private readonly lineColour: Colour,
  ) {}

  apply(canvas: ChartCanvas, series: Series<T>): void {
    const values = emaSeries(
      series.map((bar) => bar.close),
      this.period,
    );
    const unit = canvas.timeSpan / series.length;

    for (let i = 0; i + 1 < values.length; i++) {
      const current = values[i];
      const next = values[i + 1];
      if (current === undefined || next === undefined) continue;
      if (Number.isNaN(current) || Number.isNaN(next)) continue;

      canvas.line(
        canvas.toPixel(current, (i + 0.5) * unit),
        canvas.toPixel(next, (i + 1.5) * unit),
        this.lineColour,
      );
    }
  }

  legendColour(): Colour | undefined {
    return this.lineColour;
  }

  name(): string {
    return `EMA(${this.period})`;
  }
}
