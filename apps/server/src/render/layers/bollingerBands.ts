import { bollingerBands } from "@shared/indicators";
import type { Ohlc, Series } from "@shared/types";
import type { BandPoint, Colour } from "@shared/types/chart";

import type { ChartCanvas } from "../canvas";
import type { RenderLayer } from "./layer";

const BANDS: ReadonlyArray<keyof BandPoint> = ["upper", "median", "lower"];

/**
 * Bollinger Bands over the bars' median price, drawn as three polylines.
 * Each point is shifted forward by (periods + 0.5) bars so it sits on the
 * centre of the bar that follows its window.
 */
export class BollingerBandsLayer<T extends Ohlc = Ohlc> implements RenderLayer<T> {
  constructor(
    private readonly periods: number,
    private readonly deviations: number,
    private readonly lineColour: Colour,
  ) {}

  apply(canvas: ChartCanvas, series: Series<T>): void {
    const bands = bollingerBands(series, this.periods, this.deviations);
    if (bands.length < 2) return;

    const n = series.length;
    const unit = canvas.timeSpan / n;
    const offset = (this.periods + 0.5) * unit;

    for (let i = 0; i < bands.length - 1; i++) {
      const current = bands[i];
      const next = bands[i + 1];
      if (!current || !next) continue;

      const time = i * unit + offset;
      const timeNext = (i + 1) * unit + offset;

      for (const band of BANDS) {
        canvas.line(
          canvas.toPixel(current[band], time),
          canvas.toPixel(next[band], timeNext),
          this.lineColour,
        );
      }
    }
  }

  legendColour(): Colour | undefined {
    return this.lineColour;
  }

  name(): string {
    return `BB(${this.periods}, ${this.deviations})`;
  }
}
