import type { Ohlc, Series } from "@shared/types";
import type { Colour } from "@shared/types/chart";

import type { ChartCanvas } from "../canvas";
import type { RenderLayer } from "./layer";

export interface CandleColours {
  up: Colour;
  down: Colour;
}

/** Horizontal pixels given to each bar; never less than one. */
export function slotWidth(canvas: ChartCanvas, barCount: number): number {
  return Math.max(1, Math.floor(canvas.drawableWidth / barCount));
}

/** Left edge of bar `index`'s slot. */
export function slotLeft(canvas: ChartCanvas, index: number, barCount: number): number {
  return Math.floor(canvas.timeToX((index * canvas.timeSpan) / barCount));
}

/**
 * OHLC candles. Each bar gets a slot of floor(drawableWidth / n) pixels; a
 * wick spanning low..high is centred in the slot and the open/close body is
 * painted over it. Slots of 4px or more keep a 1px gap on each side of the
 * body.
 */
export class CandleLayer implements RenderLayer {
  constructor(private readonly colours: CandleColours) {}

  apply(canvas: ChartCanvas, series: Series<Ohlc>): void {
    const n = series.length;
    if (n === 0) return;

    const slot = slotWidth(canvas, n);
    const inset = slot >= 4 ? 1 : 0;
    const bodyWidth = slot - 2 * inset;
    const wickWidth = Math.max(1, Math.floor(bodyWidth / 5));
    const wickOffset = Math.floor((slot - wickWidth) / 2);

    series.forEach((bar, index) => {
      const colour = bar.open > bar.close ? this.colours.down : this.colours.up;
      const x0 = slotLeft(canvas, index, n);

      const wickX = x0 + wickOffset;
      canvas.fillRect(
        wickX,
        Math.round(canvas.priceToY(bar.high)),
        wickX + wickWidth - 1,
        Math.round(canvas.priceToY(bar.low)),
        colour,
      );

      const bodyX = x0 + inset;
      canvas.fillRect(
        bodyX,
        Math.round(canvas.priceToY(Math.max(bar.open, bar.close))),
        bodyX + bodyWidth - 1,
        Math.round(canvas.priceToY(Math.min(bar.open, bar.close))),
        colour,
      );
    });
  }

  legendColour(): Colour | undefined {
    return undefined;
  }

  name(): string {
    return "Candles";
  }
}
