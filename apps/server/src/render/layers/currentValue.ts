import type { Ohlc, Series } from "@shared/types";
import type { Colour } from "@shared/types/chart";

import type { ChartCanvas } from "../canvas";
import { formatValue } from "../format";
import type { RenderLayer } from "./layer";
import { slotLeft, slotWidth } from "./candles";

const MARKER_RADIUS = 3;
const LABEL_GAP = 2;

export interface CurrentValueOptions {
  colour: Colour;
  decimals: number;
  valuePrefix: string;
  valueSuffix: string;
}

/**
 * Horizontal line at the last close, a diamond on the last bar and, when
 * the right margin has room, the value itself.
 */
export class CurrentValueLayer implements RenderLayer {
  constructor(private readonly options: CurrentValueOptions) {}

  apply(canvas: ChartCanvas, series: Series<Ohlc>): void {
    const last = series[series.length - 1];
    if (!last) return;

    const { colour } = this.options;
    const y = Math.round(canvas.priceToY(last.close));
    const { left } = canvas.margin;

    canvas.fillRect(left, y, left + canvas.drawableWidth - 1, y, colour);

    const n = series.length;
    const cx = slotLeft(canvas, n - 1, n) + Math.floor(slotWidth(canvas, n) / 2);
    for (let dy = -MARKER_RADIUS; dy <= MARKER_RADIUS; dy++) {
      const reach = MARKER_RADIUS - Math.abs(dy);
      canvas.fillRect(cx - reach, y + dy, cx + reach, y + dy, colour);
    }

    this.drawLabel(canvas, last.close, y);
  }

  private drawLabel(canvas: ChartCanvas, value: number, y: number): void {
    const room = canvas.margin.right - LABEL_GAP;
    if (room < canvas.font.width) return;

    const { colour, decimals, valuePrefix, valueSuffix } = this.options;
    const label = canvas.font.truncate(formatValue(value, decimals, valuePrefix, valueSuffix), room);

    canvas.text(
      { x: canvas.width - canvas.margin.right + LABEL_GAP, y: y - Math.floor(canvas.font.height / 2) },
      label,
      colour,
    );
  }

  legendColour(): Colour | undefined {
    return this.options.colour;
  }

  name(): string {
    return "CurrentValue";
  }
}
