import type { Ohlc, Series } from "@shared/types";
import type { AxisOptions, Colour } from "@shared/types/chart";
import { formatElapsed } from "@shared/utils/time";

import type { ChartCanvas } from "../canvas";
import { decimalsFor, formatValue } from "../format";
import type { RenderLayer } from "./layer";

// float slack when deciding whether a bound is itself a multiple
const EPSILON = 1e-9;
// gap between a label and the plot area
const LABEL_GAP = 2;

export interface GridLinesOptions {
  /** Price lines, frequency in price units */
  vAxis: AxisOptions;
  /** Time lines, frequency in seconds */
  hAxis: AxisOptions;
  textColour: Colour;
  valuePrefix: string;
  valueSuffix: string;
}

function labelled(k: number, labelFrequency: number): boolean {
  return labelFrequency > 0 && k % labelFrequency === 0;
}

/**
 * Horizontal lines at every multiple of the price interval within the
 * price range, vertical lines at every multiple of the time interval, with
 * optional labels in the left and bottom margins. Grids denser than one
 * line per pixel are skipped.
 */
export class GridLines implements RenderLayer {
  constructor(private readonly options: GridLinesOptions) {}

  apply(canvas: ChartCanvas, _series: Series<Ohlc>): void {
    this.drawPriceLines(canvas);
    this.drawTimeLines(canvas);
  }

  private drawPriceLines(canvas: ChartCanvas): void {
    const { vAxis, textColour, valuePrefix, valueSuffix } = this.options;
    const interval = vAxis.lineFrequency;
    if (!(interval > 0) || !Number.isFinite(interval)) return;

    const first = Math.ceil(canvas.low / interval - EPSILON);
    const last = Math.floor(canvas.high / interval + EPSILON);
    if (last - first + 1 > canvas.drawableHeight + 1) return;

    const { left } = canvas.margin;
    const right = left + canvas.drawableWidth - 1;
    const decimals = decimalsFor(interval);
    const maxLabelWidth = left - LABEL_GAP;

    for (let k = first; k <= last; k++) {
      const price = k * interval;
      const y = Math.round(canvas.priceToY(price));
      canvas.fillRect(left, y, right, y, vAxis.lineColour);

      if (!labelled(k, vAxis.labelFrequency)) continue;

      const label = canvas.font.truncate(
        formatValue(price, decimals, valuePrefix, valueSuffix),
        maxLabelWidth,
      );
      if (label.length === 0) continue;

      canvas.text(
        {
          x: left - LABEL_GAP - canvas.textWidth(label),
          y: y - Math.floor(canvas.font.height / 2),
        },
        label,
        textColour,
      );
    }
  }

  private drawTimeLines(canvas: ChartCanvas): void {
    const { hAxis, textColour } = this.options;
    const interval = hAxis.lineFrequency;
    if (!(interval > 0) || !Number.isFinite(interval) || canvas.timeSpan <= 0) return;

    const last = Math.floor(canvas.timeSpan / interval + EPSILON);
    if (last + 1 > canvas.drawableWidth + 1) return;

    const { top } = canvas.margin;
    const bottom = top + canvas.drawableHeight - 1;
    const labelY = canvas.height - canvas.margin.bottom + LABEL_GAP;
    const labelSpacing =
      (interval * Math.max(1, hAxis.labelFrequency) * canvas.drawableWidth) / canvas.timeSpan;

    for (let k = 0; k <= last; k++) {
      const elapsed = k * interval;
      const x = Math.round(canvas.timeToX(elapsed));
      canvas.fillRect(x, top, x, bottom, hAxis.lineColour);

      if (!labelled(k, hAxis.labelFrequency)) continue;

      const label = canvas.font.truncate(formatElapsed(elapsed), labelSpacing - LABEL_GAP);
      if (label.length === 0) continue;

      canvas.text(
        { x: x - Math.floor(canvas.textWidth(label) / 2), y: labelY },
        label,
        textColour,
      );
    }
  }

  legendColour(): Colour | undefined {
    return undefined;
  }

  name(): string {
    return "GridLines";
  }
}
