import type { Ohlc, Series } from "@shared/types";
import type { Colour } from "@shared/types/chart";

import type { ChartCanvas } from "../canvas";

/**
 * One drawing step. Layers paint straight into the shared canvas in
 * pipeline order, so a later layer overwrites an earlier one wherever they
 * touch the same pixel. A layer must not keep the canvas past apply().
 */
export interface RenderLayer<T extends Ohlc = Ohlc> {
  apply(canvas: ChartCanvas, series: Series<T>): void;
  /** Colour to show in a legend, if the layer has one */
  legendColour(): Colour | undefined;
  name(): string;
}
