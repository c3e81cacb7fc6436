import type { Ohlc, Series } from "@shared/types";
import type { Colour } from "@shared/types/chart";

import type { ChartCanvas } from "../canvas";
import type { RenderLayer } from "./layer";

/** Chart title, vertically centred in the top margin. */
export class TitleLayer implements RenderLayer {
  constructor(
    private readonly title: string,
    private readonly colour: Colour,
  ) {}

  apply(canvas: ChartCanvas, _series: Series<Ohlc>): void {
    if (this.title.length === 0) return;

    const y = Math.max(0, Math.floor((canvas.margin.top - canvas.font.height) / 2));
    canvas.text({ x: canvas.margin.left, y }, this.title, this.colour);
  }

  legendColour(): Colour | undefined {
    return undefined;
  }

  name(): string {
    return "Title";
  }
}
