import type { IndicatorSpec } from "@shared/schemas";
import type { Ohlc } from "@shared/types";

import { BollingerBandsLayer } from "./layers/bollingerBands";
import type { RenderLayer } from "./layers/layer";
import { MovingAverageLayer } from "./layers/movingAverage";

export function layerFromSpec<T extends Ohlc>(spec: IndicatorSpec): RenderLayer<T> {
  switch (spec.type) {
    case "bollinger":
      return new BollingerBandsLayer<T>(spec.periods, spec.deviations, spec.colour);
    case "ema":
      return new MovingAverageLayer<T>(spec.period, spec.colour);
  }
}
