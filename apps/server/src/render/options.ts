import { chartSettingsSchema, type ChartSettings, type ChartSettingsInput } from "@shared/schemas";
import type { Ohlc } from "@shared/types";
import type { AxisOptions, Colour, Margin } from "@shared/types/chart";

import type { RenderLayer } from "./layers/layer";

/** Parsed settings with every nested object read-only as well. */
export type FrozenChartSettings = {
  readonly [K in keyof ChartSettings]: ChartSettings[K] extends object
    ? Readonly<ChartSettings[K]>
    : ChartSettings[K];
};

function freezeSettings(input: ChartSettingsInput): FrozenChartSettings {
  const settings = chartSettingsSchema.parse(input);
  return Object.freeze({
    ...settings,
    margin: Object.freeze({ ...settings.margin }),
    hAxis: Object.freeze({ ...settings.hAxis }),
    vAxis: Object.freeze({ ...settings.vAxis }),
  });
}

/**
 * Immutable chart configuration. Every setter returns a new instance, so a
 * value handed to a render call can't change underneath it.
 *
 * @example
 * const options = ChartOptions.create()
 *   .title("BTC 1h")
 *   .vAxis({ lineFrequency: 100, labelFrequency: 1 })
 *   .withLayer(new BollingerBandsLayer(20, 2, 0x7f7f7fff));
 */
export class ChartOptions<T extends Ohlc = Ohlc> {
  private constructor(
    readonly settings: FrozenChartSettings,
    readonly layers: ReadonlyArray<RenderLayer<T>>,
  ) {}

  static create<T extends Ohlc = Ohlc>(settings: ChartSettingsInput = {}): ChartOptions<T> {
    return new ChartOptions<T>(freezeSettings(settings), []);
  }

  private with(patch: ChartSettingsInput): ChartOptions<T> {
    return new ChartOptions<T>(freezeSettings({ ...this.settings, ...patch }), this.layers);
  }

  title(title: string): ChartOptions<T> {
    return this.with({ title });
  }

  textColour(textColour: Colour): ChartOptions<T> {
    return this.with({ textColour });
  }

  valueStrings(valuePrefix: string, valueSuffix: string): ChartOptions<T> {
    return this.with({ valuePrefix, valueSuffix });
  }

  /** Seconds represented by one bar */
  timeUnits(timeUnits: number): ChartOptions<T> {
    return this.with({ timeUnits });
  }

  hAxis(axis: Partial<AxisOptions>): ChartOptions<T> {
    return this.with({ hAxis: { ...this.settings.hAxis, ...axis } });
  }

  vAxis(axis: Partial<AxisOptions>): ChartOptions<T> {
    return this.with({ vAxis: { ...this.settings.vAxis, ...axis } });
  }

  upColour(upColour: Colour): ChartOptions<T> {
    return this.with({ upColour });
  }

  downColour(downColour: Colour): ChartOptions<T> {
    return this.with({ downColour });
  }

  backgroundColour(backgroundColour: Colour): ChartOptions<T> {
    return this.with({ backgroundColour });
  }

  currentValueColour(currentValueColour: Colour): ChartOptions<T> {
    return this.with({ currentValueColour });
  }

  size(width: number, height: number): ChartOptions<T> {
    return this.with({ width, height });
  }

  margin(margin: Margin): ChartOptions<T> {
    return this.with({ margin });
  }

  /** Append an extension layer; extensions run in the order they were added. */
  withLayer(layer: RenderLayer<T>): ChartOptions<T> {
    return new ChartOptions<T>(this.settings, Object.freeze([...this.layers, layer]));
  }
}
