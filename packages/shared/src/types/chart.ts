/**
 * Chart rendering structures shared between the engine and its callers
 */

/** Packed 0xRRGGBBAA. An alpha of 0 means "leave the pixel alone". */
export type Colour = number;

export type Rgb = readonly [r: number, g: number, b: number];

export interface Margin {
  top: number;
  bottom: number;
  left: number;
  right: number;
}

export interface PixelPoint {
  x: number;
  y: number;
}

export interface BandPoint {
  upper: number;
  median: number;
  lower: number;
}

export interface AxisOptions {
  lineColour: Colour;
  /** Price interval (vertical axis) or seconds (horizontal axis); <= 0 disables the lines */
  lineFrequency: number;
  /** Label every n-th grid multiple; 0 disables labels */
  labelFrequency: number;
}

export function unpackColour(colour: Colour): { rgb: Rgb; alpha: number } {
  const c = colour >>> 0;
  return {
    rgb: [(c >>> 24) & 0xff, (c >>> 16) & 0xff, (c >>> 8) & 0xff],
    alpha: c & 0xff,
  };
}

export function packColour(r: number, g: number, b: number, a: number = 0xff): Colour {
  return (((r & 0xff) << 24) | ((g & 0xff) << 16) | ((b & 0xff) << 8) | (a & 0xff)) >>> 0;
}
