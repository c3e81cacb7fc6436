import { describe, it, expect } from "vitest";

import { BLACK, makeCanvas } from "../__fixtures__/canvas";
import { TitleLayer } from "./title";

describe("TitleLayer", () => {
  it("should centre the title in the top margin from the left margin", () => {
    const canvas = makeCanvas({ margin: { top: 6, bottom: 2, left: 3, right: 2 } });
    new TitleLayer("Hi", BLACK).apply(canvas, []);

    expect(canvas.pixel(3, 2)).toEqual([0, 0, 0]);
    expect(canvas.pixel(6, 3)).toEqual([0, 0, 0]);
    expect(canvas.pixel(2, 2)).toEqual([255, 255, 255]);
    expect(canvas.pixel(7, 2)).toEqual([255, 255, 255]);
    expect(canvas.pixel(3, 1)).toEqual([255, 255, 255]);
  });

  it("should clamp to the top edge when the margin is shorter than a glyph", () => {
    const canvas = makeCanvas({ margin: { top: 1, bottom: 2, left: 2, right: 2 } });
    new TitleLayer("X", BLACK).apply(canvas, []);

    expect(canvas.pixel(2, 0)).toEqual([0, 0, 0]);
  });

  it("should skip an empty title", () => {
    const canvas = makeCanvas();
    new TitleLayer("", BLACK).apply(canvas, []);
    expect(canvas.rgbBytes().equals(makeCanvas().rgbBytes())).toBe(true);
  });
});
