import { mkdtemp, readdir, readFile, rm, stat } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import sharp from "sharp";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { CodecError, DataValidationError, ResourceError } from "../chart/errors";
import { tinyFont } from "./__fixtures__/canvas";
import { BollingerBandsLayer } from "./layers/bollingerBands";
import { ChartOptions } from "./options";
import { rasterize, renderOhlc, renderOhlcAndSave } from "./renderer";

const series = [
  { open: 10, high: 12, low: 9, close: 11 },
  { open: 11, high: 13, low: 10, close: 12.5 },
  { open: 12.5, high: 12.8, low: 10.5, close: 11 },
  { open: 11, high: 11.5, low: 9.5, close: 10 },
];

const options = ChartOptions.create({
  width: 120,
  height: 80,
  margin: { top: 10, bottom: 10, left: 20, right: 10 },
  title: "test",
  vAxis: { lineFrequency: 1, labelFrequency: 1 },
  hAxis: { lineFrequency: 3600, labelFrequency: 1 },
}).withLayer(new BollingerBandsLayer(2, 2, 0x7f7f7fff));

describe("rasterize", () => {
  it("should produce identical pixels for identical input", () => {
    const a = rasterize(series, options);
    const b = rasterize(series, options);

    expect(a.rgbBytes().equals(b.rgbBytes())).toBe(true);
  });

  it("should size the buffer from the settings", () => {
    const canvas = rasterize(series, options, { font: tinyFont() });
    expect(canvas.rgbBytes()).toHaveLength(120 * 80 * 3);
  });

  it("should reject an empty series", () => {
    expect(() => rasterize([], options)).toThrow(DataValidationError);
  });

  it("should name the first broken bar", () => {
    const broken = [
      { open: 10, high: 12, low: 9, close: 11 },
      { open: 1, high: 2, low: 3, close: 2 },
      { open: 11, high: 13, low: 10, close: 12.5 },
    ];
    expect(() => rasterize(broken, options)).toThrow("bar 1: low>high");
  });
});

describe("renderOhlc", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "candlecast-test-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("should hand the callback a readable RGB PNG", async () => {
    const outcome = await renderOhlc(
      series,
      options,
      async (path) => {
        expect((await stat(path)).isFile()).toBe(true);
        return sharp(path).metadata();
      },
      root,
    );

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.value.format).toBe("png");
      expect(outcome.value.width).toBe(120);
      expect(outcome.value.height).toBe(80);
      expect(outcome.value.channels).toBe(3);
      expect(outcome.value.hasAlpha).toBe(false);
    }
  });

  it("should encode exactly the rasterized pixels", async () => {
    const outcome = await renderOhlc(
      series,
      options,
      (path) => sharp(path).raw().toBuffer(),
      root,
    );

    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.value.equals(rasterize(series, options).rgbBytes())).toBe(true);
    }
  });

  it("should remove the staging directory after the callback", async () => {
    let staged = "";
    await renderOhlc(series, options, (path) => {
      staged = path;
    }, root);

    expect(staged.startsWith(join(root, "candlecast-"))).toBe(true);
    await expect(stat(staged)).rejects.toThrow();
    expect(await readdir(root)).toEqual([]);
  });

  it("should return a failing callback's error and still clean up", async () => {
    const outcome = await renderOhlc(
      series,
      options,
      () => {
        throw new Error("upload refused");
      },
      root,
    );

    expect(outcome).toEqual({ ok: false, error: "upload refused" });
    expect(await readdir(root)).toEqual([]);
  });

  it("should not call back for an invalid series", async () => {
    const onComplete = vi.fn();

    await expect(renderOhlc([], options, onComplete, root)).rejects.toThrow(DataValidationError);
    expect(onComplete).not.toHaveBeenCalled();
    expect(await readdir(root)).toEqual([]);
  });

  it("should raise a resource error when staging cannot be created", async () => {
    const onComplete = vi.fn();

    await expect(
      renderOhlc(series, options, onComplete, join(root, "does-not-exist")),
    ).rejects.toThrow(ResourceError);
    expect(onComplete).not.toHaveBeenCalled();
  });
});

describe("renderOhlcAndSave", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "candlecast-test-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("should write a PNG to the destination", async () => {
    const destination = join(root, "chart.png");
    await renderOhlcAndSave(series, options, destination);

    const signature = (await readFile(destination)).subarray(0, 8);
    expect([...signature]).toEqual([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
  });

  it("should raise a codec error when the destination is unwritable", async () => {
    await expect(
      renderOhlcAndSave(series, options, join(root, "missing", "chart.png")),
    ).rejects.toThrow(CodecError);
  });
});
