import { measureTimeAsync, renderMetrics } from "@shared/perf/metrics";
import sharp from "sharp";

import { CodecError, describeError } from "../chart/errors";
import { logger } from "../logger";
import type { ChartCanvas } from "./canvas";
import { CHANNELS } from "./raster";

const log = logger.child({ module: "codec" });

/**
 * Write the canvas as an 8-bit RGB PNG (no alpha channel).
 */
export async function encodePng(canvas: ChartCanvas, destination: string): Promise<void> {
  try {
    const { durationMs } = await measureTimeAsync(() =>
      sharp(canvas.rgbBytes(), {
        raw: { width: canvas.width, height: canvas.height, channels: CHANNELS },
      })
        .png()
        .toFile(destination),
    );
    renderMetrics.recordEncode(durationMs);
    log.debug({ destination, durationMs }, "chart encoded");
  } catch (error) {
    throw new CodecError(`failed to write ${destination}: ${describeError(error)}`, error);
  }
}
