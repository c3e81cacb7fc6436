/**
 * Render Metrics
 * Dev-only timing for rasterize, per-layer and encode durations.
 * Recording never feeds back into rendering.
 */

const isDev = typeof process !== 'undefined'
  ? process.env.NODE_ENV === 'development'
  : false;

export interface LatencyStats {
  count: number;
  min: number;
  max: number;
  mean: number;
  p50: number;
  p95: number;
  p99: number;
}

/**
 * Histogram for tracking latency distributions
 */
export class LatencyHistogram {
  private measurements: number[] = [];

  constructor(private readonly maxSize = 1000) {}

  record(latencyMs: number): void {
    this.measurements.push(latencyMs);
    if (this.measurements.length > this.maxSize) {
      this.measurements.shift();
    }
  }

  getStats(): LatencyStats | null {
    if (this.measurements.length === 0) return null;

    const sorted = [...this.measurements].sort((a, b) => a - b);
    const count = sorted.length;

    return {
      count,
      min: sorted[0] ?? 0,
      max: sorted[count - 1] ?? 0,
      mean: sorted.reduce((sum, val) => sum + val, 0) / count,
      p50: sorted[Math.floor(count * 0.5)] ?? 0,
      p95: sorted[Math.floor(count * 0.95)] ?? 0,
      p99: sorted[Math.floor(count * 0.99)] ?? 0,
    };
  }

  clear(): void {
    this.measurements = [];
  }
}

export interface RenderMetricsSnapshot {
  rendersTotal: number;
  rasterize: LatencyStats | null;
  encode: LatencyStats | null;
  layers: Record<string, LatencyStats>;
}

class RenderMetrics {
  private rasterizeHistogram = new LatencyHistogram();
  private encodeHistogram = new LatencyHistogram();
  private layerHistograms = new Map<string, LatencyHistogram>();
  private rendersTotal = 0;

  private enabled = isDev;

  /**
   * Record a full rasterize pass (validation through title)
   */
  recordRasterize(durationMs: number): void {
    if (!this.enabled) return;
    this.rendersTotal++;
    this.rasterizeHistogram.record(durationMs);
  }

  recordEncode(durationMs: number): void {
    if (!this.enabled) return;
    this.encodeHistogram.record(durationMs);
  }

  /**
   * Record one layer's apply() duration, keyed by the layer's name()
   */
  recordLayer(layerName: string, durationMs: number): void {
    if (!this.enabled) return;

    let histogram = this.layerHistograms.get(layerName);
    if (!histogram) {
      histogram = new LatencyHistogram();
      this.layerHistograms.set(layerName, histogram);
    }
    histogram.record(durationMs);
  }

  getLayerStats(layerName: string): LatencyStats | null {
    return this.layerHistograms.get(layerName)?.getStats() ?? null;
  }

  getSnapshot(): RenderMetricsSnapshot {
    const layers: Record<string, LatencyStats> = {};
    this.layerHistograms.forEach((histogram, name) => {
      const stats = histogram.getStats();
      if (stats) {
        layers[name] = stats;
      }
    });

    return {
      rendersTotal: this.rendersTotal,
      rasterize: this.rasterizeHistogram.getStats(),
      encode: this.encodeHistogram.getStats(),
      layers,
    };
  }

  clear(): void {
    this.rasterizeHistogram.clear();
    this.encodeHistogram.clear();
    this.layerHistograms.clear();
    this.rendersTotal = 0;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  isEnabled(): boolean {
    return this.enabled;
  }
}

export const renderMetrics = new RenderMetrics();

/**
 * Measure execution time of a function
 * @param fn - Function to measure
 * @returns Result and duration in milliseconds
 */
export function measureTime<T>(fn: () => T): { result: T; durationMs: number } {
  const start = performance.now();
  const result = fn();
  const durationMs = performance.now() - start;
  return { result, durationMs };
}

/**
 * Measure execution time of an async function
 */
export async function measureTimeAsync<T>(
  fn: () => Promise<T>,
): Promise<{ result: T; durationMs: number }> {
  const start = performance.now();
  const result = await fn();
  const durationMs = performance.now() - start;
  return { result, durationMs };
}
