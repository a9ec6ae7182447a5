import type { Label, RawDataset } from "./types.js";

export interface SineWaveOptions {
  length: number;
  period?: number;
  amplitude?: number;
}

export function makeSineWave(options: SineWaveOptions): number[] {
  const period = options.period ?? 50;
  const amplitude = options.amplitude ?? 1;
  return Array.from({ length: options.length }, (_, t) => amplitude * Math.sin((2 * Math.PI * t) / period));
}

/**
 * A sine wave of 1000 points with two injected anomalies: a level shift over
 * [300, 320) and a spike at 700. Same output on every call.
 */
export function demonstrationTimeSeries(): RawDataset {
  const series = makeSineWave({ length: 1000, period: 100 });
  const labels: Label[] = series.map(() => 0);

  for (let t = 300; t < 320; t++) {
    series[t] += 2;
    labels[t] = 1;
  }
  series[700] -= 3;
  labels[700] = 1;

  return {
    series,
    labels,
    metadata: { source: "synthetic", name: "demonstration" },
  };
}
