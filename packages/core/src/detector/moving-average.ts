import { z } from "zod";
import type { TimeSeries } from "../dataset/types.js";
import { euclidean, std } from "./stats.js";
import type { Detector, DetectorFactory } from "./types.js";

const parameters = z
  .object({
    window: z.number().int().min(1).default(10),
  })
  .strict();

type MovingAverageParams = z.infer<typeof parameters>;

/** Distance from each point to the mean of the `window` points before it. */
export function trailingResiduals(series: TimeSeries, window: number): number[] {
  return series.map((point, t) => {
    if (t === 0) return 0;
    const history = series.slice(Math.max(0, t - window), t);
    const center = point.map((_, d) => history.reduce((sum, p) => sum + p[d], 0) / history.length);
    return euclidean(point, center);
  });
}

export class MovingAverageDetector implements Detector {
  private window: number;
  private scale: number | null = null;

  constructor(params: MovingAverageParams) {
    this.window = params.window;
  }

  fit(series: TimeSeries): void {
    const spread = std(trailingResiduals(series, this.window));
    this.scale = spread > 0 ? spread : 1;
  }

  score(series: TimeSeries): number[] {
    const scale = this.scale;
    if (scale === null) throw new Error("moving-average: fit must be called before score");
    return trailingResiduals(series, this.window).map((r) => r / scale);
  }
}

export const movingAverageDetector: DetectorFactory<MovingAverageParams> = {
  id: "moving-average",
  description: "Residual from the trailing moving average, scaled by the fitted residual spread",
  parameters,
  create: (params) => new MovingAverageDetector(params),
};
