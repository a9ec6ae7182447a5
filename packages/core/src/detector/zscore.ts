import { z } from "zod";
import type { TimeSeries } from "../dataset/types.js";
import { column, mean, median, std } from "./stats.js";
import type { Detector, DetectorFactory } from "./types.js";

const MAD_TO_STD = 1.4826;

const parameters = z
  .object({
    robust: z.boolean().default(false),
  })
  .strict();

type ZScoreParams = z.infer<typeof parameters>;

export class ZScoreDetector implements Detector {
  private robust: boolean;
  private centers: number[] | null = null;
  private scales: number[] = [];

  constructor(params: ZScoreParams) {
    this.robust = params.robust;
  }

  fit(series: TimeSeries): void {
    const dimensions = series[0]?.length ?? 0;
    this.centers = [];
    this.scales = [];
    for (let d = 0; d < dimensions; d++) {
      const values = column(series, d);
      const center = this.robust ? median(values) : mean(values);
      const spread = this.robust
        ? median(values.map((v) => Math.abs(v - center))) * MAD_TO_STD
        : std(values);
      this.centers.push(center);
      this.scales.push(spread > 0 ? spread : 1);
    }
  }

  score(series: TimeSeries): number[] {
    const centers = this.centers;
    if (!centers) throw new Error("zscore: fit must be called before score");
    return series.map((point) =>
      Math.max(...point.map((v, d) => Math.abs(v - centers[d]) / this.scales[d]))
    );
  }
}

export const zscoreDetector: DetectorFactory<ZScoreParams> = {
  id: "zscore",
  description: "Largest absolute z-score across dimensions (mean/std, or median/MAD when robust)",
  parameters,
  create: (params) => new ZScoreDetector(params),
};
