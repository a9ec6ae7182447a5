import { z } from "zod";
import type { TimeSeries } from "../dataset/types.js";
import { euclidean } from "./stats.js";
import type { Detector, DetectorFactory } from "./types.js";
import { reverseSlidingWindow, slidingWindow, windowStarts } from "./window.js";

const parameters = z
  .object({
    window: z.number().int().min(2).default(16),
    stride: z.number().int().min(1).default(1),
    k: z.number().int().min(1).default(1),
  })
  .strict();

type NearestNeighborParams = z.infer<typeof parameters>;

interface FittedWindows {
  starts: number[];
  windows: number[][];
}

/**
 * Windowed k-nearest-neighbour distance. Windows overlapping the query window
 * are never candidates, so a series scored against itself has no trivial matches.
 */
export class NearestNeighborDetector implements Detector {
  private params: NearestNeighborParams;
  private fitted: FittedWindows | null = null;

  constructor(params: NearestNeighborParams) {
    this.params = params;
  }

  fit(series: TimeSeries): void {
    const { window, stride } = this.params;
    this.fitted = {
      starts: windowStarts(series.length, window, stride),
      windows: slidingWindow(series, window, stride),
    };
  }

  score(series: TimeSeries): number[] {
    const fitted = this.fitted;
    if (!fitted) throw new Error("nearest-neighbor: fit must be called before score");
    const { window, stride, k } = this.params;

    const starts = windowStarts(series.length, window, stride);
    const windows = slidingWindow(series, window, stride);

    const windowScores = windows.map((query, i) => {
      const distances: number[] = [];
      fitted.windows.forEach((candidate, j) => {
        if (Math.abs(fitted.starts[j] - starts[i]) >= window) {
          distances.push(euclidean(query, candidate));
        }
      });
      if (distances.length < k) {
        throw new Error(
          `nearest-neighbor: only ${distances.length} non-overlapping windows available, k=${k}`
        );
      }
      distances.sort((a, b) => a - b);
      return distances[k - 1];
    });

    return reverseSlidingWindow(windowScores, window, stride, series.length);
  }
}

export const nearestNeighborDetector: DetectorFactory<NearestNeighborParams> = {
  id: "nearest-neighbor",
  description: "Distance of each sliding window to its k-th nearest non-overlapping window",
  parameters,
  create: (params) => new NearestNeighborDetector(params),
};
