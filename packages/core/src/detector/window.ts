import type { TimeSeries } from "../dataset/types.js";

/**
 * Start offsets of the windows over a series of `length` points. The last
 * window always ends at the final point, even when the stride does not fit.
 */
export function windowStarts(length: number, windowSize: number, stride: number): number[] {
  if (windowSize < 1 || stride < 1) {
    throw new RangeError("window size and stride must be positive");
  }
  if (windowSize > length) {
    throw new RangeError(`window size ${windowSize} exceeds series length ${length}`);
  }
  const starts: number[] = [];
  for (let s = 0; s <= length - windowSize; s += stride) starts.push(s);
  const last = length - windowSize;
  if (starts[starts.length - 1] !== last) starts.push(last);
  return starts;
}

/** Windows flattened timestep by timestep: `[x0_d0, x0_d1, x1_d0, ...]`. */
export function slidingWindow(series: TimeSeries, windowSize: number, stride: number): number[][] {
  return windowStarts(series.length, windowSize, stride).map((start) =>
    series.slice(start, start + windowSize).flat()
  );
}

/** Each point takes the mean score of the windows covering it. */
export function reverseSlidingWindow(
  scores: number[],
  windowSize: number,
  stride: number,
  length: number
): number[] {
  const starts = windowStarts(length, windowSize, stride);
  if (starts.length !== scores.length) {
    throw new RangeError(`expected ${starts.length} window scores, got ${scores.length}`);
  }

  const sums = new Array<number>(length).fill(0);
  const counts = new Array<number>(length).fill(0);
  starts.forEach((start, w) => {
    for (let t = start; t < start + windowSize; t++) {
      sums[t] += scores[w];
      counts[t] += 1;
    }
  });
  return sums.map((sum, t) => sum / counts[t]);
}
