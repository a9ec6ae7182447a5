import { movingAverageDetector } from "./moving-average.js";
import { nearestNeighborDetector } from "./nearest-neighbor.js";
import { DetectorRegistry } from "./registry.js";
import { zscoreDetector } from "./zscore.js";

export function createDefaultDetectorRegistry(): DetectorRegistry {
  return new DetectorRegistry()
    .register(zscoreDetector)
    .register(movingAverageDetector)
    .register(nearestNeighborDetector);
}
