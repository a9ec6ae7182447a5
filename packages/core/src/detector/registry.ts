import { InvalidParameterError, UnknownAlgorithmError } from "../errors.js";
import type { Detector, DetectorFactory, ParameterSet } from "./types.js";

interface RegisteredDetector {
  id: string;
  description: string;
  instantiate(parameters: ParameterSet): Detector;
}

export class DetectorRegistry {
  private detectors = new Map<string, RegisteredDetector>();

  register<P>(factory: DetectorFactory<P>): this {
    if (this.detectors.has(factory.id)) {
      throw new Error(`Detector "${factory.id}" is already registered`);
    }
    this.detectors.set(factory.id, {
      id: factory.id,
      description: factory.description,
      instantiate: (parameters) => {
        const parsed = factory.parameters.safeParse(parameters);
        if (!parsed.success) {
          throw new InvalidParameterError(
            factory.id,
            parsed.error.issues.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
          );
        }
        return factory.create(parsed.data);
      },
    });
    return this;
  }

  has(algorithmId: string): boolean {
    return this.detectors.has(algorithmId);
  }

  ids(): string[] {
    return [...this.detectors.keys()];
  }

  describe(): { id: string; description: string }[] {
    return [...this.detectors.values()].map(({ id, description }) => ({ id, description }));
  }

  /** Validates parameters before anything is built. */
  instantiate(algorithmId: string, parameters: ParameterSet): Detector {
    const entry = this.detectors.get(algorithmId);
    if (!entry) throw new UnknownAlgorithmError(algorithmId, this.ids());
    return entry.instantiate(parameters);
  }
}
