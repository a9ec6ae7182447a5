export type BatchState = "Pending" | "Expanding" | "Running" | "Completed" | "Cancelled" | "Failed";

export const TRANSITIONS: Readonly<Record<BatchState, readonly BatchState[]>> = {
  Pending: ["Expanding"],
  Expanding: ["Running", "Failed"],
  Running: ["Completed", "Cancelled", "Failed"],
  Completed: [],
  Cancelled: [],
  Failed: [],
};

/**
 * Validate a batch state transition.
 * Throws if the transition is invalid.
 */
export function transition(current: BatchState, target: BatchState): BatchState {
  const valid = TRANSITIONS[current];
  if (!valid.includes(target)) {
    throw new Error(`Invalid transition: ${current} → ${target}. Valid: [${valid.join(", ")}]`);
  }
  return target;
}

export function isTerminal(state: BatchState): boolean {
  return TRANSITIONS[state].length === 0;
}
